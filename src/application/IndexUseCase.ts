import path from 'node:path';
import type { VectorStorePort } from '../domain/ports/VectorStorePort.js';
import type { DocumentAnalyzerPort } from '../domain/ports/DocumentAnalyzerPort.js';
import type { FileSourcePort } from '../domain/ports/FileSourcePort.js';
import type { IndexReport } from './dto/IndexReport.js';
import { emptyIndexReport } from './dto/IndexReport.js';
import { ContentHash } from '../domain/value-objects/ContentHash.js';
import { documentIdFor } from '../domain/value-objects/Identifiers.js';
import { CrossdocError, FileNotFoundError } from '../domain/errors/DomainErrors.js';
import { Logger, describeError } from '../shared/Logger.js';

export interface EnsureFreshOptions {
  /** 移除不在 paths 中的已索引文件 */
  prune?: boolean;
  signal?: AbortSignal;
}

/**
 * 索引用例：偵測過期文件並重建
 *
 * 內容雜湊相同的檔案直接略過（不分析、不嵌入）；
 * 單一檔案失敗記錄到報告，不中斷整批。
 */
export class IndexUseCase {
  private readonly logger: Logger;

  constructor(
    private readonly store: VectorStorePort,
    private readonly analyzer: DocumentAnalyzerPort,
    private readonly files: FileSourcePort,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger('IndexUseCase');
  }

  /** 未索引、來源檔案消失、或內容雜湊改變時為 true */
  async isStale(documentId: string): Promise<boolean> {
    const doc = this.store.getDocument(documentId);
    if (!doc) return true;
    if (!(await this.files.fileExists(doc.sourcePath))) return true;

    const bytes = await this.files.readFile(doc.sourcePath);
    return ContentHash.fromBytes(bytes).value !== doc.contentHash;
  }

  async ensureFresh(paths: string[], options: EnsureFreshOptions = {}): Promise<IndexReport> {
    const start = Date.now();
    const report = emptyIndexReport();
    const { signal } = options;
    const wanted = [...new Set(paths.map((p) => path.resolve(p)))];

    for (const sourcePath of wanted) {
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }
      try {
        await this.refreshOne(sourcePath, report, signal);
      } catch (err) {
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }
        if (!(err instanceof CrossdocError) || err.classification === 'manual') {
          throw err;
        }
        report.failures.push({ path: sourcePath, code: err.code, message: err.message });
        this.logger.warn('Skipping file', { path: sourcePath, ...describeError(err) });
      }
    }

    if (!report.cancelled) {
      await this.removeVanished(new Set(wanted), options.prune ?? false, report);
    }

    report.durationMs = Date.now() - start;
    this.logger.info('Index refreshed', {
      indexed: report.documentsIndexed,
      skipped: report.documentsSkipped,
      removed: report.documentsRemoved,
      failed: report.failures.length,
      cancelled: report.cancelled,
      durationMs: report.durationMs,
    });
    return report;
  }

  /**
   * 同步整個目錄：列出支援的檔案並移除目錄中已不存在的文件
   * 目錄不存在時視為空集合
   */
  async ensureFreshDirectory(rootDir: string, signal?: AbortSignal): Promise<IndexReport> {
    const root = path.resolve(rootDir);
    let files: string[];
    try {
      files = await this.files.listFiles(root, this.analyzer.supportedExtensions);
    } catch (err) {
      if (!(err instanceof FileNotFoundError)) throw err;
      this.logger.warn('Collection root not found', { root });
      files = [];
    }
    return this.ensureFresh(files, { prune: true, signal });
  }

  private async refreshOne(sourcePath: string, report: IndexReport, signal?: AbortSignal): Promise<void> {
    const documentId = documentIdFor(sourcePath);

    if (!(await this.files.fileExists(sourcePath))) {
      if (this.store.remove(documentId)) {
        report.documentsRemoved++;
        return;
      }
      // 觸發 FileNotFoundError，由呼叫端記錄
      await this.files.readFile(sourcePath);
      return;
    }

    const bytes = await this.files.readFile(sourcePath);
    const hash = ContentHash.fromBytes(bytes).value;
    if (this.store.getContentHash(documentId) === hash) {
      report.documentsSkipped++;
      return;
    }

    const analyzed = await this.analyzer.analyzeBytes(sourcePath, bytes, signal);
    // 分析完成但已取消：不寫入半途的文件
    signal?.throwIfAborted();

    const outcome = this.store.upsert(analyzed);
    if (outcome === 'unchanged') {
      report.documentsSkipped++;
      return;
    }
    report.documentsIndexed++;
    report.chunksEmbedded += analyzed.chunks.length;
    this.logger.debug('Document indexed', { path: sourcePath, outcome, chunks: analyzed.chunks.length });
  }

  /** 來源檔案已消失的文件一律移除；prune 時也移除不在清單中的文件 */
  private async removeVanished(wanted: Set<string>, prune: boolean, report: IndexReport): Promise<void> {
    for (const listing of this.store.listDocuments()) {
      if (wanted.has(listing.sourcePath)) continue;
      const gone = !(await this.files.fileExists(listing.sourcePath));
      if ((gone || prune) && this.store.remove(listing.documentId)) {
        report.documentsRemoved++;
      }
    }
  }
}
