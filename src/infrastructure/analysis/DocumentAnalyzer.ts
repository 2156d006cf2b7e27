import path from 'node:path';
import type { AnalysisConfig } from '../../config/types.js';
import type { Chunk } from '../../domain/entities/Chunk.js';
import type { Document } from '../../domain/entities/Document.js';
import type { AnalyzedDocument, DocumentAnalyzerPort } from '../../domain/ports/DocumentAnalyzerPort.js';
import type { FileSourcePort } from '../../domain/ports/FileSourcePort.js';
import type { EmbeddingBatcher } from '../embedding/EmbeddingBatcher.js';
import { CorruptInputError, CrossdocError } from '../../domain/errors/DomainErrors.js';
import { ContentHash } from '../../domain/value-objects/ContentHash.js';
import { chunkIdFor, documentIdFor } from '../../domain/value-objects/Identifiers.js';
import { classifyFile, SUPPORTED_EXTENSIONS } from './FileClassifier.js';
import { DEFAULT_HANDLERS, type HandlerOutput, type HandlerRegistry } from './handlers/registry.js';
import { buildSummary } from './SummaryBuilder.js';
import { TopicExtractor } from './TopicExtractor.js';
import { Logger } from '../../shared/Logger.js';

/**
 * 文件分析器：分類 → 類型處理 → 切塊 → 摘要 → 主題 → 嵌入
 *
 * 同一份位元組永遠得到同樣的 chunk 與 id；嵌入由注入的 batcher 負責。
 */
export class DocumentAnalyzer implements DocumentAnalyzerPort {
  readonly supportedExtensions = SUPPORTED_EXTENSIONS;
  private readonly topics: TopicExtractor;
  private readonly logger: Logger;

  constructor(
    private readonly files: FileSourcePort,
    private readonly embedder: EmbeddingBatcher,
    private readonly options: AnalysisConfig,
    private readonly handlers: HandlerRegistry = DEFAULT_HANDLERS,
    logger?: Logger,
  ) {
    this.topics = new TopicExtractor(options.maxTopics);
    this.logger = logger ?? new Logger('DocumentAnalyzer');
  }

  /**
   * @throws FileNotFoundError / FilePermissionError / UnsupportedTypeError / CorruptInputError
   */
  async analyze(filePath: string, signal?: AbortSignal): Promise<AnalyzedDocument> {
    const bytes = await this.files.readFile(filePath);
    return this.analyzeBytes(filePath, bytes, signal);
  }

  async analyzeBytes(filePath: string, bytes: Uint8Array, signal?: AbortSignal): Promise<AnalyzedDocument> {
    const sourcePath = path.resolve(filePath);
    const fileType = classifyFile(sourcePath, bytes);

    let output: HandlerOutput;
    try {
      output = await this.handlers[fileType](bytes, { filePath: sourcePath, options: this.options });
    } catch (err) {
      if (err instanceof CrossdocError) throw err;
      throw new CorruptInputError(sourcePath, err instanceof Error ? err.message : String(err), { cause: err });
    }

    const summaryText = buildSummary(
      {
        filePath: sourcePath,
        fileType,
        headings: output.headings,
        statsLine: output.statsLine,
        chunkTexts: output.chunks.map((c) => c.text),
      },
      { leadChunks: this.options.summaryLeadChunks, maxChars: this.options.summaryMaxChars },
    );
    const topics = this.topics.extract(output.headings, [summaryText]);

    signal?.throwIfAborted();
    const [summaryEmbedding, ...chunkEmbeddings] = await this.embedder.embedBatch(
      [summaryText, ...output.chunks.map((c) => c.text)],
      signal,
    );

    const documentId = documentIdFor(sourcePath);
    const chunkIds = output.chunks.map((c, i) => chunkIdFor(documentId, i, c.text));
    const chunks: Chunk[] = output.chunks.map((raw, i) => ({
      chunkId: chunkIds[i],
      documentId,
      sequenceIndex: i,
      location: raw.location,
      contentType: raw.contentType,
      text: raw.text,
      textHash: ContentHash.fromText(raw.text).value,
      vector: chunkEmbeddings[i].vector,
      prevId: i > 0 ? chunkIds[i - 1] : null,
      nextId: i < chunkIds.length - 1 ? chunkIds[i + 1] : null,
    }));

    const document: Document = {
      documentId,
      sourcePath,
      fileType,
      contentHash: ContentHash.fromBytes(bytes).value,
      fileSize: bytes.byteLength,
      structure: output.structure,
      summaryText,
      summaryVector: summaryEmbedding.vector,
      topics,
      chunkIds,
      indexedAt: Date.now(),
    };

    this.logger.debug('Document analyzed', { sourcePath, fileType, chunks: chunks.length });
    return { document, chunks };
  }
}
