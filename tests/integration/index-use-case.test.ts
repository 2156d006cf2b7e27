import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { IndexUseCase } from '../../src/application/IndexUseCase.js';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteVectorStore } from '../../src/infrastructure/sqlite/SqliteVectorStore.js';
import { FileSystemSourceAdapter } from '../../src/infrastructure/filesystem/FileSystemSourceAdapter.js';
import { DocumentAnalyzer } from '../../src/infrastructure/analysis/DocumentAnalyzer.js';
import { EmbeddingBatcher } from '../../src/infrastructure/embedding/EmbeddingBatcher.js';
import { HashingEmbeddingAdapter } from '../../src/infrastructure/embedding/HashingEmbeddingAdapter.js';
import type { EmbeddingPort } from '../../src/domain/ports/EmbeddingPort.js';
import { DimensionMismatchError, EmbeddingUnavailableError } from '../../src/domain/errors/DomainErrors.js';
import { documentIdFor } from '../../src/domain/value-objects/Identifiers.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { Logger } from '../../src/shared/Logger.js';
import { buildDocx, buildXlsx } from '../fixtures/ooxml.js';

const quiet = new Logger('test', 'error');
const DIM = 64;

function writeCollection(dir: string): void {
  fs.mkdirSync(path.join(dir, '.hidden'), { recursive: true });
  fs.writeFileSync(path.join(dir, 'notes.md'),
    '# Travel Notes\n\nParis is the capital of France.\n\n## Japan\n\nTokyo is the capital of Japan.\n');
  fs.writeFileSync(path.join(dir, 'cities.csv'),
    'city,country,population\nParis,France,2100000\nTokyo,Japan,14000000\n');
  fs.writeFileSync(path.join(dir, 'records.json'),
    JSON.stringify({ cities: [{ name: 'Paris' }, { name: 'Tokyo' }] }));
  fs.writeFileSync(path.join(dir, 'report.docx'),
    buildDocx([{ heading: 'Summary', level: 1 }, { text: 'Quarterly revenue grew in every region.' }]));
  fs.writeFileSync(path.join(dir, 'sales.xlsx'),
    buildXlsx([{ name: 'Sales', rows: [['Region', 'Revenue'], ['North', 1200], ['South', 800]] }]));
  fs.writeFileSync(path.join(dir, '.hidden', 'secret.md'), '# Hidden\n\nNot indexed.\n');
  fs.writeFileSync(path.join(dir, 'slides.rtf'), '{\\rtf1 not supported}');
}

/**
 * Feature: 索引同步
 *
 * 作為使用者，我把各種格式的文件放進同一個目錄，
 * 需要索引只重建內容改變的文件，並移除已刪除的文件。
 */
describe('IndexUseCase', () => {
  let tmpDir: string;
  let collectionDir: string;
  let store: SqliteVectorStore;
  let embedding: EmbeddingPort;
  let useCase: IndexUseCase;

  function build(provider: EmbeddingPort): IndexUseCase {
    const files = new FileSystemSourceAdapter();
    const analyzer = new DocumentAnalyzer(
      files,
      new EmbeddingBatcher(provider, 100, quiet),
      DEFAULT_CONFIG.analysis,
      undefined,
      quiet,
    );
    return new IndexUseCase(store, analyzer, files, quiet);
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crossdoc-index-'));
    collectionDir = path.join(tmpDir, 'documents');
    writeCollection(collectionDir);

    const dbMgr = new DatabaseManager(
      path.join(tmpDir, 'index.db'),
      { dimension: DIM, modelId: `feature-hashing-${DIM}` },
      quiet,
    );
    store = new SqliteVectorStore(dbMgr, undefined, quiet);
    embedding = new HashingEmbeddingAdapter(DIM);
    vi.spyOn(embedding, 'embed');
    useCase = build(embedding);
  });

  afterEach(() => {
    store.teardown();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  /**
   * Scenario: 首次同步整個目錄
   * Given 五種格式各一個檔案、一個隱藏目錄與一個不支援的格式
   * When 同步目錄
   * Then 五份文件都被索引，各自歸類
   */
  it('should index every supported file in the directory', async () => {
    const report = await useCase.ensureFreshDirectory(collectionDir);

    expect(report.documentsIndexed).toBe(5);
    expect(report.failures).toEqual([]);
    expect(report.cancelled).toBe(false);
    expect(report.chunksEmbedded).toBe(store.stats().totalChunks);
    expect(store.stats().typesBreakdown).toEqual({
      text: 1, tabular: 1, structured_record: 1, word: 1, spreadsheet: 1,
    });
    expect(store.listDocuments().map((d) => path.basename(d.sourcePath))).toEqual([
      'cities.csv', 'notes.md', 'records.json', 'report.docx', 'sales.xlsx',
    ]);
  });

  it('should skip unchanged files without embedding again', async () => {
    await useCase.ensureFreshDirectory(collectionDir);
    const callsAfterFirst = vi.mocked(embedding.embed).mock.calls.length;

    const report = await useCase.ensureFreshDirectory(collectionDir);

    expect(report.documentsIndexed).toBe(0);
    expect(report.documentsSkipped).toBe(5);
    expect(vi.mocked(embedding.embed).mock.calls.length).toBe(callsAfterFirst);
  });

  /**
   * Scenario: 只有一份文件改變
   * Given 已索引的目錄
   * When 修改 notes.md 後再同步
   * Then 只重新嵌入 notes.md
   */
  it('should re-embed only the changed document', async () => {
    await useCase.ensureFreshDirectory(collectionDir);
    const notesPath = path.join(collectionDir, 'notes.md');
    const notesId = documentIdFor(notesPath);
    const callsAfterFirst = vi.mocked(embedding.embed).mock.calls.length;

    expect(await useCase.isStale(notesId)).toBe(false);
    fs.appendFileSync(notesPath, '\nKyoto was the former capital of Japan.\n');
    expect(await useCase.isStale(notesId)).toBe(true);

    const report = await useCase.ensureFreshDirectory(collectionDir);

    expect(report.documentsIndexed).toBe(1);
    expect(report.documentsSkipped).toBe(4);
    expect(vi.mocked(embedding.embed).mock.calls.length).toBe(callsAfterFirst + 1);
    expect(store.getDocument(notesId)?.summaryText).toContain('Kyoto');
  });

  it('should remove documents whose files were deleted', async () => {
    await useCase.ensureFreshDirectory(collectionDir);
    fs.rmSync(path.join(collectionDir, 'cities.csv'));

    const report = await useCase.ensureFreshDirectory(collectionDir);

    expect(report.documentsRemoved).toBe(1);
    expect(store.stats().totalDocuments).toBe(4);
    expect(await useCase.isStale(documentIdFor(path.join(collectionDir, 'cities.csv')))).toBe(true);
  });

  it('should leave unlisted documents alone when refreshing specific files', async () => {
    await useCase.ensureFreshDirectory(collectionDir);

    const report = await useCase.ensureFresh([path.join(collectionDir, 'notes.md')]);

    expect(report.documentsSkipped).toBe(1);
    expect(report.documentsRemoved).toBe(0);
    expect(store.stats().totalDocuments).toBe(5);
  });

  /**
   * Scenario: 單一檔案損壞
   * Given 一個副檔名為 .docx 但內容不是 zip 的檔案
   * When 同步目錄
   * Then 該檔案記錄為失敗，其餘文件照常索引
   */
  it('should record a corrupt file and keep going', async () => {
    const brokenPath = path.join(collectionDir, 'broken.docx');
    fs.writeFileSync(brokenPath, 'this is not a zip archive');

    const report = await useCase.ensureFreshDirectory(collectionDir);

    expect(report.documentsIndexed).toBe(5);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({ path: brokenPath, code: 'CORRUPT_INPUT' });
  });

  it('should report a listed file that does not exist', async () => {
    const missing = path.join(collectionDir, 'missing.pdf');

    const report = await useCase.ensureFresh([missing]);

    expect(report.failures).toEqual([
      { path: missing, code: 'FILE_NOT_FOUND', message: expect.stringContaining(missing) },
    ]);
  });

  it('should record files the embedder cannot serve as failures', async () => {
    const offline = new HashingEmbeddingAdapter(DIM);
    vi.spyOn(offline, 'embed').mockRejectedValue(new EmbeddingUnavailableError('offline'));

    const report = await build(offline).ensureFreshDirectory(collectionDir);

    expect(report.documentsIndexed).toBe(0);
    expect(report.failures.map((f) => f.code)).toEqual(Array(5).fill('EMBEDDING_UNAVAILABLE'));
  });

  it('should stop the sweep on an index-level error', async () => {
    const wrongSize = new HashingEmbeddingAdapter(DIM / 2);

    await expect(build(wrongSize).ensureFreshDirectory(collectionDir))
      .rejects.toBeInstanceOf(DimensionMismatchError);
    expect(store.stats().totalDocuments).toBe(0);
  });

  it('should stop between documents once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await useCase.ensureFreshDirectory(collectionDir, controller.signal);

    expect(report.cancelled).toBe(true);
    expect(report.documentsIndexed).toBe(0);
  });
});
