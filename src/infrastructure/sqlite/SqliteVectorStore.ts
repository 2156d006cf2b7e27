import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import type { DatabaseManager } from './DatabaseManager.js';
import type { AnalyzedDocument } from '../../domain/ports/DocumentAnalyzerPort.js';
import type {
  DocumentListing,
  StoreStats,
  UpsertOutcome,
  VectorStorePort,
} from '../../domain/ports/VectorStorePort.js';
import type { Document, DocumentStructure, FileType } from '../../domain/entities/Document.js';
import type { Chunk, ChunkContentType } from '../../domain/entities/Chunk.js';
import type {
  HybridSearchResult,
  ScoredChunk,
  ScoredDocument,
} from '../../domain/entities/SearchResult.js';
import { BalancedSelection } from '../../domain/value-objects/BalancedSelection.js';
import { DimensionMismatchError, EmptyIndexError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';
import { fromBlob, toBlob } from './VectorBlob.js';

interface DocumentRow {
  document_id: string;
  source_path: string;
  file_type: FileType;
  content_hash: string;
  file_size: number;
  summary_text: string;
  topics_json: string;
  structure_json: string;
  chunk_ids_json: string;
  indexed_at: number;
}

interface ChunkRow {
  chunk_id: string;
  document_id: string;
  sequence_index: number;
  location: string;
  content_type: ChunkContentType;
  text: string;
  text_hash: string;
  prev_id: string | null;
  next_id: string | null;
}

export interface VectorStoreOptions {
  /** chunk 候選數 = candidateMultiplier × numChunks */
  candidateMultiplier: number;
}

/**
 * 雙層向量索引：文件層（摘要向量）與 chunk 層，共用一個 SQLite 檔案
 *
 * 相似度 = 1 - cosine distance（sqlite-vec 的 vec_distance_cosine），
 * 同分依 id 排序，結果在同一份索引狀態下固定。
 * 每份文件的寫入都在單一 transaction 中完成。
 */
export class SqliteVectorStore implements VectorStorePort {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(
    private readonly manager: DatabaseManager,
    private readonly options: VectorStoreOptions = { candidateMultiplier: 3 },
    logger?: Logger,
  ) {
    this.db = manager.getDb();
    this.logger = logger ?? new Logger('SqliteVectorStore');
  }

  get dimension(): number {
    return this.manager.dimension;
  }

  /** 依 contentHash 判斷：相同則不寫入，否則整份替換 */
  upsert(analyzed: AnalyzedDocument): UpsertOutcome {
    const { document, chunks } = analyzed;
    this.assertConsistent(document, chunks);

    const run = this.db.transaction((): UpsertOutcome => {
      const existing = this.db.prepare(
        'SELECT content_hash FROM documents WHERE document_id = ?'
      ).get(document.documentId) as { content_hash: string } | undefined;

      if (existing && existing.content_hash === document.contentHash) {
        return 'unchanged';
      }

      if (existing) {
        // FK cascade 一併刪除 chunks / chunk_vectors / document_vectors
        this.db.prepare('DELETE FROM documents WHERE document_id = ?').run(document.documentId);
      }

      this.db.prepare(`
        INSERT INTO documents(document_id, source_path, file_type, content_hash, file_size,
          summary_text, topics_json, structure_json, chunk_ids_json, indexed_at)
        VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        document.documentId, document.sourcePath, document.fileType,
        document.contentHash, document.fileSize, document.summaryText,
        JSON.stringify(document.topics), JSON.stringify(document.structure),
        JSON.stringify(document.chunkIds), document.indexedAt,
      );
      this.db.prepare(
        'INSERT INTO document_vectors(document_id, embedding) VALUES(?, ?)'
      ).run(document.documentId, toBlob(document.summaryVector));

      const chunkStmt = this.db.prepare(`
        INSERT INTO chunks(chunk_id, document_id, sequence_index, location, content_type,
          text, text_hash, prev_id, next_id)
        VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      const vecStmt = this.db.prepare(
        'INSERT INTO chunk_vectors(chunk_id, embedding) VALUES(?, ?)'
      );
      for (const chunk of chunks) {
        chunkStmt.run(
          chunk.chunkId, chunk.documentId, chunk.sequenceIndex, chunk.location,
          chunk.contentType, chunk.text, chunk.textHash, chunk.prevId, chunk.nextId,
        );
        vecStmt.run(chunk.chunkId, toBlob(chunk.vector));
      }

      const outcome: UpsertOutcome = existing ? 'replaced' : 'inserted';
      this.writeAuditLog({
        action: outcome === 'inserted' ? 'document.insert' : 'document.replace',
        targetPath: document.sourcePath,
        detail: { documentId: document.documentId, chunks: chunks.length },
        hashBefore: existing?.content_hash,
        hashAfter: document.contentHash,
      });
      return outcome;
    });

    const outcome = run();
    this.logger.debug('Upsert', { documentId: document.documentId, outcome, chunks: chunks.length });
    return outcome;
  }

  remove(documentId: string): boolean {
    const run = this.db.transaction(() => {
      const row = this.db.prepare(
        'SELECT source_path, content_hash FROM documents WHERE document_id = ?'
      ).get(documentId) as { source_path: string; content_hash: string } | undefined;
      if (!row) return false;

      this.db.prepare('DELETE FROM documents WHERE document_id = ?').run(documentId);
      this.writeAuditLog({
        action: 'document.remove',
        targetPath: row.source_path,
        detail: { documentId },
        hashBefore: row.content_hash,
      });
      return true;
    });
    return run();
  }

  getContentHash(documentId: string): string | undefined {
    const row = this.db.prepare(
      'SELECT content_hash FROM documents WHERE document_id = ?'
    ).get(documentId) as { content_hash: string } | undefined;
    return row?.content_hash;
  }

  getDocument(documentId: string): Document | undefined {
    const row = this.db.prepare(
      'SELECT * FROM documents WHERE document_id = ?'
    ).get(documentId) as DocumentRow | undefined;
    if (!row) return undefined;

    const vec = this.db.prepare(
      'SELECT embedding FROM document_vectors WHERE document_id = ?'
    ).get(documentId) as { embedding: Buffer } | undefined;

    return {
      documentId: row.document_id,
      sourcePath: row.source_path,
      fileType: row.file_type,
      contentHash: row.content_hash,
      fileSize: row.file_size,
      structure: JSON.parse(row.structure_json) as DocumentStructure,
      summaryText: row.summary_text,
      summaryVector: vec ? fromBlob(vec.embedding) : new Float32Array(0),
      topics: JSON.parse(row.topics_json) as string[],
      chunkIds: JSON.parse(row.chunk_ids_json) as string[],
      indexedAt: row.indexed_at,
    };
  }

  getDocumentBySource(sourcePath: string): DocumentListing | undefined {
    const row = this.db.prepare(
      'SELECT * FROM documents WHERE source_path = ?'
    ).get(sourcePath) as DocumentRow | undefined;
    return row ? this.toListing(row) : undefined;
  }

  listDocuments(): DocumentListing[] {
    const rows = this.db.prepare(
      'SELECT * FROM documents ORDER BY source_path ASC'
    ).all() as DocumentRow[];
    return rows.map((row) => this.toListing(row));
  }

  /** 依傳入順序回傳；不存在的 id 略過 */
  getChunks(chunkIds: string[]): Chunk[] {
    const rowStmt = this.db.prepare('SELECT * FROM chunks WHERE chunk_id = ?');
    const vecStmt = this.db.prepare('SELECT embedding FROM chunk_vectors WHERE chunk_id = ?');

    const result: Chunk[] = [];
    for (const id of chunkIds) {
      const row = rowStmt.get(id) as ChunkRow | undefined;
      if (!row) continue;
      const vec = vecStmt.get(id) as { embedding: Buffer } | undefined;
      result.push({
        chunkId: row.chunk_id,
        documentId: row.document_id,
        sequenceIndex: row.sequence_index,
        location: row.location,
        contentType: row.content_type,
        text: row.text,
        textHash: row.text_hash,
        vector: vec ? fromBlob(vec.embedding) : new Float32Array(0),
        prevId: row.prev_id,
        nextId: row.next_id,
      });
    }
    return result;
  }

  stats(): StoreStats {
    const totalDocuments = this.countDocuments();
    const { n: totalChunks } = this.db.prepare(
      'SELECT COUNT(*) AS n FROM chunks'
    ).get() as { n: number };
    const typeRows = this.db.prepare(
      'SELECT file_type, COUNT(*) AS n FROM documents GROUP BY file_type ORDER BY file_type'
    ).all() as Array<{ file_type: FileType; n: number }>;

    const typesBreakdown: Partial<Record<FileType, number>> = {};
    for (const row of typeRows) typesBreakdown[row.file_type] = row.n;

    return {
      totalDocuments,
      totalChunks,
      typesBreakdown,
      dimension: this.manager.dimension,
      modelId: this.manager.modelId,
    };
  }

  searchDocuments(queryVector: Float32Array, topK: number): ScoredDocument[] {
    this.assertSearchable(queryVector);
    if (topK <= 0) return [];

    const rows = this.db.prepare(`
      SELECT d.document_id, d.source_path, d.file_type, d.summary_text, d.topics_json,
             1.0 - vec_distance_cosine(v.embedding, ?) AS score
      FROM document_vectors v
      JOIN documents d ON d.document_id = v.document_id
      ORDER BY score DESC, d.document_id ASC
      LIMIT ?
    `).all(toBlob(queryVector), topK) as Array<{
      document_id: string;
      source_path: string;
      file_type: FileType;
      summary_text: string;
      topics_json: string;
      score: number;
    }>;

    return rows.map((row) => ({
      documentId: row.document_id,
      sourcePath: row.source_path,
      fileType: row.file_type,
      summaryText: row.summary_text,
      topics: JSON.parse(row.topics_json) as string[],
      score: row.score,
    }));
  }

  /** documentIds 有給時只在這些文件內搜尋 */
  searchChunks(queryVector: Float32Array, topK: number, documentIds?: string[]): ScoredChunk[] {
    this.assertSearchable(queryVector);
    if (topK <= 0) return [];
    if (documentIds && documentIds.length === 0) return [];

    const filter = documentIds
      ? 'WHERE c.document_id IN (SELECT value FROM json_each(?))'
      : '';
    const params: unknown[] = [toBlob(queryVector)];
    if (documentIds) params.push(JSON.stringify(documentIds));
    params.push(topK);

    const rows = this.db.prepare(`
      SELECT c.chunk_id, c.document_id, c.sequence_index, c.location, c.content_type, c.text,
             1.0 - vec_distance_cosine(v.embedding, ?) AS score
      FROM chunk_vectors v
      JOIN chunks c ON c.chunk_id = v.chunk_id
      ${filter}
      ORDER BY score DESC, c.chunk_id ASC
      LIMIT ?
    `).all(...params) as Array<{
      chunk_id: string;
      document_id: string;
      sequence_index: number;
      location: string;
      content_type: ChunkContentType;
      text: string;
      score: number;
    }>;

    return rows.map((row) => ({
      chunkId: row.chunk_id,
      documentId: row.document_id,
      sequenceIndex: row.sequence_index,
      location: row.location,
      contentType: row.content_type,
      text: row.text,
      score: row.score,
    }));
  }

  /**
   * 先選文件，再在這些文件內取 chunk 候選，最後做跨文件平衡選取
   */
  hybridSearch(queryVector: Float32Array, numDocuments: number, numChunks: number): HybridSearchResult {
    const documents = this.searchDocuments(queryVector, numDocuments);
    const documentIds = documents.map((d) => d.documentId);

    const candidates = this.searchChunks(
      queryVector,
      this.options.candidateMultiplier * numChunks,
      documentIds,
    );
    const chunks = BalancedSelection.select(documentIds, candidates, numChunks);

    this.logger.debug('Hybrid search', {
      documents: documentIds.length,
      candidates: candidates.length,
      selected: chunks.length,
    });
    return { documents, chunks };
  }

  /** 將 WAL 內容寫回主檔；重新開啟同一路徑即為載入 */
  save(): void {
    this.db.pragma('wal_checkpoint(TRUNCATE)');
  }

  /** 線上備份到另一個檔案 */
  async saveTo(destPath: string): Promise<void> {
    fs.mkdirSync(path.dirname(destPath), { recursive: true });
    await this.db.backup(destPath);
    this.logger.info('Index exported', { destPath });
  }

  teardown(): void {
    this.manager.close();
  }

  private countDocuments(): number {
    const { n } = this.db.prepare('SELECT COUNT(*) AS n FROM documents').get() as { n: number };
    return n;
  }

  private assertSearchable(queryVector: Float32Array): void {
    if (queryVector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, queryVector.length);
    }
    if (this.countDocuments() === 0) {
      throw new EmptyIndexError();
    }
  }

  private assertConsistent(document: Document, chunks: Chunk[]): void {
    if (document.summaryVector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, document.summaryVector.length);
    }
    chunks.forEach((chunk, i) => {
      if (chunk.vector.length !== this.dimension) {
        throw new DimensionMismatchError(this.dimension, chunk.vector.length);
      }
      if (chunk.documentId !== document.documentId || chunk.sequenceIndex !== i) {
        throw new Error(`Chunk ${chunk.chunkId} does not belong at position ${i} of ${document.documentId}`);
      }
      if (document.chunkIds[i] !== chunk.chunkId) {
        throw new Error(`Document ${document.documentId} chunk list does not match its chunks`);
      }
    });
    if (document.chunkIds.length !== chunks.length) {
      throw new Error(`Document ${document.documentId} chunk list does not match its chunks`);
    }
  }

  private toListing(row: DocumentRow): DocumentListing {
    return {
      documentId: row.document_id,
      sourcePath: row.source_path,
      fileType: row.file_type,
      contentHash: row.content_hash,
      topics: JSON.parse(row.topics_json) as string[],
      chunkCount: (JSON.parse(row.chunk_ids_json) as string[]).length,
      indexedAt: row.indexed_at,
    };
  }

  private writeAuditLog(entry: {
    action: string;
    targetPath?: string;
    detail?: Record<string, unknown>;
    hashBefore?: string;
    hashAfter?: string;
  }): void {
    this.db.prepare(`
      INSERT INTO audit_log(timestamp_ms, actor, action, target_path, detail_json, content_hash_before, content_hash_after)
      VALUES(?, 'indexer', ?, ?, ?, ?, ?)
    `).run(
      Date.now(), entry.action, entry.targetPath ?? null,
      entry.detail ? JSON.stringify(entry.detail) : null,
      entry.hashBefore ?? null, entry.hashAfter ?? null,
    );
  }
}
