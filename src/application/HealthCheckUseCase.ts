import type Database from 'better-sqlite3';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { GenerationPort } from '../domain/ports/GenerationPort.js';

export interface HealthCheckOptions {
  fix?: boolean;
}

export interface HealthReport {
  healthy: boolean;
  totalDocuments: number;
  totalChunks: number;
  orphanedChunkIds: string[];
  orphanedVectorIds: string[];
  chunkListMismatches: string[];
  sequenceGaps: string[];
  vectorIssues: string[];
  fixActions: string[];
}

/** 外部服務的可用性（會實際呼叫 provider） */
export interface ServiceReport {
  embedding: { provider: string; model: string; healthy: boolean };
  generation: { provider: string; available: boolean };
}

export interface HealthServices {
  embedding: EmbeddingPort;
  generator: GenerationPort;
}

/**
 * 健康檢查用例：驗證索引的資料不變式，可選修復模式
 *
 * 檢查項目：
 * 1. orphaned chunks / vectors：指向不存在的文件或 chunk
 * 2. 文件的 chunk_ids 清單與實際擁有的 chunk 一致（依序）
 * 3. sequence_index 從 0 開始連續
 * 4. 每個文件與 chunk 都有正確維度的向量
 *
 * 修復項目（fix=true）：刪除 orphaned chunks 與 vectors
 */
export class HealthCheckUseCase {
  constructor(
    private readonly db: Database.Database,
    private readonly dimension: number,
    private readonly services?: HealthServices,
  ) {}

  /** 檢查 embedding 與生成服務；未注入時回傳 undefined */
  async checkServices(): Promise<ServiceReport | undefined> {
    if (!this.services) return undefined;
    const { embedding, generator } = this.services;
    const [healthy, available] = await Promise.all([embedding.isHealthy(), generator.isAvailable()]);
    return {
      embedding: { provider: embedding.providerId, model: embedding.modelId, healthy },
      generation: { provider: generator.providerId, available },
    };
  }

  check(options: HealthCheckOptions = {}): HealthReport {
    const fixActions: string[] = [];

    const totalDocuments = (this.db.prepare('SELECT COUNT(*) AS cnt FROM documents').get() as { cnt: number }).cnt;
    const totalChunks = (this.db.prepare('SELECT COUNT(*) AS cnt FROM chunks').get() as { cnt: number }).cnt;

    const orphanedChunkIds = this.findOrphanedChunks();
    const orphanedVectorIds = this.findOrphanedVectors();
    const { chunkListMismatches, sequenceGaps } = this.checkChunkLists();
    const vectorIssues = this.checkVectors();

    if (options.fix) {
      if (orphanedChunkIds.length > 0) {
        this.deleteRows('chunks', 'chunk_id', orphanedChunkIds);
        fixActions.push(`Deleted ${orphanedChunkIds.length} orphaned chunks`);
      }
      if (orphanedVectorIds.length > 0) {
        this.deleteRows('chunk_vectors', 'chunk_id', orphanedVectorIds);
        fixActions.push(`Deleted ${orphanedVectorIds.length} orphaned chunk vectors`);
      }
    }

    const healthy = orphanedChunkIds.length === 0
      && orphanedVectorIds.length === 0
      && chunkListMismatches.length === 0
      && sequenceGaps.length === 0
      && vectorIssues.length === 0;

    return {
      healthy,
      totalDocuments,
      totalChunks,
      orphanedChunkIds,
      orphanedVectorIds,
      chunkListMismatches,
      sequenceGaps,
      vectorIssues,
      fixActions,
    };
  }

  /** 找出 document_id 不存在於 documents 表的 chunks */
  private findOrphanedChunks(): string[] {
    const rows = this.db.prepare(`
      SELECT c.chunk_id
      FROM chunks c
      LEFT JOIN documents d ON c.document_id = d.document_id
      WHERE d.document_id IS NULL
    `).all() as Array<{ chunk_id: string }>;
    return rows.map((r) => r.chunk_id);
  }

  private findOrphanedVectors(): string[] {
    const rows = this.db.prepare(`
      SELECT v.chunk_id
      FROM chunk_vectors v
      LEFT JOIN chunks c ON v.chunk_id = c.chunk_id
      WHERE c.chunk_id IS NULL
    `).all() as Array<{ chunk_id: string }>;
    return rows.map((r) => r.chunk_id);
  }

  private checkChunkLists(): { chunkListMismatches: string[]; sequenceGaps: string[] } {
    const chunkListMismatches: string[] = [];
    const sequenceGaps: string[] = [];

    const docs = this.db.prepare(
      'SELECT document_id, chunk_ids_json FROM documents'
    ).all() as Array<{ document_id: string; chunk_ids_json: string }>;
    const chunkStmt = this.db.prepare(
      'SELECT chunk_id, sequence_index FROM chunks WHERE document_id = ? ORDER BY sequence_index'
    );

    for (const doc of docs) {
      const listed = JSON.parse(doc.chunk_ids_json) as string[];
      const owned = chunkStmt.all(doc.document_id) as Array<{ chunk_id: string; sequence_index: number }>;

      if (listed.length !== owned.length || listed.some((id, i) => owned[i].chunk_id !== id)) {
        chunkListMismatches.push(`Document ${doc.document_id} lists ${listed.length} chunks but owns ${owned.length}`);
      }
      owned.forEach((c, i) => {
        if (c.sequence_index !== i) {
          sequenceGaps.push(`Document ${doc.document_id} expected sequence ${i}, found ${c.sequence_index}`);
        }
      });
    }
    return { chunkListMismatches, sequenceGaps };
  }

  /** 向量存在且位元組長度等於 dimension × 4 */
  private checkVectors(): string[] {
    const issues: string[] = [];
    const expectedBytes = this.dimension * 4;

    const docRows = this.db.prepare(`
      SELECT d.document_id AS id, length(v.embedding) AS bytes
      FROM documents d LEFT JOIN document_vectors v ON v.document_id = d.document_id
    `).all() as Array<{ id: string; bytes: number | null }>;
    const chunkRows = this.db.prepare(`
      SELECT c.chunk_id AS id, length(v.embedding) AS bytes
      FROM chunks c LEFT JOIN chunk_vectors v ON v.chunk_id = c.chunk_id
    `).all() as Array<{ id: string; bytes: number | null }>;

    for (const row of [...docRows, ...chunkRows]) {
      if (row.bytes === null) {
        issues.push(`${row.id} has no vector`);
      } else if (row.bytes !== expectedBytes) {
        issues.push(`${row.id} vector has ${row.bytes / 4} dimensions, expected ${this.dimension}`);
      }
    }
    return issues;
  }

  private deleteRows(table: 'chunks' | 'chunk_vectors', column: 'chunk_id', ids: string[]): void {
    const stmt = this.db.prepare(`DELETE FROM ${table} WHERE ${column} = ?`);
    const run = this.db.transaction(() => {
      for (const id of ids) stmt.run(id);
    });
    run();
  }
}
