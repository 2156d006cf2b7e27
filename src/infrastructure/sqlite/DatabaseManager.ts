import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { PRAGMA_SQL, SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';
import { Logger } from '../../shared/Logger.js';
import {
  DimensionMismatchError,
  EmbeddingModelMismatchError,
} from '../../domain/errors/DomainErrors.js';

export interface EmbeddingIdentity {
  dimension: number;
  modelId: string;
}

/**
 * SQLite 資料庫管理器
 *
 * 負責：初始化 DB、載入 sqlite-vec extension、執行 schema、
 * 記錄與驗證 embedding 維度及模型（避免兩個模型的向量混在同一個索引）。
 */
export class DatabaseManager {
  private db: Database.Database;
  private logger: Logger;

  constructor(
    private readonly dbPath: string,
    private readonly embedding: EmbeddingIdentity,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger('DatabaseManager');

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);

    // 載入 sqlite-vec extension（提供 vec_distance_cosine）
    this.db.loadExtension(sqliteVec.getLoadablePath());

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.db.prepare(
      "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('version', ?)"
    ).run(SCHEMA_VERSION);

    this.validateEmbeddingIdentity();

    this.logger.info('Database initialized', { dbPath, ...embedding });
  }

  getDb(): Database.Database {
    return this.db;
  }

  getPath(): string {
    return this.dbPath;
  }

  get dimension(): number {
    return this.embedding.dimension;
  }

  get modelId(): string {
    return this.embedding.modelId;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  /**
   * 記錄並驗證 embedding 維度與模型
   *
   * 首次使用時寫入 schema_meta；之後設定不同則拒絕開啟，提示重建索引。
   */
  private validateEmbeddingIdentity(): void {
    const readMeta = (key: string) => (this.db.prepare(
      'SELECT value FROM schema_meta WHERE key = ?'
    ).get(key) as { value: string } | undefined)?.value;
    const writeMeta = this.db.prepare(
      'INSERT OR REPLACE INTO schema_meta(key, value) VALUES(?, ?)'
    );

    const storedDimension = readMeta('embedding_dimension');
    const storedModel = readMeta('embedding_model');

    if (storedDimension === undefined) {
      writeMeta.run('embedding_dimension', String(this.embedding.dimension));
    } else if (parseInt(storedDimension, 10) !== this.embedding.dimension) {
      this.db.close();
      throw new DimensionMismatchError(parseInt(storedDimension, 10), this.embedding.dimension);
    }

    if (storedModel === undefined) {
      writeMeta.run('embedding_model', this.embedding.modelId);
    } else if (storedModel !== this.embedding.modelId) {
      this.db.close();
      throw new EmbeddingModelMismatchError(storedModel, this.embedding.modelId);
    }
  }
}
