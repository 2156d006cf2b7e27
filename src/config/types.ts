import type { LogLevel } from '../shared/Logger.js';
import type { DepthTable } from '../domain/value-objects/AnalysisDepth.js';

/** 文件集合設定 */
export interface CollectionConfig {
  /** 文件根目錄（相對於 repo root） */
  root: string;
}

/** 索引路徑設定 */
export interface IndexPathConfig {
  dbPath: string;
}

/** Embedding 提供者設定 */
export interface EmbeddingConfig {
  /** 'openai'：OpenAI-compatible API；'local'：離線的 feature hashing */
  provider: 'openai' | 'local';
  model: string;
  dimension: number;
  maxBatchSize: number;
  apiKey?: string;
  baseUrl?: string;
}

/** 文件分析與切塊設定 */
export interface AnalysisConfig {
  /** 文字類 chunk 的目標字元數 */
  targetChunkChars: number;
  /** 表格類每個 chunk 的資料列數 */
  tabularRowsPerChunk: number;
  /** 無標題的 word 文件每個 chunk 的段落數 */
  wordParagraphsPerChunk: number;
  /** 結構化紀錄每個 chunk 的字元上限 */
  structuredChunkChars: number;
  /** 摘要字元上限 */
  summaryMaxChars: number;
  /** 摘要引用前幾個 chunk */
  summaryLeadChunks: number;
  maxTopics: number;
}

/** 搜尋設定 */
export interface SearchConfig {
  depths: DepthTable;
  /** chunk 候選數 = candidateMultiplier × numChunks */
  candidateMultiplier: number;
  /** 組給 LLM 的 context 字元上限 */
  maxContextChars: number;
  /** context 中每份文件摘要的字元上限 */
  summaryCharsInContext: number;
  /** 查詢前先同步索引 */
  ensureFreshBeforeQuery: boolean;
}

/** LLM 設定 */
export interface LLMConfig {
  /** LLM 提供者：'openai-compatible' 或 'none'（停用） */
  provider: 'openai-compatible' | 'none';
  /** API base URL（OpenAI-compatible endpoint） */
  baseUrl: string;
  /** API key（可選，某些本地服務不需要） */
  apiKey?: string;
  model: string;
  timeoutMs: number;
  /** 可重試錯誤的重試次數（總嘗試次數 = 1 + maxRetries） */
  maxRetries: number;
  retryBaseDelayMs: number;
  temperature: number;
  maxTokens: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface CrossdocConfig {
  version: number;
  collection: CollectionConfig;
  index: IndexPathConfig;
  embedding: EmbeddingConfig;
  analysis: AnalysisConfig;
  search: SearchConfig;
  llm: LLMConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof CrossdocConfig]?: CrossdocConfig[K] extends object
    ? DeepPartial<CrossdocConfig[K]>
    : CrossdocConfig[K];
};

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};
