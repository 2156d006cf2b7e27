export interface EmbeddingResult {
  vector: Float32Array;
  tokensUsed: number;
}

/** 文字嵌入介面；索引與查詢必須使用同一個實作 */
export interface EmbeddingPort {
  readonly providerId: string;
  readonly dimension: number;
  readonly modelId: string;
  embed(texts: string[]): Promise<EmbeddingResult[]>;
  embedOne(text: string): Promise<EmbeddingResult>;
  isHealthy(): Promise<boolean>;
}
