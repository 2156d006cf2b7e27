/**
 * 語言模型生成介面
 *
 * 設計意圖：SearchUseCase 只知道「給 prompt、拿回文字」，
 * 逾時與取消由呼叫端透過 options 傳入。
 */

export interface GenerateOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface GenerationPort {
  readonly providerId: string;

  /**
   * @throws RateLimitError / GenerationTimeoutError / ServiceError
   */
  generate(prompt: string, options: GenerateOptions): Promise<string>;

  isAvailable(): Promise<boolean>;
}
