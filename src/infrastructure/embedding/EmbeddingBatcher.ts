import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingRateLimitError } from '../../domain/errors/DomainErrors.js';
import { withRetry } from '../../shared/RetryPolicy.js';
import type { Logger } from '../../shared/Logger.js';

/**
 * 將大量文字拆成批次送入 EmbeddingPort
 * 處理 rate limiting 與批次大小限制，批次之間檢查取消
 */
export class EmbeddingBatcher {
  constructor(
    private readonly provider: EmbeddingPort,
    private readonly maxBatchSize: number = 100,
    private readonly logger?: Logger,
  ) {}

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    const results: EmbeddingResult[] = [];
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      signal?.throwIfAborted();
      const batch = texts.slice(i, i + this.maxBatchSize);
      const batchResults = await withRetry(() => this.provider.embed(batch), {
        maxRetries: 3,
        baseDelayMs: 1000,
        isRetryable: (err) => err instanceof EmbeddingRateLimitError,
        onRetry: (attempt) => this.logger?.warn('Embedding rate limited, retrying', { attempt, batchStart: i }),
        signal,
      });
      if (batchResults.length !== batch.length) {
        throw new Error(`Embedding provider returned ${batchResults.length} vectors for ${batch.length} texts`);
      }
      results.push(...batchResults);
    }
    return results;
  }
}
