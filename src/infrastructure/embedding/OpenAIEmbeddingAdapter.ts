import OpenAI from 'openai';
import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import {
  DimensionMismatchError,
  EmbeddingRateLimitError,
  EmbeddingUnavailableError,
} from '../../domain/errors/DomainErrors.js';
import { errorMessageOf, httpStatusOf } from '../../shared/HttpErrors.js';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  dimension?: number;
  baseUrl?: string;
  maxRetries?: number;
}

export class OpenAIEmbeddingAdapter implements EmbeddingPort {
  readonly providerId = 'openai';
  readonly dimension: number;
  readonly modelId: string;
  private client: OpenAI;

  constructor(config: OpenAIEmbeddingConfig) {
    this.dimension = config.dimension ?? 1536;
    this.modelId = config.model ?? 'text-embedding-3-small';
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: config.maxRetries ?? 2,
    });
  }

  async embed(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create({
        model: this.modelId,
        input: texts,
        encoding_format: 'float',
      });
    } catch (err) {
      if (httpStatusOf(err) === 429) {
        throw new EmbeddingRateLimitError('Rate limited by embedding provider', { cause: err });
      }
      throw new EmbeddingUnavailableError(`Embedding request failed: ${errorMessageOf(err)}`, { cause: err });
    }

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    return ordered.map((item) => {
      if (item.embedding.length !== this.dimension) {
        throw new DimensionMismatchError(this.dimension, item.embedding.length);
      }
      return {
        vector: new Float32Array(item.embedding),
        tokensUsed: response.usage?.total_tokens ?? 0,
      };
    });
  }

  async embedOne(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embed([text]);
    return result;
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.embed(['health check']);
      return true;
    } catch {
      return false;
    }
  }
}
