import OpenAI from 'openai';
import type { GenerateOptions, GenerationPort } from '../../domain/ports/GenerationPort.js';
import {
  GenerationTimeoutError,
  RateLimitError,
  ServiceError,
} from '../../domain/errors/DomainErrors.js';
import { createTimeout } from '../../shared/Timeout.js';
import { errorMessageOf, httpStatusOf } from '../../shared/HttpErrors.js';
import { Logger } from '../../shared/Logger.js';

/**
 * HTTP Generation Adapter
 *
 * 透過 OpenAI-compatible chat completions 產生答案，
 * 支援任何相容 endpoint（OpenAI、Ollama、vLLM、LiteLLM 等）。
 * SDK 內建重試關閉，重試策略由呼叫端決定。
 */

export interface HttpGenerationConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

const SYSTEM_PROMPT =
  'You answer questions using only the document excerpts provided. ' +
  'Cite the source file name for every claim.';

export class HttpGenerationAdapter implements GenerationPort {
  readonly providerId = 'openai-compatible';
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(
    private readonly config: HttpGenerationConfig,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger('HttpGenerationAdapter');
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const timeout = createTimeout(options.timeoutMs, options.signal);
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          temperature: this.config.temperature ?? 0.2,
          max_tokens: this.config.maxTokens ?? 1500,
        },
        { signal: timeout.signal, maxRetries: 0 },
      );

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ServiceError('Generation returned an empty response');
      }
      return content;
    } catch (err) {
      throw this.mapError(err, timeout.timedOut(), options.timeoutMs);
    } finally {
      timeout.clear();
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.chat.completions.create({
        model: this.config.model,
        messages: [{ role: 'user', content: 'ping' }],
        max_tokens: 1,
      });
      return true;
    } catch (err) {
      this.logger.debug('Generation endpoint unavailable', { error: errorMessageOf(err) });
      return false;
    }
  }

  private mapError(err: unknown, timedOut: boolean, timeoutMs: number): Error {
    if (err instanceof ServiceError) return err;
    if (timedOut || (err instanceof Error && err.name === 'APIConnectionTimeoutError')) {
      return new GenerationTimeoutError(timeoutMs, { cause: err });
    }

    const status = httpStatusOf(err);
    if (status === 429) {
      return new RateLimitError('Generation rate limited', { cause: err });
    }
    this.logger.warn('Generation request failed', { status, error: errorMessageOf(err) });
    return new ServiceError(`Generation failed: ${errorMessageOf(err)}`, status, { cause: err });
  }
}
