import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HttpGenerationAdapter } from '../../../../src/infrastructure/generation/HttpGenerationAdapter.js';
import {
  GenerationTimeoutError,
  RateLimitError,
  ServiceError,
  isRetryableError,
} from '../../../../src/domain/errors/DomainErrors.js';

const mocks = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => ({
  default: class MockOpenAI {
    chat = { completions: { create: mocks.create } };
  },
}));

function completion(content: string | null) {
  return { choices: [{ message: { content } }] };
}

function apiError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

/**
 * Feature: OpenAI-compatible 答案生成
 *
 * 作為搜尋流程，我需要把組好的 prompt 送到生成服務並取得答案，
 * 失敗時依錯誤類型決定是否重試。
 */
describe('HttpGenerationAdapter', () => {
  let adapter: HttpGenerationAdapter;

  beforeEach(() => {
    mocks.create.mockReset();
    adapter = new HttpGenerationAdapter({
      baseUrl: 'http://localhost:11434/v1',
      model: 'test-model',
    });
  });

  /**
   * Scenario: 正常生成
   * Given 服務回傳含前後空白的答案
   * When 呼叫 generate
   * Then 回傳去除空白的答案，且 SDK 重試關閉
   */
  it('should return the trimmed answer', async () => {
    mocks.create.mockResolvedValue(completion('  Paris is the capital of France.  '));

    const answer = await adapter.generate('What is the capital of France?', { timeoutMs: 5000 });

    expect(answer).toBe('Paris is the capital of France.');
    const [body, requestOptions] = mocks.create.mock.calls[0] ?? [];
    expect(body).toMatchObject({
      model: 'test-model',
      temperature: 0.2,
      max_tokens: 1500,
      messages: [
        { role: 'system' },
        { role: 'user', content: 'What is the capital of France?' },
      ],
    });
    expect(requestOptions).toMatchObject({ maxRetries: 0 });
  });

  it('should reject an empty answer as a non-retryable ServiceError', async () => {
    mocks.create.mockResolvedValue(completion('   '));

    const err = await adapter.generate('q', { timeoutMs: 5000 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceError);
    expect(err).toHaveProperty('message', 'Generation returned an empty response');
    expect(isRetryableError(err)).toBe(false);
  });

  it('should map HTTP 429 to RateLimitError', async () => {
    mocks.create.mockRejectedValue(apiError(429, 'Too Many Requests'));

    await expect(adapter.generate('q', { timeoutMs: 5000 })).rejects.toBeInstanceOf(RateLimitError);
  });

  /**
   * Scenario: 5xx 可重試、4xx 不可
   */
  it('should classify transient server errors as retryable', async () => {
    mocks.create.mockRejectedValueOnce(apiError(503, 'unavailable'));
    const transient = await adapter.generate('q', { timeoutMs: 5000 }).catch((e: unknown) => e);

    mocks.create.mockRejectedValueOnce(apiError(400, 'bad request'));
    const permanent = await adapter.generate('q', { timeoutMs: 5000 }).catch((e: unknown) => e);

    expect(transient).toBeInstanceOf(ServiceError);
    expect(transient).toHaveProperty('status', 503);
    expect(isRetryableError(transient)).toBe(true);
    expect(permanent).toHaveProperty('message', 'Generation failed: bad request');
    expect(isRetryableError(permanent)).toBe(false);
  });

  /**
   * Scenario: 逾時
   * Given 服務不回應，直到 signal 中止
   * When 以 20ms 逾時呼叫 generate
   * Then 拋出 GenerationTimeoutError
   */
  it('should raise GenerationTimeoutError when the deadline passes', async () => {
    mocks.create.mockImplementation((_body: unknown, opts: { signal: AbortSignal }) =>
      new Promise((_resolve, reject) => {
        opts.signal.addEventListener('abort', () => reject(new Error('Request was aborted.')));
      }));

    const err = await adapter.generate('q', { timeoutMs: 20 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationTimeoutError);
    expect(err).toHaveProperty('message', 'Generation timed out after 20ms');
  });

  it('should treat the SDK connection timeout as a timeout', async () => {
    const sdkTimeout = Object.assign(new Error('Request timed out.'), { name: 'APIConnectionTimeoutError' });
    mocks.create.mockRejectedValue(sdkTimeout);

    await expect(adapter.generate('q', { timeoutMs: 5000 })).rejects.toBeInstanceOf(GenerationTimeoutError);
  });

  it('should report availability', async () => {
    mocks.create.mockResolvedValueOnce(completion('pong'));
    expect(await adapter.isAvailable()).toBe(true);

    mocks.create.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    expect(await adapter.isAvailable()).toBe(false);
  });
});
