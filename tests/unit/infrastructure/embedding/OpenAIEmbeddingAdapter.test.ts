import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OpenAIEmbeddingAdapter } from '../../../../src/infrastructure/embedding/OpenAIEmbeddingAdapter.js';
import {
  DimensionMismatchError,
  EmbeddingRateLimitError,
  EmbeddingUnavailableError,
} from '../../../../src/domain/errors/DomainErrors.js';

const mocks = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => ({
  default: class MockOpenAI {
    embeddings = { create: mocks.create };
  },
}));

function apiError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

describe('OpenAIEmbeddingAdapter', () => {
  let adapter: OpenAIEmbeddingAdapter;

  beforeEach(() => {
    mocks.create.mockReset();
    adapter = new OpenAIEmbeddingAdapter({ apiKey: 'test-secret', model: 'test-embed', dimension: 3 });
  });

  /**
   * Scenario: 依 index 排序回傳
   * Given API 回傳的 data 順序與輸入不同
   * When 呼叫 embed
   * Then 結果依輸入順序排列
   */
  it('should order vectors by their input index', async () => {
    mocks.create.mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1, 0] },
        { index: 0, embedding: [1, 0, 0] },
      ],
      usage: { total_tokens: 7 },
    });

    const results = await adapter.embed(['first', 'second']);

    expect(Array.from(results[0]?.vector ?? [])).toEqual([1, 0, 0]);
    expect(Array.from(results[1]?.vector ?? [])).toEqual([0, 1, 0]);
    expect(results[0]?.tokensUsed).toBe(7);
    expect(mocks.create).toHaveBeenCalledWith({
      model: 'test-embed',
      input: ['first', 'second'],
      encoding_format: 'float',
    });
  });

  it('should skip the request for empty input', async () => {
    expect(await adapter.embed([])).toEqual([]);
    expect(mocks.create).not.toHaveBeenCalled();
  });

  it('should map HTTP 429 to EmbeddingRateLimitError', async () => {
    mocks.create.mockRejectedValue(apiError(429, 'Too Many Requests'));

    await expect(adapter.embed(['x'])).rejects.toBeInstanceOf(EmbeddingRateLimitError);
  });

  it('should map other failures to EmbeddingUnavailableError', async () => {
    mocks.create.mockRejectedValue(apiError(500, 'boom'));

    await expect(adapter.embed(['x'])).rejects.toThrow('Embedding request failed: boom');
    await expect(adapter.embed(['x'])).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });

  it('should reject vectors of the wrong dimension', async () => {
    mocks.create.mockResolvedValue({ data: [{ index: 0, embedding: [1, 0] }] });

    await expect(adapter.embed(['x'])).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it('should report health from a test request', async () => {
    mocks.create.mockResolvedValueOnce({ data: [{ index: 0, embedding: [1, 0, 0] }] });
    expect(await adapter.isHealthy()).toBe(true);

    mocks.create.mockRejectedValueOnce(apiError(401, 'unauthorized'));
    expect(await adapter.isHealthy()).toBe(false);
  });
});
