import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/** 32-bit FNV-1a */
function fnv1a(text: string, seed = 0x811c9dc5): number {
  let hash = seed;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * 離線 embedding：詞與相鄰詞組的 feature hashing，L2 正規化
 *
 * 同樣的文字永遠得到同樣的向量；向量永不全為零（空字串也有固定向量）。
 */
export class HashingEmbeddingAdapter implements EmbeddingPort {
  readonly providerId = 'local';
  readonly modelId: string;

  constructor(readonly dimension: number = 384) {
    this.modelId = `feature-hashing-${dimension}`;
  }

  async embed(texts: string[]): Promise<EmbeddingResult[]> {
    return texts.map((text) => this.vectorize(text));
  }

  async embedOne(text: string): Promise<EmbeddingResult> {
    return this.vectorize(text);
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  private vectorize(text: string): EmbeddingResult {
    const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
    const features = tokens.length > 0 ? [...tokens] : ['\u0000empty'];
    for (let i = 0; i + 1 < tokens.length; i++) {
      features.push(`${tokens[i]} ${tokens[i + 1]}`);
    }

    const vector = new Float32Array(this.dimension);
    for (const feature of features) {
      const h = fnv1a(feature);
      const sign = (fnv1a(feature, 0x9747b28c) & 1) === 0 ? 1 : -1;
      vector[h % this.dimension] += sign;
    }

    let norm = 0;
    for (const v of vector) norm += v * v;
    if (norm === 0) {
      // 正負抵銷成全零時退回固定方向
      vector[fnv1a(text) % this.dimension] = 1;
      norm = 1;
    }
    const scale = 1 / Math.sqrt(norm);
    for (let i = 0; i < vector.length; i++) vector[i] *= scale;

    return { vector, tokensUsed: tokens.length };
  }
}
