import type { StageTiming } from '../entities/SearchResult.js';

export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 crossdoc domain 錯誤的基底類別 */
export abstract class CrossdocError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** 可重試的錯誤（分類為 retryable） */
export function isRetryableError(err: unknown): boolean {
  return err instanceof CrossdocError && err.classification === 'retryable';
}

// --- Retryable ---

export class EmbeddingRateLimitError extends CrossdocError {
  readonly classification = 'retryable' as const;
  readonly code = 'EMBEDDING_RATE_LIMIT';
  readonly maxRetries = 3;
  readonly baseDelayMs = 1000;
}

export class RateLimitError extends CrossdocError {
  readonly classification = 'retryable' as const;
  readonly code = 'GENERATION_RATE_LIMIT';
}

export class GenerationTimeoutError extends CrossdocError {
  readonly classification = 'retryable' as const;
  readonly code = 'GENERATION_TIMEOUT';

  constructor(
    public readonly timeoutMs: number,
    options?: ErrorOptions,
  ) {
    super(`Generation timed out after ${timeoutMs}ms`, options);
  }
}

const TRANSIENT_STATUS = new Set([500, 502, 503, 504]);

/** 生成服務回傳錯誤；只有暫時性的 5xx 可重試 */
export class ServiceError extends CrossdocError {
  readonly code = 'GENERATION_SERVICE';
  readonly classification: ErrorClassification;

  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.classification = status !== undefined && TRANSIENT_STATUS.has(status) ? 'retryable' : 'manual';
  }
}

// --- Degradable（單一檔案失敗，略過並回報） ---

export class UnsupportedTypeError extends CrossdocError {
  readonly classification = 'degradable' as const;
  readonly code = 'UNSUPPORTED_TYPE';

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Unsupported file type: ${filePath}`, options);
  }
}

export class CorruptInputError extends CrossdocError {
  readonly classification = 'degradable' as const;
  readonly code = 'CORRUPT_INPUT';

  constructor(
    public readonly filePath: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot extract content from ${filePath}: ${detail}`, options);
  }
}

export class FileNotFoundError extends CrossdocError {
  readonly classification = 'degradable' as const;
  readonly code = 'FILE_NOT_FOUND';

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`File not found: ${filePath}`, options);
  }
}

export class FilePermissionError extends CrossdocError {
  readonly classification = 'degradable' as const;
  readonly code = 'FILE_PERMISSION';

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Permission denied: ${filePath}`, options);
  }
}

export class EmbeddingUnavailableError extends CrossdocError {
  readonly classification = 'degradable' as const;
  readonly code = 'EMBEDDING_UNAVAILABLE';
}

// --- Manual ---

export class DimensionMismatchError extends CrossdocError {
  readonly classification = 'manual' as const;
  readonly code = 'DIMENSION_MISMATCH';

  constructor(
    public readonly expected: number,
    public readonly actual: number,
    options?: ErrorOptions,
  ) {
    super(`Vector dimension mismatch: index uses ${expected}, got ${actual}`, options);
  }
}

export class EmbeddingModelMismatchError extends CrossdocError {
  readonly classification = 'manual' as const;
  readonly code = 'EMBEDDING_MODEL_MISMATCH';

  constructor(
    public readonly storedModel: string,
    public readonly requestedModel: string,
    options?: ErrorOptions,
  ) {
    super(
      `Index was built with embedding model "${storedModel}" but "${requestedModel}" is configured. Rebuild the index or restore the model setting.`,
      options,
    );
  }
}

export class EmptyIndexError extends CrossdocError {
  readonly classification = 'manual' as const;
  readonly code = 'EMPTY_INDEX';

  constructor(options?: ErrorOptions) {
    super('The index contains no documents', options);
  }
}

export class NoDocumentsIndexedError extends CrossdocError {
  readonly classification = 'manual' as const;
  readonly code = 'NO_DOCUMENTS';

  constructor(options?: ErrorOptions) {
    super('No documents are indexed. Add documents first.', options);
  }
}

export class DocumentNotFoundError extends CrossdocError {
  readonly classification = 'manual' as const;
  readonly code = 'DOCUMENT_NOT_FOUND';

  constructor(
    public readonly documentId: string,
    options?: ErrorOptions,
  ) {
    super(`Document not found: ${documentId}`, options);
  }
}

/** 檢索已完成但生成失敗時拋出；保留組好的 context 與引用 */
export class GenerationError extends CrossdocError {
  readonly classification = 'manual' as const;
  readonly code = 'GENERATION_FAILED';

  constructor(
    message: string,
    public readonly context: string,
    public readonly citations: string[],
    public readonly timing: StageTiming,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}
