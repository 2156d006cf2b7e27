import type { Document } from '../entities/Document.js';
import type { Chunk } from '../entities/Chunk.js';

export interface AnalyzedDocument {
  document: Document;
  chunks: Chunk[];
}

export interface DocumentAnalyzerPort {
  /** 副檔名白名單（含開頭的點） */
  readonly supportedExtensions: readonly string[];

  /**
   * @throws UnsupportedTypeError / CorruptInputError
   */
  analyzeBytes(filePath: string, bytes: Uint8Array, signal?: AbortSignal): Promise<AnalyzedDocument>;
}
