import type { Document, FileType } from '../entities/Document.js';
import type { Chunk } from '../entities/Chunk.js';
import type { AnalyzedDocument } from './DocumentAnalyzerPort.js';
import type {
  HybridSearchResult,
  ScoredChunk,
  ScoredDocument,
} from '../entities/SearchResult.js';

export type UpsertOutcome = 'inserted' | 'replaced' | 'unchanged';

export interface DocumentListing {
  documentId: string;
  sourcePath: string;
  fileType: FileType;
  contentHash: string;
  topics: string[];
  chunkCount: number;
  indexedAt: number;
}

export interface StoreStats {
  totalDocuments: number;
  totalChunks: number;
  typesBreakdown: Partial<Record<FileType, number>>;
  dimension: number;
  modelId: string;
}

export interface VectorStorePort {
  readonly dimension: number;

  upsert(analyzed: AnalyzedDocument): UpsertOutcome;
  remove(documentId: string): boolean;

  getContentHash(documentId: string): string | undefined;
  getDocument(documentId: string): Document | undefined;
  getDocumentBySource(sourcePath: string): DocumentListing | undefined;
  listDocuments(): DocumentListing[];
  getChunks(chunkIds: string[]): Chunk[];
  stats(): StoreStats;

  searchDocuments(queryVector: Float32Array, topK: number): ScoredDocument[];
  searchChunks(queryVector: Float32Array, topK: number, documentIds?: string[]): ScoredChunk[];
  hybridSearch(queryVector: Float32Array, numDocuments: number, numChunks: number): HybridSearchResult;

  save(): void;
  saveTo(destPath: string): Promise<void>;
  teardown(): void;
}
