import type { FileType } from './Document.js';
import type { ChunkContentType } from './Chunk.js';

export interface ScoredDocument {
  documentId: string;
  sourcePath: string;
  fileType: FileType;
  summaryText: string;
  topics: string[];
  score: number;
}

export interface ScoredChunk {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  location: string;
  contentType: ChunkContentType;
  text: string;
  score: number;
}

export type SelectionKind = 'quota' | 'fill';

/** hybridSearch 的輸出：附帶文件排名與選取方式 */
export interface BalancedChunk extends ScoredChunk {
  /** 在 hybridSearch 結果中的名次（從 1 開始） */
  rank: number;
  /** 所屬文件在文件層搜尋中的名次（從 1 開始） */
  documentRank: number;
  selection: SelectionKind;
}

export interface HybridSearchResult {
  documents: ScoredDocument[];
  chunks: BalancedChunk[];
}

/** 各階段耗時（毫秒） */
export interface StageTiming {
  indexMs: number;
  searchMs: number;
  generationMs: number;
}
