import type { FileType } from '../../domain/entities/Document.js';
import type { BalancedChunk, StageTiming } from '../../domain/entities/SearchResult.js';
import type { AnalysisDepth } from '../../domain/value-objects/AnalysisDepth.js';
import type { IndexReport } from './IndexReport.js';

/** 被引用的文件：其 chunk 確實出現在送給模型的 context 中 */
export interface Citation {
  documentId: string;
  sourcePath: string;
  fileType: FileType;
  locations: string[];
}

/** 問答回應 */
export interface SearchResponse {
  question: string;
  depth: AnalysisDepth;
  answer: string;
  /** 引用的文件 id，依 context 中出現的順序 */
  citations: string[];
  citedDocuments: Citation[];
  perDocumentChunkCounts: Record<string, number>;
  /** 實際放進 context 的 chunk（依平衡選取順序） */
  chunks: BalancedChunk[];
  context: string;
  timing: StageTiming;
  indexReport?: IndexReport;
  warnings: string[];
}
