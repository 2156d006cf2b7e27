import type { AnalysisDepth } from '../../domain/value-objects/AnalysisDepth.js';

/** 問答請求 */
export interface SearchRequest {
  question: string;
  depth?: AnalysisDepth;
  /** 只同步這些檔案；未指定時同步整個文件集合 */
  sourcePaths?: string[];
  /** 略過查詢前的索引同步 */
  skipFreshness?: boolean;
  signal?: AbortSignal;
}
