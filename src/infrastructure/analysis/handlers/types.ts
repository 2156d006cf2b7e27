import type { ChunkContentType } from '../../../domain/entities/Chunk.js';
import type { DocumentStructure, FileType } from '../../../domain/entities/Document.js';
import type { AnalysisConfig } from '../../../config/types.js';

/** 尚未嵌入、尚未編號的 chunk */
export interface RawChunk {
  text: string;
  location: string;
  contentType: ChunkContentType;
}

export interface HandlerOutput {
  structure: DocumentStructure;
  chunks: RawChunk[];
  /** 摘要與主題使用的標題文字 */
  headings: string[];
  /** 摘要中的類型統計行，例如 "Rows: 100 | Columns: 4" */
  statsLine: string;
}

export interface HandlerContext {
  filePath: string;
  options: AnalysisConfig;
}

export type FileHandler = (bytes: Uint8Array, ctx: HandlerContext) => Promise<HandlerOutput>;

export type HandlerRegistry = Record<FileType, FileHandler>;
