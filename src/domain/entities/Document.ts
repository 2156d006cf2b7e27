import type { ChunkContentType } from './Chunk.js';

export type FileType =
  | 'pdf'
  | 'text'
  | 'tabular'
  | 'spreadsheet'
  | 'word'
  | 'structured_record';

export const FILE_TYPES: readonly FileType[] = [
  'pdf', 'text', 'tabular', 'spreadsheet', 'word', 'structured_record',
];

/** 章節標題（含層級，1 為最上層） */
export interface Heading {
  text: string;
  level: number;
}

/** 內容標記：表格、圖片引用、參考文獻 */
export interface ContentMarkers {
  tables: string[];
  figures: string[];
  hasReferences: boolean;
}

export interface PageStructure {
  pageNumber: number;
  headings: Heading[];
  markers: ContentMarkers;
  paragraphCount: number;
  contentType: ChunkContentType;
}

export type ColumnDataType = 'numeric' | 'boolean' | 'categorical' | 'empty';

/** 欄位剖析結果 */
export interface ColumnProfile {
  name: string;
  dataType: ColumnDataType;
  distinctCount: number;
  min?: number;
  max?: number;
  mean?: number;
}

export interface SheetStructure {
  name: string;
  rowCount: number;
  columns: ColumnProfile[];
}

/** 依檔案類型而異的原始結構 */
export type DocumentStructure =
  | { kind: 'pdf'; pageCount: number; pages: PageStructure[] }
  | { kind: 'text'; lineCount: number; headings: Heading[]; markers: ContentMarkers; frontmatter: Record<string, unknown> }
  | { kind: 'tabular'; delimiter: string; rowCount: number; columns: ColumnProfile[] }
  | { kind: 'spreadsheet'; sheets: SheetStructure[] }
  | {
    kind: 'word';
    headings: Heading[];
    paragraphCount: number;
    listItemCount: number;
    tableCount: number;
    styleCounts: Record<string, number>;
  }
  | {
    kind: 'structured_record';
    rootType: 'object' | 'array' | 'scalar';
    topLevelKeys: string[];
    itemCount: number;
    nestingDepth: number;
    keyPaths: Record<string, string>;
  };

export interface Document {
  documentId: string;
  sourcePath: string;
  fileType: FileType;
  contentHash: string;
  fileSize: number;
  structure: DocumentStructure;
  summaryText: string;
  summaryVector: Float32Array;
  topics: string[];
  /** 依 sequenceIndex 排序 */
  chunkIds: string[];
  indexedAt: number;
}
