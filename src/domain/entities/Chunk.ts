export type ChunkContentType =
  | 'table'
  | 'figure_reference'
  | 'summary_section'
  | 'short_text'
  | 'body_text'
  | 'tabular_data'
  | 'structured_data';

export interface Chunk {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  /** 人類可讀的位置，例如 "page 3"、"rows 21-40" */
  location: string;
  contentType: ChunkContentType;
  text: string;
  textHash: string;
  vector: Float32Array;
  prevId: string | null;
  nextId: string | null;
}
