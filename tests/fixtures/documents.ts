import path from 'node:path';
import { vi } from 'vitest';
import type { AnalyzedDocument } from '../../src/domain/ports/DocumentAnalyzerPort.js';
import type { FileType } from '../../src/domain/entities/Document.js';
import type { Chunk, ChunkContentType } from '../../src/domain/entities/Chunk.js';
import type { EmbeddingPort } from '../../src/domain/ports/EmbeddingPort.js';
import type { GenerationPort } from '../../src/domain/ports/GenerationPort.js';
import { ContentHash } from '../../src/domain/value-objects/ContentHash.js';
import { chunkIdFor, documentIdFor } from '../../src/domain/value-objects/Identifiers.js';

export interface ChunkSpec {
  text: string;
  vector: number[];
  location?: string;
  contentType?: ChunkContentType;
}

export interface DocumentSpec {
  sourcePath: string;
  fileType?: FileType;
  contentHash?: string;
  summaryText?: string;
  summaryVector: number[];
  topics?: string[];
  chunks: ChunkSpec[];
}

/** 直接組出已分析的文件，不經過 analyzer 與 embedder */
export function analyzedDocument(input: DocumentSpec): AnalyzedDocument {
  const documentId = documentIdFor(input.sourcePath);
  const chunkIds = input.chunks.map((c, i) => chunkIdFor(documentId, i, c.text));

  const chunks: Chunk[] = input.chunks.map((c, i) => ({
    chunkId: chunkIds[i],
    documentId,
    sequenceIndex: i,
    location: c.location ?? `section ${i + 1}`,
    contentType: c.contentType ?? 'body_text',
    text: c.text,
    textHash: ContentHash.fromText(c.text).value,
    vector: new Float32Array(c.vector),
    prevId: i > 0 ? chunkIds[i - 1] : null,
    nextId: i < chunkIds.length - 1 ? chunkIds[i + 1] : null,
  }));

  return {
    document: {
      documentId,
      sourcePath: path.resolve(input.sourcePath),
      fileType: input.fileType ?? 'text',
      contentHash: input.contentHash ?? ContentHash.fromText(input.chunks.map((c) => c.text).join('\n')).value,
      fileSize: 100,
      structure: {
        kind: 'text',
        lineCount: input.chunks.length,
        headings: [],
        markers: { tables: [], figures: [], hasReferences: false },
        frontmatter: {},
      },
      summaryText: input.summaryText ?? input.chunks.map((c) => c.text).join(' '),
      summaryVector: new Float32Array(input.summaryVector),
      topics: input.topics ?? [],
      chunkIds,
      indexedAt: 1_700_000_000_000,
    },
    chunks,
  };
}

/** 兩個國家的文件與一份無關的表格，4 維向量 */
export function countryCollection(root: string): AnalyzedDocument[] {
  return [
    analyzedDocument({
      sourcePath: path.join(root, 'france.txt'),
      summaryText: 'France overview: capital Paris, wine regions.',
      summaryVector: [1, 0, 0, 0],
      topics: ['france', 'paris'],
      chunks: [
        { text: 'Paris is the capital of France.', vector: [1, 0.2, 0, 0], location: 'lines 1-2' },
        { text: 'France is known for its wine regions.', vector: [0.8, 0, 0.6, 0], location: 'lines 3-4' },
      ],
    }),
    analyzedDocument({
      sourcePath: path.join(root, 'japan.txt'),
      summaryText: 'Japan overview: capital Tokyo, many islands.',
      summaryVector: [0, 1, 0, 0],
      topics: ['japan', 'tokyo'],
      chunks: [
        { text: 'Tokyo is the capital of Japan.', vector: [0.2, 1, 0, 0], location: 'lines 1-2' },
        { text: 'Japan is made up of many islands.', vector: [0, 0.8, 0, 0.6], location: 'lines 3-4' },
      ],
    }),
    analyzedDocument({
      sourcePath: path.join(root, 'budget.csv'),
      fileType: 'tabular',
      summaryText: 'Quarterly budget figures.',
      summaryVector: [0, 0, 0, 1],
      topics: ['budget'],
      chunks: [
        { text: 'quarter,amount\nQ1,100', vector: [0, 0, 1, 0], location: 'rows 1-1', contentType: 'tabular_data' },
      ],
    }),
  ];
}

/** 對任何文字都回傳同一個向量的 embedder */
export function fixedEmbedding(vector: number[]): EmbeddingPort {
  return {
    providerId: 'fixed',
    dimension: vector.length,
    modelId: `fixed-${vector.length}`,
    embed: vi.fn(async (texts: string[]) => texts.map(() => ({ vector: new Float32Array(vector), tokensUsed: 1 }))),
    embedOne: vi.fn(async () => ({ vector: new Float32Array(vector), tokensUsed: 1 })),
    isHealthy: vi.fn(async () => true),
  };
}

export function fakeGenerator(generate: GenerationPort['generate']): GenerationPort {
  return {
    providerId: 'fake',
    generate: vi.fn(generate),
    isAvailable: vi.fn(async () => true),
  };
}
