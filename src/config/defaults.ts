import type { CrossdocConfig } from './types.js';
import { DEFAULT_DEPTHS } from '../domain/value-objects/AnalysisDepth.js';

export const DEFAULT_CONFIG: CrossdocConfig = {
  version: 1,
  collection: {
    root: 'documents',
  },
  index: {
    dbPath: '.crossdoc/index.db',
  },
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    dimension: 1536,
    maxBatchSize: 100,
  },
  analysis: {
    targetChunkChars: 1000,
    tabularRowsPerChunk: 20,
    wordParagraphsPerChunk: 8,
    structuredChunkChars: 1500,
    summaryMaxChars: 2000,
    summaryLeadChunks: 3,
    maxTopics: 20,
  },
  search: {
    depths: DEFAULT_DEPTHS,
    candidateMultiplier: 3,
    maxContextChars: 6000,
    summaryCharsInContext: 500,
    ensureFreshBeforeQuery: true,
  },
  llm: {
    provider: 'none',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    timeoutMs: 60000,
    maxRetries: 2,
    retryBaseDelayMs: 1000,
    temperature: 0.2,
    maxTokens: 1500,
  },
  logging: {
    level: 'info',
  },
};
