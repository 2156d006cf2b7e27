import { describe, it, expect } from 'vitest';
import { ProgressiveDisclosureFormatter } from '../../../src/cli/formatters/ProgressiveDisclosureFormatter.js';
import type { SearchResponse } from '../../../src/application/dto/SearchResponse.js';
import { GenerationError } from '../../../src/domain/errors/DomainErrors.js';

const response: SearchResponse = {
  question: 'capitals?',
  depth: 'quick',
  answer: 'Paris and Tokyo.',
  citations: ['doc_a', 'doc_b'],
  citedDocuments: [
    { documentId: 'doc_a', sourcePath: '/c/france.txt', fileType: 'text', locations: ['lines 1-2'] },
    { documentId: 'doc_b', sourcePath: '/c/japan.pdf', fileType: 'pdf', locations: ['page 1', 'page 3'] },
  ],
  perDocumentChunkCounts: { doc_a: 1, doc_b: 2 },
  chunks: [],
  context: 'CONTEXT',
  timing: { indexMs: 5, searchMs: 7, generationMs: 11 },
  warnings: ['Skipped /c/bad.pdf: corrupt'],
};

describe('ProgressiveDisclosureFormatter', () => {
  const formatter = new ProgressiveDisclosureFormatter();

  it('should print only the answer and file names at brief level', () => {
    expect(formatter.formatAnswer(response, 'text', 'brief')).toBe(
      'Paris and Tokyo.\n\nSources:\n  - france.txt\n  - japan.pdf',
    );
  });

  it('should add excerpt counts, timing and warnings at normal level', () => {
    expect(formatter.formatAnswer(response, 'text', 'normal')).toBe([
      'Paris and Tokyo.',
      '',
      'Sources:',
      '  - france.txt (text, 1 excerpt): lines 1-2',
      '  - japan.pdf (pdf, 2 excerpts): page 1, page 3',
      '',
      'Depth: quick | index 5ms | search 7ms | generation 11ms',
      'Warning: Skipped /c/bad.pdf: corrupt',
    ].join('\n'));
  });

  it('should append the context at full level', () => {
    expect(formatter.formatAnswer(response, 'text', 'full').endsWith('--- context ---\nCONTEXT')).toBe(true);
  });

  it('should keep brief JSON to the answer and citations', () => {
    expect(JSON.parse(formatter.formatAnswer(response, 'json', 'brief'))).toEqual({
      question: 'capitals?',
      depth: 'quick',
      answer: 'Paris and Tokyo.',
      citations: ['/c/france.txt', '/c/japan.pdf'],
    });
  });

  it('should fall back to the retrieved excerpts when generation failed', () => {
    const err = new GenerationError('Answer generation failed: offline', 'CONTEXT', ['doc_a'], response.timing);

    expect(formatter.formatFallback(err, 'text')).toBe(
      'Answer generation failed: offline\nRelevant excerpts from the indexed documents:\n\nCONTEXT',
    );
  });
});
