import { describe, it, expect } from 'vitest';
import { TopicExtractor } from '../../../../src/infrastructure/analysis/TopicExtractor.js';
import { buildSummary } from '../../../../src/infrastructure/analysis/SummaryBuilder.js';

describe('TopicExtractor', () => {
  it('should put short heading phrases first, then frequent terms', () => {
    const topics = new TopicExtractor(20).extract(
      ['Introduction', 'Results and Discussion', 'A Very Long Heading With Many Words', 'the'],
      ['Revenue grew. Revenue fell. Margins improved.'],
    );

    expect(topics).toEqual([
      'introduction',
      'results and discussion',
      'revenue',
      'discussion',
      'heading',
      'improved',
      'margins',
      'results',
      'words',
    ]);
  });

  it('should skip stop words and respect the topic limit', () => {
    expect(new TopicExtractor(20).extract([], ['because because because window'])).toEqual(['window']);
    expect(new TopicExtractor(2).extract([], ['alpha alpha bravo charlie'])).toEqual(['alpha', 'bravo']);
  });
});

describe('buildSummary', () => {
  const input = {
    filePath: '/data/report.csv',
    fileType: 'tabular' as const,
    headings: ['id', 'name'],
    statsLine: 'Rows: 2 | Columns: x',
    chunkTexts: ['c1', 'c2', 'c3', 'c4'],
  };

  it('should combine name, sections, stats and the lead chunks', () => {
    expect(buildSummary(input, { leadChunks: 3, maxChars: 2000 })).toBe(
      'report.csv (tabular)\nSections: id; name\nRows: 2 | Columns: x\n\nc1\n\nc2\n\nc3',
    );
  });

  it('should omit sections and lead text when there are none', () => {
    expect(
      buildSummary({ ...input, headings: [], chunkTexts: [] }, { leadChunks: 3, maxChars: 2000 }),
    ).toBe('report.csv (tabular)\nRows: 2 | Columns: x');
  });

  it('should stay within the character limit', () => {
    expect(buildSummary(input, { leadChunks: 3, maxChars: 10 })).toBe('report....');
  });
});
