import { describe, it, expect } from 'vitest';
import { columnIndex, readWorkbook, spreadsheetHandler } from '../../../../src/infrastructure/analysis/handlers/SpreadsheetHandler.js';
import { readWordBlocks, wordHandler } from '../../../../src/infrastructure/analysis/handlers/WordHandler.js';
import { CorruptInputError } from '../../../../src/domain/errors/DomainErrors.js';
import { DEFAULT_CONFIG } from '../../../../src/config/defaults.js';
import { buildDocx, buildPackage, buildXlsx } from '../../../fixtures/ooxml.js';

const ctx = (filePath: string, overrides: Partial<typeof DEFAULT_CONFIG.analysis> = {}) => ({
  filePath,
  options: { ...DEFAULT_CONFIG.analysis, ...overrides },
});

describe('spreadsheetHandler', () => {
  /**
   * Scenario: 多個工作表
   * Given 一個有資料的工作表與一個空工作表
   * When 分析
   * Then 只有有資料的工作表產生 chunk，chunk 以工作表名稱與表頭開頭
   */
  it('should chunk each non-empty sheet with its name and header', async () => {
    const bytes = buildXlsx([
      { name: 'Sales', rows: [['Region', 'Revenue'], ['North', 1200], ['South', 800]] },
      { name: 'Empty', rows: [] },
    ]);

    const output = await spreadsheetHandler(bytes, ctx('/data/sales.xlsx'));

    expect(output.chunks).toEqual([
      {
        text: 'Sheet: Sales\nRegion | Revenue\nNorth | 1200\nSouth | 800',
        location: 'Sales rows 1-2',
        contentType: 'tabular_data',
      },
    ]);
    expect(output.headings).toEqual(['Sales']);
    expect(output.statsLine).toBe(
      'Sheets: 2 | Sales: 2 rows; Region (categorical), Revenue (numeric 800..1200) | Empty: 0 rows; ',
    );
  });

  it('should never mix rows of two sheets in one chunk', async () => {
    const bytes = buildXlsx([
      { name: 'A', rows: [['k'], ['a1']] },
      { name: 'B', rows: [['k'], ['b1']] },
    ]);

    const output = await spreadsheetHandler(bytes, ctx('/data/two.xlsx'));

    expect(output.chunks.map((c) => c.location)).toEqual(['A rows 1-1', 'B rows 1-1']);
    expect(output.chunks[1]?.text).toBe('Sheet: B\nk\nb1');
  });

  it('should read rich-text shared strings, inline strings and booleans', () => {
    const bytes = buildPackage({
      'xl/workbook.xml': '<workbook><sheets><sheet name="S" sheetId="1"/></sheets></workbook>',
      'xl/sharedStrings.xml': '<sst><si><r><t>No</t></r><r><t>rth</t></r></si></sst>',
      'xl/worksheets/sheet1.xml':
        '<worksheet><sheetData><row r="1"><c r="A1" t="s"><v>0</v></c>' +
        '<c r="C1" t="inlineStr"><is><t>x</t></is></c><c r="D1" t="b"><v>1</v></c></row></sheetData></worksheet>',
    });

    expect(readWorkbook(bytes, '/data/s.xlsx')).toEqual([
      { name: 'S', records: [['North', '', 'x', 'TRUE']] },
    ]);
  });

  it('should fail on a package without a workbook', () => {
    const bytes = buildPackage({ 'other.xml': '<x/>' });
    expect(() => readWorkbook(bytes, '/data/bad.xlsx')).toThrow(CorruptInputError);
  });

  it('columnIndex should convert cell references', () => {
    expect(columnIndex('A1')).toBe(0);
    expect(columnIndex('Z9')).toBe(25);
    expect(columnIndex('AA1')).toBe(26);
    expect(columnIndex('BC12')).toBe(54);
  });
});

describe('wordHandler', () => {
  const docx = buildDocx([
    { heading: 'Overview', level: 1 },
    { text: 'Tokyo is the capital of Japan.' },
    { text: 'First point', list: true },
    { table: [['City', 'Country'], ['Tokyo', 'Japan']] },
    { heading: 'Details', level: 2 },
    { text: 'Further reading is listed below.' },
  ]);

  it('should read blocks in document order', () => {
    expect(readWordBlocks(docx, '/docs/report.docx')).toEqual([
      { kind: 'heading', text: 'Overview', level: 1, style: 'Heading1' },
      { kind: 'paragraph', text: 'Tokyo is the capital of Japan.', style: 'Normal', listItem: false },
      { kind: 'paragraph', text: '- First point', style: 'Normal', listItem: true },
      { kind: 'table', text: 'City | Country\nTokyo | Japan', rows: 2 },
      { kind: 'heading', text: 'Details', level: 2, style: 'Heading2' },
      { kind: 'paragraph', text: 'Further reading is listed below.', style: 'Normal', listItem: false },
    ]);
  });

  /**
   * Scenario: 有標題的 Word 文件
   * Given Heading1 與其下的 Heading2
   * When 分析
   * Then chunk 依章節切開，文字前綴完整標題路徑
   */
  it('should chunk by section and prefix the heading path', async () => {
    const output = await wordHandler(docx, ctx('/docs/report.docx'));

    expect(output.chunks).toEqual([
      {
        text: 'Overview\n\nTokyo is the capital of Japan.\n\n- First point\n\nCity | Country\nTokyo | Japan',
        location: 'Overview',
        contentType: 'table',
      },
      {
        text: 'Overview > Details\n\nFurther reading is listed below.',
        location: 'Overview / Details',
        contentType: 'short_text',
      },
    ]);
    expect(output.structure).toEqual({
      kind: 'word',
      headings: [{ text: 'Overview', level: 1 }, { text: 'Details', level: 2 }],
      paragraphCount: 3,
      listItemCount: 1,
      tableCount: 1,
      styleCounts: { Heading1: 1, Normal: 3, Heading2: 1 },
    });
    expect(output.statsLine).toBe('Paragraphs: 3 | Headings: 2 | Lists: 1 | Tables: 1');
  });

  it('should window paragraphs when the document has no headings', async () => {
    const plain = buildDocx([
      { text: 'first paragraph' },
      { text: 'second paragraph' },
      { text: 'third paragraph' },
    ]);

    const output = await wordHandler(plain, ctx('/docs/plain.docx', { wordParagraphsPerChunk: 2 }));

    expect(output.chunks.map((c) => [c.location, c.text])).toEqual([
      ['paragraphs 1-2', 'first paragraph\n\nsecond paragraph'],
      ['paragraphs 3-3', 'third paragraph'],
    ]);
  });

  it('should fail on a package without a document part', () => {
    expect(() => readWordBlocks(buildPackage({ 'x.xml': '<x/>' }), '/docs/bad.docx')).toThrow(CorruptInputError);
  });
});
