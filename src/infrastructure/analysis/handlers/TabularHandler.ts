import path from 'node:path';
import { parse } from 'csv-parse/sync';
import type { FileHandler } from './types.js';
import { decodeText } from './TextHandler.js';
import { describeColumns, normalizeTable, profileColumns, windowRows } from '../TableProfiler.js';

/** .tsv 固定用 tab；其他依第一行的分隔字元數量判斷 */
export function detectDelimiter(filePath: string, firstLine: string): string {
  if (path.extname(filePath).toLowerCase() === '.tsv') return '\t';
  const counts: Array<[string, number]> = [',', ';', '\t'].map((d) => [d, firstLine.split(d).length - 1]);
  counts.sort((a, b) => b[1] - a[1]);
  return counts[0][1] > 0 ? counts[0][0] : ',';
}

export const tabularHandler: FileHandler = async (bytes, ctx) => {
  const text = decodeText(bytes, ctx.filePath);
  const delimiter = detectDelimiter(ctx.filePath, text.split('\n', 1)[0] ?? '');

  const records: string[][] = parse(text, {
    delimiter,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    bom: true,
  });

  const table = normalizeTable(records);
  const columns = profileColumns(table);

  return {
    structure: { kind: 'tabular', delimiter, rowCount: table.rows.length, columns },
    chunks: windowRows(table, ctx.options.tabularRowsPerChunk),
    headings: table.header,
    statsLine: `Rows: ${table.rows.length} | Columns: ${describeColumns(columns)}`,
  };
};
