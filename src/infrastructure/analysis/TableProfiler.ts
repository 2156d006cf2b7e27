import type { ColumnProfile } from '../../domain/entities/Document.js';
import type { RawChunk } from './handlers/types.js';

const NUMERIC_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;
const BOOLEAN_VALUES = new Set(['true', 'false', 'yes', 'no']);

export interface TableData {
  header: string[];
  rows: string[][];
}

/** 表頭空白的欄位以 column_N 命名；欄數取表頭與最長列的最大值 */
export function normalizeTable(records: string[][]): TableData {
  const [first = [], ...rest] = records;
  const width = rest.reduce((w, r) => Math.max(w, r.length), first.length);
  const header = Array.from({ length: width }, (_, i) => first[i]?.trim() || `column_${i + 1}`);
  const rows = rest.map((r) => Array.from({ length: width }, (_, i) => (r[i] ?? '').trim()));
  return { header, rows };
}

export function profileColumns(table: TableData): ColumnProfile[] {
  return table.header.map((name, i) => {
    const values = table.rows.map((r) => r[i]).filter((v) => v !== '');
    const distinctCount = new Set(values).size;

    if (values.length === 0) {
      return { name, dataType: 'empty', distinctCount };
    }
    if (values.every((v) => NUMERIC_RE.test(v))) {
      // 大型表格逐筆累計，不展開成函式參數
      let min = Infinity;
      let max = -Infinity;
      let sum = 0;
      for (const v of values) {
        const n = Number(v);
        if (n < min) min = n;
        if (n > max) max = n;
        sum += n;
      }
      return { name, dataType: 'numeric', distinctCount, min, max, mean: sum / values.length };
    }
    if (values.every((v) => BOOLEAN_VALUES.has(v.toLowerCase()))) {
      return { name, dataType: 'boolean', distinctCount };
    }
    return { name, dataType: 'categorical', distinctCount };
  });
}

export function formatRow(cells: string[]): string {
  return cells.join(' | ');
}

export interface WindowOptions {
  /** 表頭之前的額外行（例如工作表名稱） */
  prefix?: string;
  /** location 前綴（例如工作表名稱） */
  scope?: string;
}

/**
 * 每 rowsPerChunk 列一個 chunk，每個 chunk 都以表頭行開頭；列不會被拆開
 */
export function windowRows(
  table: TableData,
  rowsPerChunk: number,
  options: WindowOptions = {},
): RawChunk[] {
  const headerLine = formatRow(table.header);
  const lead = options.prefix ? `${options.prefix}\n${headerLine}` : headerLine;
  const scope = options.scope ? `${options.scope} ` : '';

  if (table.rows.length === 0) {
    return [{ text: lead, location: `${scope}header`, contentType: 'tabular_data' }];
  }

  const chunks: RawChunk[] = [];
  for (let start = 0; start < table.rows.length; start += rowsPerChunk) {
    const window = table.rows.slice(start, start + rowsPerChunk);
    chunks.push({
      text: [lead, ...window.map(formatRow)].join('\n'),
      location: `${scope}rows ${start + 1}-${start + window.length}`,
      contentType: 'tabular_data',
    });
  }
  return chunks;
}

export function describeColumns(columns: ColumnProfile[]): string {
  return columns
    .map((c) => {
      if (c.dataType === 'numeric' && c.min !== undefined && c.max !== undefined) {
        return `${c.name} (numeric ${c.min}..${c.max})`;
      }
      return `${c.name} (${c.dataType})`;
    })
    .join(', ');
}
