import path from 'node:path';
import type AdmZip from 'adm-zip';
import type { SheetStructure } from '../../../domain/entities/Document.js';
import type { FileHandler, RawChunk } from './types.js';
import { CorruptInputError } from '../../../domain/errors/DomainErrors.js';
import {
  asArray,
  attr,
  child,
  openPackage,
  parseXml,
  readEntry,
  textOf,
} from '../OoxmlReader.js';
import { describeColumns, normalizeTable, profileColumns, windowRows } from '../TableProfiler.js';

export interface SheetData {
  name: string;
  records: string[][];
}

/** "BC12" → 54（0-based 欄位索引） */
export function columnIndex(cellRef: string): number {
  const letters = /^[A-Z]+/i.exec(cellRef)?.[0].toUpperCase() ?? '';
  let index = 0;
  for (const ch of letters) index = index * 26 + (ch.charCodeAt(0) - 64);
  return index - 1;
}

/** <si> 可能是單一 <t>，也可能是多個 rich-text run */
function sharedStringText(si: unknown): string {
  const direct = child(si, 't');
  if (direct !== undefined) return textOf(direct);
  return asArray(child(si, 'r')).map((run) => textOf(child(run, 't'))).join('');
}

function readSharedStrings(zip: AdmZip): string[] {
  const xml = readEntry(zip, 'xl/sharedStrings.xml');
  if (!xml) return [];
  const doc = parseXml(xml, ['si', 'r']);
  return asArray(child(child(doc, 'sst'), 'si')).map(sharedStringText);
}

function cellValue(cell: unknown, shared: string[]): string {
  const type = attr(cell, 't');
  if (type === 'inlineStr') return sharedStringText(child(cell, 'is'));
  const raw = textOf(child(cell, 'v'));
  if (type === 's') return shared[Number(raw)] ?? '';
  if (type === 'b') return raw === '1' ? 'TRUE' : 'FALSE';
  return raw;
}

function readSheetRows(xml: string, shared: string[]): string[][] {
  const doc = parseXml(xml, ['row', 'c']);
  const rows = asArray(child(child(child(doc, 'worksheet'), 'sheetData'), 'row'));

  const records: string[][] = [];
  for (const row of rows) {
    const record: string[] = [];
    asArray(child(row, 'c')).forEach((cell, position) => {
      const ref = attr(cell, 'r');
      const index = ref ? columnIndex(ref) : position;
      while (record.length < index) record.push('');
      record[index] = cellValue(cell, shared).trim();
    });
    if (record.some((v) => v !== '')) records.push(record);
  }
  return records;
}

/** 依 workbook.xml 的工作表順序讀出所有工作表 */
export function readWorkbook(bytes: Uint8Array, filePath: string): SheetData[] {
  const zip = openPackage(bytes);
  const workbookXml = readEntry(zip, 'xl/workbook.xml');
  if (!workbookXml) {
    throw new CorruptInputError(filePath, 'missing xl/workbook.xml');
  }

  const relsXml = readEntry(zip, 'xl/_rels/workbook.xml.rels') ?? '';
  const targets = new Map<string, string>();
  for (const rel of asArray(child(child(parseXml(relsXml, ['Relationship']), 'Relationships'), 'Relationship'))) {
    const id = attr(rel, 'Id');
    const target = attr(rel, 'Target');
    if (id && target) {
      targets.set(id, target.startsWith('/') ? target.slice(1) : path.posix.join('xl', target));
    }
  }

  const shared = readSharedStrings(zip);
  const sheets = asArray(child(child(child(parseXml(workbookXml, ['sheet']), 'workbook'), 'sheets'), 'sheet'));

  return sheets.map((sheet, i) => {
    const name = attr(sheet, 'name') ?? `Sheet${i + 1}`;
    const relId = attr(sheet, 'r:id');
    const entryName = (relId && targets.get(relId)) ?? `xl/worksheets/sheet${i + 1}.xml`;
    const xml = readEntry(zip, entryName);
    return { name, records: xml ? readSheetRows(xml, shared) : [] };
  });
}

export const spreadsheetHandler: FileHandler = async (bytes, ctx) => {
  const sheets = readWorkbook(bytes, ctx.filePath);

  const structures: SheetStructure[] = [];
  const chunks: RawChunk[] = [];
  const headings: string[] = [];

  for (const sheet of sheets) {
    const table = normalizeTable(sheet.records);
    const columns = profileColumns(table);
    structures.push({ name: sheet.name, rowCount: table.rows.length, columns });
    if (sheet.records.length === 0) continue;

    headings.push(sheet.name);
    // chunk 不跨工作表
    chunks.push(...windowRows(table, ctx.options.tabularRowsPerChunk, {
      prefix: `Sheet: ${sheet.name}`,
      scope: sheet.name,
    }));
  }

  const statsLine = structures
    .map((s) => `${s.name}: ${s.rowCount} rows; ${describeColumns(s.columns)}`)
    .join(' | ');
  return {
    structure: { kind: 'spreadsheet', sheets: structures },
    chunks,
    headings,
    statsLine: `Sheets: ${structures.length} | ${statsLine}`,
  };
};
