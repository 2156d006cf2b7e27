import path from 'node:path';
import type { FileType } from '../../domain/entities/Document.js';
import { UnsupportedTypeError } from '../../domain/errors/DomainErrors.js';

export const EXTENSION_MAP: Readonly<Partial<Record<string, FileType>>> = {
  '.pdf': 'pdf',
  '.txt': 'text',
  '.text': 'text',
  '.md': 'text',
  '.markdown': 'text',
  '.log': 'text',
  '.csv': 'tabular',
  '.tsv': 'tabular',
  '.xlsx': 'spreadsheet',
  '.docx': 'word',
  '.json': 'structured_record',
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(EXTENSION_MAP);

const PDF_MAGIC = '%PDF-';

function sniff(bytes: Uint8Array): FileType | null {
  const head = Buffer.from(bytes.subarray(0, PDF_MAGIC.length)).toString('latin1');
  if (head === PDF_MAGIC) return 'pdf';

  const text = Buffer.from(bytes).toString('utf-8').replace(/^\uFEFF/, '').trim();
  if (text.startsWith('{') || text.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (typeof parsed === 'object' && parsed !== null) return 'structured_record';
    } catch {
      return null;
    }
  }
  return null;
}

/**
 * 判斷檔案類型：先看副檔名，未知副檔名才檢查內容
 * @throws UnsupportedTypeError
 */
export function classifyFile(filePath: string, bytes: Uint8Array): FileType {
  const ext = path.extname(filePath).toLowerCase();
  const mapped = EXTENSION_MAP[ext];
  if (mapped) return mapped;

  const sniffed = bytes.length > 0 ? sniff(bytes) : null;
  if (sniffed) return sniffed;
  throw new UnsupportedTypeError(filePath);
}
