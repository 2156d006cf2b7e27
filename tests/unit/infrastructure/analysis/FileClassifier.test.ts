import { describe, it, expect } from 'vitest';
import { SUPPORTED_EXTENSIONS, classifyFile } from '../../../../src/infrastructure/analysis/FileClassifier.js';
import { UnsupportedTypeError } from '../../../../src/domain/errors/DomainErrors.js';

const bytes = (text: string) => new TextEncoder().encode(text);

describe('classifyFile', () => {
  it('should map known extensions case-insensitively', () => {
    expect(classifyFile('/a/paper.PDF', bytes(''))).toBe('pdf');
    expect(classifyFile('/a/notes.md', bytes('# x'))).toBe('text');
    expect(classifyFile('/a/data.tsv', bytes('a\tb'))).toBe('tabular');
    expect(classifyFile('/a/book.xlsx', bytes(''))).toBe('spreadsheet');
    expect(classifyFile('/a/letter.docx', bytes(''))).toBe('word');
    expect(classifyFile('/a/record.json', bytes('{}'))).toBe('structured_record');
  });

  it('should sniff PDF and JSON content behind unknown extensions', () => {
    expect(classifyFile('/a/download', bytes('%PDF-1.7 ...'))).toBe('pdf');
    expect(classifyFile('/a/export.data', bytes('  [{"a": 1}]'))).toBe('structured_record');
  });

  it('should reject unknown content and legacy binary formats', () => {
    expect(() => classifyFile('/a/blob.bin', bytes('hello'))).toThrow(UnsupportedTypeError);
    expect(() => classifyFile('/a/blob.bin', bytes('{not json'))).toThrow(UnsupportedTypeError);
    expect(() => classifyFile('/a/empty', new Uint8Array())).toThrow(UnsupportedTypeError);
    expect(() => classifyFile('/a/old.doc', bytes('x'))).toThrow(UnsupportedTypeError);
    expect(() => classifyFile('/a/old.xls', bytes('x'))).toThrow(UnsupportedTypeError);
  });

  it('should list every supported extension', () => {
    expect(SUPPORTED_EXTENSIONS).toEqual(expect.arrayContaining(['.pdf', '.txt', '.md', '.csv', '.tsv', '.xlsx', '.docx', '.json']));
  });
});
