import { describe, it, expect } from 'vitest';
import { ContentHash } from '../../../src/domain/value-objects/ContentHash.js';
import { chunkIdFor, documentIdFor } from '../../../src/domain/value-objects/Identifiers.js';

describe('ContentHash', () => {
  it('should produce the SHA-256 hex of the text', () => {
    expect(ContentHash.fromText('abc').value).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });

  it('should hash bytes the same way as the equivalent UTF-8 text', () => {
    const fromBytes = ContentHash.fromBytes(new TextEncoder().encode('hello world'));
    expect(fromBytes.value).toBe('b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9');
    expect(fromBytes.equals(ContentHash.fromText('hello world'))).toBe(true);
  });

  it('should expose a short prefix', () => {
    expect(ContentHash.fromText('abc').short()).toBe('ba7816bf');
    expect(ContentHash.fromText('abc').short(4)).toBe('ba78');
  });

  it('should create from existing hex string', () => {
    const h1 = ContentHash.fromText('test');
    const h2 = ContentHash.fromHex(h1.value);
    expect(h1.equals(h2)).toBe(true);
    expect(h2.toString()).toBe(h1.value);
  });
});

describe('Identifiers', () => {
  it('should derive a stable document id from the resolved path', () => {
    const id = documentIdFor('/data/reports/q1.pdf');
    expect(id).toMatch(/^doc_[0-9a-f]{16}$/);
    expect(documentIdFor('/data/reports/../reports/q1.pdf')).toBe(id);
    expect(documentIdFor('/data/reports/q2.pdf')).not.toBe(id);
  });

  it('should embed sequence index and a text hash in the chunk id', () => {
    expect(chunkIdFor('doc_1234', 3, 'abc')).toBe('doc_1234:3:ba7816bf');
  });

  it('should change the chunk id when the text changes', () => {
    expect(chunkIdFor('doc_1234', 0, 'first')).not.toBe(chunkIdFor('doc_1234', 0, 'second'));
  });
});
