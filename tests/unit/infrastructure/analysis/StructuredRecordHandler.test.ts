import { describe, it, expect } from 'vitest';
import {
  childPath,
  flatten,
  nestingDepth,
  structuredRecordHandler,
} from '../../../../src/infrastructure/analysis/handlers/StructuredRecordHandler.js';
import { CorruptInputError } from '../../../../src/domain/errors/DomainErrors.js';
import { DEFAULT_CONFIG } from '../../../../src/config/defaults.js';

const ctx = (structuredChunkChars = DEFAULT_CONFIG.analysis.structuredChunkChars) => ({
  filePath: '/data/record.json',
  options: { ...DEFAULT_CONFIG.analysis, structuredChunkChars },
});
const encode = (value: unknown) => new TextEncoder().encode(JSON.stringify(value));

describe('structuredRecordHandler', () => {
  it('should flatten a small object into one chunk with full key paths', async () => {
    const output = await structuredRecordHandler(
      encode({ name: 'Widget', tags: ['a', 'b'], dims: { w: 2, h: 3 } }),
      ctx(),
    );

    expect(output.chunks).toEqual([
      {
        text: [
          '$.name = "Widget"',
          '$.tags[0] = "a"',
          '$.tags[1] = "b"',
          '$.dims.w = 2',
          '$.dims.h = 3',
        ].join('\n'),
        location: '$.name to $.dims',
        contentType: 'structured_data',
      },
    ]);
    expect(output.structure).toEqual({
      kind: 'structured_record',
      rootType: 'object',
      topLevelKeys: ['name', 'tags', 'dims'],
      itemCount: 3,
      nestingDepth: 2,
      keyPaths: {
        '$': 'object',
        '$.name': 'string',
        '$.tags': 'array',
        '$.tags[*]': 'string',
        '$.dims': 'object',
        '$.dims.w': 'number',
        '$.dims.h': 'number',
      },
    });
    expect(output.headings).toEqual(['name', 'tags', 'dims']);
    expect(output.statsLine).toBe('Root: object | Keys: 3 | Depth: 2');
  });

  /**
   * Scenario: 陣列根節點超過 chunk 上限
   * Given 三筆紀錄，每筆約 32 字元，上限 40
   * When 分析
   * Then 每筆紀錄自成一個 chunk，不會在紀錄中間切開
   */
  it('should split only at record boundaries', async () => {
    const records = [
      { id: 1, city: 'Paris' },
      { id: 2, city: 'Tokyo' },
      { id: 3, city: 'Lima' },
    ];

    const output = await structuredRecordHandler(encode(records), ctx(40));

    expect(output.chunks.map((c) => c.location)).toEqual(['$[0]', '$[1]', '$[2]']);
    expect(output.chunks[0]?.text).toBe('$[0].id = 1\n$[0].city = "Paris"');
    expect(output.headings).toEqual(['id', 'city']);
    expect(output.statsLine).toBe('Root: array | Items: 3 | Depth: 2');
  });

  it('should treat a scalar root as a single unit', async () => {
    const output = await structuredRecordHandler(encode(42), ctx());

    expect(output.chunks).toEqual([{ text: '$ = 42', location: '$', contentType: 'structured_data' }]);
    expect(output.structure).toMatchObject({ rootType: 'scalar', nestingDepth: 0 });
  });

  it('should reject invalid JSON', async () => {
    await expect(
      structuredRecordHandler(new TextEncoder().encode('{"a": '), ctx()),
    ).rejects.toBeInstanceOf(CorruptInputError);
  });
});

describe('key paths', () => {
  it('should quote keys that are not identifiers', () => {
    expect(childPath('$', 'a b')).toBe('$["a b"]');
    expect(childPath('$', 'ok')).toBe('$.ok');
    expect(childPath('$.list', 2)).toBe('$.list[2]');
  });

  it('should print empty containers as leaves', () => {
    expect(flatten('$', { a: [], b: {} })).toEqual(['$.a = []', '$.b = {}']);
  });

  it('should count nesting depth', () => {
    expect(nestingDepth('x')).toBe(0);
    expect(nestingDepth([])).toBe(1);
    expect(nestingDepth({ a: { b: [1] } })).toBe(3);
  });
});
