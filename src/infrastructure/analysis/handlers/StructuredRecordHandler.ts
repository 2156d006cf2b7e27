import type { FileHandler, RawChunk } from './types.js';
import { CorruptInputError } from '../../../domain/errors/DomainErrors.js';
import { decodeText } from './TextHandler.js';

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const MAX_KEY_PATHS = 200;
const IDENTIFIER_RE = /^[A-Za-z_$][\w$]*$/;

interface Unit {
  path: string;
  value: JsonValue;
  lines: string[];
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function childPath(parent: string, key: string | number): string {
  if (typeof key === 'number') return `${parent}[${key}]`;
  return IDENTIFIER_RE.test(key) ? `${parent}.${key}` : `${parent}[${JSON.stringify(key)}]`;
}

function childrenOf(path: string, value: JsonValue): Array<[string, JsonValue]> {
  if (Array.isArray(value)) return value.map((v, i): [string, JsonValue] => [childPath(path, i), v]);
  if (isJsonObject(value)) return Object.entries(value).map(([k, v]): [string, JsonValue] => [childPath(path, k), v]);
  return [];
}

/** 攤平成帶完整路徑前綴的 `path = value` 行 */
export function flatten(path: string, value: JsonValue, out: string[] = []): string[] {
  const children = childrenOf(path, value);
  if (children.length === 0) {
    out.push(`${path} = ${JSON.stringify(value)}`);
    return out;
  }
  for (const [p, v] of children) flatten(p, v, out);
  return out;
}

export function nestingDepth(value: JsonValue): number {
  const children = childrenOf('$', value);
  if (children.length === 0) return Array.isArray(value) || isJsonObject(value) ? 1 : 0;
  return 1 + children.reduce((depth, [, v]) => Math.max(depth, nestingDepth(v)), 0);
}

function valueType(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/** 陣列索引一般化成 [*]，記錄每條路徑的值型別 */
function collectKeyPaths(path: string, value: JsonValue, out: Record<string, string>): void {
  if (Object.keys(out).length >= MAX_KEY_PATHS) return;
  const general = path.replace(/\[\d+\]/g, '[*]');
  const type = valueType(value);
  const previous = out[general];
  out[general] = previous && previous !== type ? 'mixed' : type;
  for (const [p, v] of childrenOf(path, value)) collectKeyPaths(p, v, out);
}

function toUnit(path: string, value: JsonValue): Unit {
  return { path, value, lines: flatten(path, value) };
}

function unitSize(unit: Unit): number {
  return unit.lines.reduce((n, l) => n + l.length + 1, 0);
}

/** 超過上限的單元只在子樹邊界往下拆；葉節點不拆 */
function splitUnit(unit: Unit, maxChars: number): Unit[] {
  if (unitSize(unit) <= maxChars) return [unit];
  const children = childrenOf(unit.path, unit.value);
  if (children.length === 0) return [unit];
  return children.flatMap(([p, v]) => splitUnit(toUnit(p, v), maxChars));
}

function packUnits(units: Unit[], maxChars: number): RawChunk[] {
  const chunks: RawChunk[] = [];
  let current: Unit[] = [];
  let size = 0;

  const flush = () => {
    if (current.length === 0) return;
    const first = current[0].path;
    const last = current[current.length - 1].path;
    chunks.push({
      text: current.flatMap((u) => u.lines).join('\n'),
      location: first === last ? first : `${first} to ${last}`,
      contentType: 'structured_data',
    });
    current = [];
    size = 0;
  };

  for (const unit of units) {
    const s = unitSize(unit);
    if (current.length > 0 && size + s > maxChars) flush();
    current.push(unit);
    size += s;
  }
  flush();
  return chunks;
}

export const structuredRecordHandler: FileHandler = async (bytes, ctx) => {
  const text = decodeText(bytes, ctx.filePath);
  let root: JsonValue;
  try {
    root = JSON.parse(text);
  } catch (err) {
    throw new CorruptInputError(ctx.filePath, err instanceof Error ? err.message : 'invalid JSON', { cause: err });
  }

  const rootType = Array.isArray(root) ? 'array' : isJsonObject(root) ? 'object' : 'scalar';
  const topLevelKeys = isJsonObject(root) ? Object.keys(root) : [];
  const itemCount = Array.isArray(root) ? root.length : topLevelKeys.length;

  const topUnits = rootType === 'scalar'
    ? [toUnit('$', root)]
    : childrenOf('$', root).map(([p, v]) => toUnit(p, v));
  const units = topUnits.flatMap((u) => splitUnit(u, ctx.options.structuredChunkChars));
  const chunks = packUnits(units, ctx.options.structuredChunkChars);

  const keyPaths: Record<string, string> = {};
  collectKeyPaths('$', root, keyPaths);
  const depth = nestingDepth(root);

  // 陣列根節點以第一個元素的欄位作為標題
  const first = Array.isArray(root) ? root[0] : undefined;
  const headings = rootType === 'object'
    ? topLevelKeys.slice(0, 10)
    : first !== undefined && isJsonObject(first) ? Object.keys(first).slice(0, 10) : [];

  return {
    structure: {
      kind: 'structured_record',
      rootType,
      topLevelKeys,
      itemCount,
      nestingDepth: depth,
      keyPaths,
    },
    chunks,
    headings,
    statsLine: `Root: ${rootType} | ${rootType === 'array' ? 'Items' : 'Keys'}: ${itemCount} | Depth: ${depth}`,
  };
};
