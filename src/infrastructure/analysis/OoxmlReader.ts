import AdmZip from 'adm-zip';
import { XMLParser } from 'fast-xml-parser';

/**
 * OOXML 套件（.docx / .xlsx）讀取工具
 *
 * XMLParser 的輸出是未定型的樹，這裡提供收斂成 unknown 後的窄化 helper。
 */

export type XmlRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is XmlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

export function child(node: unknown, name: string): unknown {
  return isRecord(node) ? node[name] : undefined;
}

export function attr(node: unknown, name: string): string | undefined {
  const value = child(node, `@_${name}`);
  return typeof value === 'string' ? value : typeof value === 'number' ? String(value) : undefined;
}

/** 取出節點的文字：字串本身，或 `#text` 欄位 */
export function textOf(node: unknown): string {
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  const text = child(node, '#text');
  return typeof text === 'string' ? text : typeof text === 'number' ? String(text) : '';
}

/** 開啟 zip 套件；格式錯誤時拋出原始錯誤由呼叫端轉換 */
export function openPackage(bytes: Uint8Array): AdmZip {
  return new AdmZip(Buffer.from(bytes));
}

export function readEntry(zip: AdmZip, entryName: string): string | undefined {
  const entry = zip.getEntry(entryName);
  return entry ? entry.getData().toString('utf8') : undefined;
}

/** 一般（非保序）解析，指定的標籤一律解析成陣列 */
export function parseXml(xml: string, arrayTags: readonly string[]): unknown {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    isArray: (name) => arrayTags.includes(name),
  });
  const parsed: unknown = parser.parse(xml);
  return parsed;
}

// ── 保序解析（preserveOrder），用於 .docx 正文的段落與表格交錯順序 ──

export interface OrderedNode {
  tag: string;
  children: unknown[];
  attributes: XmlRecord;
}

export function parseOrderedXml(xml: string): unknown[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    preserveOrder: true,
    parseTagValue: false,
    trimValues: false,
  });
  const parsed: unknown = parser.parse(xml);
  return asArray(parsed);
}

/** 把保序輸出的一個元素轉成 { tag, children, attributes }；文字節點回傳 null */
export function toOrderedNode(node: unknown): OrderedNode | null {
  if (!isRecord(node)) return null;
  const tag = Object.keys(node).find((k) => k !== ':@' && k !== '#text');
  if (!tag) return null;
  const attributes = node[':@'];
  return {
    tag,
    children: asArray(node[tag]),
    attributes: isRecord(attributes) ? attributes : {},
  };
}

export function orderedChildren(nodes: unknown[], tag: string): OrderedNode[] {
  const result: OrderedNode[] = [];
  for (const raw of nodes) {
    const node = toOrderedNode(raw);
    if (node && node.tag === tag) result.push(node);
  }
  return result;
}

/** 深度優先找第一個指定標籤 */
export function findOrdered(nodes: unknown[], tag: string): OrderedNode | null {
  for (const raw of nodes) {
    const node = toOrderedNode(raw);
    if (!node) continue;
    if (node.tag === tag) return node;
    const nested = findOrdered(node.children, tag);
    if (nested) return nested;
  }
  return null;
}

export function orderedText(node: unknown): string | null {
  if (!isRecord(node)) return null;
  const text = node['#text'];
  if (typeof text === 'string') return text;
  if (typeof text === 'number') return String(text);
  return null;
}
