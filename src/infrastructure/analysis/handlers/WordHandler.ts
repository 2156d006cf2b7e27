import type { Heading } from '../../../domain/entities/Document.js';
import type { FileHandler, RawChunk } from './types.js';
import { CorruptInputError } from '../../../domain/errors/DomainErrors.js';
import {
  findOrdered,
  openPackage,
  orderedChildren,
  orderedText,
  parseOrderedXml,
  readEntry,
  toOrderedNode,
  type OrderedNode,
} from '../OoxmlReader.js';
import { classifyContent, packParagraphs } from '../TextHeuristics.js';

export type WordBlock =
  | { kind: 'heading'; text: string; level: number; style: string }
  | { kind: 'paragraph'; text: string; style: string; listItem: boolean }
  | { kind: 'table'; text: string; rows: number };

const HEADING_STYLE_RE = /^heading\s?(\d)$/i;

/** 段落內所有 run 的文字；w:tab → tab、w:br → 換行 */
function paragraphText(nodes: unknown[]): string {
  let text = '';
  for (const raw of nodes) {
    const literal = orderedText(raw);
    if (literal !== null) {
      text += literal;
      continue;
    }
    const node = toOrderedNode(raw);
    if (!node || node.tag === 'w:pPr' || node.tag === 'w:rPr') continue;
    if (node.tag === 'w:tab') text += '\t';
    else if (node.tag === 'w:br' || node.tag === 'w:cr') text += '\n';
    else text += paragraphText(node.children);
  }
  return text;
}

function paragraphStyle(p: OrderedNode): { style: string; listItem: boolean } {
  const pPr = findOrdered(p.children, 'w:pPr');
  const styleNode = pPr ? findOrdered(pPr.children, 'w:pStyle') : null;
  const styleVal = styleNode?.attributes['@_w:val'];
  const style = typeof styleVal === 'string' ? styleVal : 'Normal';
  const hasNumbering = pPr ? findOrdered(pPr.children, 'w:numPr') !== null : false;
  return { style, listItem: hasNumbering || /list/i.test(style) };
}

function tableText(tbl: OrderedNode): { text: string; rows: number } {
  const rows = orderedChildren(tbl.children, 'w:tr').map((tr) =>
    orderedChildren(tr.children, 'w:tc')
      .map((tc) => orderedChildren(tc.children, 'w:p').map((p) => paragraphText(p.children).trim()).join(' '))
      .join(' | '),
  );
  return { text: rows.join('\n'), rows: rows.length };
}

/** 依正文順序列出標題、段落與表格 */
export function readWordBlocks(bytes: Uint8Array, filePath: string): WordBlock[] {
  const zip = openPackage(bytes);
  const xml = readEntry(zip, 'word/document.xml');
  if (!xml) {
    throw new CorruptInputError(filePath, 'missing word/document.xml');
  }
  const body = findOrdered(parseOrderedXml(xml), 'w:body');
  if (!body) {
    throw new CorruptInputError(filePath, 'document has no body');
  }

  const blocks: WordBlock[] = [];
  for (const raw of body.children) {
    const node = toOrderedNode(raw);
    if (!node) continue;

    if (node.tag === 'w:p') {
      const text = paragraphText(node.children).trim();
      if (!text) continue;
      const { style, listItem } = paragraphStyle(node);
      const headingMatch = HEADING_STYLE_RE.exec(style);
      if (headingMatch || style.toLowerCase() === 'title') {
        blocks.push({ kind: 'heading', text, level: headingMatch ? Number(headingMatch[1]) : 1, style });
      } else {
        blocks.push({ kind: 'paragraph', text: listItem ? `- ${text}` : text, style, listItem });
      }
    } else if (node.tag === 'w:tbl') {
      const table = tableText(node);
      if (table.text.trim()) blocks.push({ kind: 'table', ...table });
    }
  }
  return blocks;
}

/** 以標題切段，chunk 前綴完整標題路徑 */
function chunkBySections(blocks: WordBlock[], targetChars: number): RawChunk[] {
  const chunks: RawChunk[] = [];
  const stack: Heading[] = [];
  let body: string[] = [];

  const flush = () => {
    if (body.length === 0) return;
    const headingPath = stack.map((h) => h.text).join(' > ');
    const location = headingPath ? headingPath.replace(/ > /g, ' / ') : 'preamble';
    for (const piece of packParagraphs(body, targetChars)) {
      const text = headingPath ? `${headingPath}\n\n${piece}` : piece;
      chunks.push({ text, location, contentType: classifyContent(piece) });
    }
    body = [];
  };

  for (const block of blocks) {
    if (block.kind === 'heading') {
      flush();
      while (stack.length > 0 && stack[stack.length - 1].level >= block.level) stack.pop();
      stack.push({ text: block.text, level: block.level });
    } else {
      body.push(block.text);
    }
  }
  flush();
  return chunks;
}

function chunkByWindows(blocks: WordBlock[], perChunk: number): RawChunk[] {
  const chunks: RawChunk[] = [];
  for (let start = 0; start < blocks.length; start += perChunk) {
    const window = blocks.slice(start, start + perChunk);
    const text = window.map((b) => b.text).join('\n\n');
    chunks.push({
      text,
      location: `paragraphs ${start + 1}-${start + window.length}`,
      contentType: window.some((b) => b.kind === 'table') ? 'table' : classifyContent(text),
    });
  }
  return chunks;
}

export const wordHandler: FileHandler = async (bytes, ctx) => {
  const blocks = readWordBlocks(bytes, ctx.filePath);

  const headings: Heading[] = [];
  const styleCounts: Record<string, number> = {};
  let paragraphCount = 0;
  let listItemCount = 0;
  let tableCount = 0;
  for (const block of blocks) {
    if (block.kind === 'table') {
      tableCount++;
      continue;
    }
    styleCounts[block.style] = (styleCounts[block.style] ?? 0) + 1;
    if (block.kind === 'heading') {
      headings.push({ text: block.text, level: block.level });
    } else {
      paragraphCount++;
      if (block.listItem) listItemCount++;
    }
  }

  const chunks = headings.length > 0
    ? chunkBySections(blocks, ctx.options.targetChunkChars)
    : chunkByWindows(blocks, ctx.options.wordParagraphsPerChunk);

  return {
    structure: { kind: 'word', headings, paragraphCount, listItemCount, tableCount, styleCounts },
    chunks,
    headings: headings.map((h) => h.text),
    statsLine: `Paragraphs: ${paragraphCount} | Headings: ${headings.length} | Lists: ${listItemCount} | Tables: ${tableCount}`,
  };
};
