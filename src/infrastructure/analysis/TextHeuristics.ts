import type { ChunkContentType } from '../../domain/entities/Chunk.js';
import type { ContentMarkers, Heading } from '../../domain/entities/Document.js';

const MARKDOWN_HEADING_RE = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const NUMBERED_HEADING_RE = /^((?:\d+\.)*\d+)\.?\s+(\S.*)$/;
const TABLE_LABEL_RE = /\btable\s+(\d+|[IVX]+)\b/gi;
const FIGURE_LABEL_RE = /\b(?:figure|fig\.)\s*(\d+|[IVX]+)\b/gi;
const REFERENCES_LINE_RE = /^(?:references|bibliography|works cited)\s*:?$/i;
const PIPE_ROW_RE = /^\s*\|?.+\|.+\|?\s*$/;
const SENTENCE_END_RE = /(?<=[.!?])\s+/;

const SUMMARY_KEYWORDS = ['abstract', 'summary', 'conclusion', 'overview'];

function isTitleCase(line: string): boolean {
  const words = line.split(/\s+/).filter((w) => /\p{L}/u.test(w));
  if (words.length === 0) return false;
  return words.every((w) => /^[\p{Lu}\d]/u.test(w) || w.length <= 3);
}

function isAllCaps(line: string): boolean {
  return /\p{Lu}/u.test(line) && line === line.toUpperCase();
}

/**
 * 判斷單行是否為章節標題，回傳標題與層級
 *
 * 規則：Markdown `#`、編號（"2.1 Method"）、全大寫或 Title Case；
 * 最多 10 個字、不以句點結尾、長度 < 100
 */
export function detectHeading(rawLine: string): Heading | null {
  const line = rawLine.trim();
  if (!line || line.length >= 100) return null;

  const md = MARKDOWN_HEADING_RE.exec(line);
  if (md) return { text: md[2], level: md[1].length };

  const wordCount = line.split(/\s+/).length;
  if (wordCount > 10 || /[.:;,]$/.test(line) || line.includes('|') || /^[-*•]\s/.test(line)) return null;

  const numbered = NUMBERED_HEADING_RE.exec(line);
  if (numbered && /^\p{Lu}/u.test(numbered[2])) {
    return { text: line, level: numbered[1].split('.').length };
  }

  if (line.length > 3 && /\p{L}/u.test(line) && (isAllCaps(line) || (wordCount >= 1 && isTitleCase(line)))) {
    return { text: line, level: isAllCaps(line) ? 1 : 2 };
  }
  return null;
}

export function detectMarkers(text: string): ContentMarkers {
  const tables = new Set<string>();
  const figures = new Set<string>();
  for (const m of text.matchAll(TABLE_LABEL_RE)) tables.add(`Table ${m[1]}`);
  for (const m of text.matchAll(FIGURE_LABEL_RE)) figures.add(`Figure ${m[1]}`);

  const lines = text.split('\n');
  const pipeRows = lines.filter((l) => PIPE_ROW_RE.test(l)).length;
  if (pipeRows >= 2 && tables.size === 0) tables.add('inline table');

  return {
    tables: [...tables],
    figures: [...figures],
    hasReferences: lines.some((l) => REFERENCES_LINE_RE.test(l.trim())),
  };
}

/** 依內容判斷 chunk 類型 */
export function classifyContent(text: string): ChunkContentType {
  const lower = text.toLowerCase();
  const lines = text.split('\n');
  if (/\btable\s+(\d+|[ivx]+)\b/.test(lower) || lines.filter((l) => PIPE_ROW_RE.test(l)).length >= 2) {
    return 'table';
  }
  if (/\b(?:figure|fig\.|chart)\s*\d*/.test(lower)) return 'figure_reference';
  if (text.split(/\s+/).filter(Boolean).length < 50) return 'short_text';
  if (SUMMARY_KEYWORDS.some((k) => lower.includes(k))) return 'summary_section';
  return 'body_text';
}

/** 以空白行切段落，去除空段 */
export function splitParagraphs(text: string): string[] {
  return text
    .replace(/\r\n?/g, '\n')
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter(Boolean);
}

/** 過長的文字依句子切開；單一句子超過上限時以字元硬切 */
export function splitOversized(text: string, maxChars: number): string[] {
  if (text.length <= maxChars) return [text];

  const pieces: string[] = [];
  let current = '';
  for (const sentence of text.split(SENTENCE_END_RE)) {
    if (sentence.length > maxChars) {
      if (current) pieces.push(current);
      current = '';
      for (let i = 0; i < sentence.length; i += maxChars) {
        pieces.push(sentence.slice(i, i + maxChars));
      }
      continue;
    }
    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length > maxChars && current) {
      pieces.push(current);
      current = sentence;
    } else {
      current = candidate;
    }
  }
  if (current) pieces.push(current);
  return pieces;
}

/**
 * 段落累積到目標大小；遇到標題時先收尾，
 * 讓每個 chunk 以所屬標題開頭
 */
export function packParagraphs(paragraphs: string[], targetChars: number): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const paragraph of paragraphs) {
    const startsSection = detectHeading(paragraph.split('\n')[0]) !== null;
    splitOversized(paragraph, targetChars).forEach((piece, i) => {
      const sectionStart = startsSection && i === 0;
      if (current && (sectionStart || current.length + piece.length + 2 > targetChars)) {
        chunks.push(current);
        current = '';
      }
      current = current ? `${current}\n\n${piece}` : piece;
    });
  }
  if (current) chunks.push(current);
  return chunks;
}

/** 收集文字中的標題（依出現順序，不重複） */
export function collectHeadings(text: string, limit = Number.POSITIVE_INFINITY): Heading[] {
  const seen = new Set<string>();
  const headings: Heading[] = [];
  let inCodeBlock = false;
  for (const line of text.split('\n')) {
    if (line.trim().startsWith('```')) {
      inCodeBlock = !inCodeBlock;
      continue;
    }
    if (inCodeBlock) continue;
    const heading = detectHeading(line);
    if (heading && !seen.has(heading.text)) {
      seen.add(heading.text);
      headings.push(heading);
      if (headings.length >= limit) break;
    }
  }
  return headings;
}
