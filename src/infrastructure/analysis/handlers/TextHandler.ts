import path from 'node:path';
import matter from 'gray-matter';
import type { Heading } from '../../../domain/entities/Document.js';
import type { FileHandler, RawChunk } from './types.js';
import { CorruptInputError } from '../../../domain/errors/DomainErrors.js';
import {
  classifyContent,
  collectHeadings,
  detectHeading,
  detectMarkers,
  packParagraphs,
  splitParagraphs,
} from '../TextHeuristics.js';

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);

export function decodeText(bytes: Uint8Array, filePath: string): string {
  const text = Buffer.from(bytes).toString('utf-8').replace(/^\uFEFF/, '');
  if (text.includes('\u0000')) {
    throw new CorruptInputError(filePath, 'binary content in a text file');
  }
  return text.replace(/\r\n?/g, '\n');
}

export const textHandler: FileHandler = async (bytes, ctx) => {
  const raw = decodeText(bytes, ctx.filePath);

  let body = raw;
  let frontmatter: Record<string, unknown> = {};
  if (MARKDOWN_EXTENSIONS.has(path.extname(ctx.filePath).toLowerCase()) && raw.trimStart().startsWith('---')) {
    const parsed = matter(raw);
    body = parsed.content;
    frontmatter = parsed.data;
  }

  const headings: Heading[] = collectHeadings(body);
  if (typeof frontmatter.title === 'string' && frontmatter.title.trim()) {
    headings.unshift({ text: frontmatter.title.trim(), level: 1 });
  }

  const chunks: RawChunk[] = [];
  let section = typeof frontmatter.title === 'string' ? frontmatter.title.trim() : '';
  packParagraphs(splitParagraphs(body), ctx.options.targetChunkChars).forEach((piece, i) => {
    const heading = detectHeading(piece.split('\n')[0]);
    if (heading) section = heading.text;
    chunks.push({
      text: piece,
      location: section ? `section "${section}"` : `part ${i + 1}`,
      contentType: classifyContent(piece),
    });
  });

  const lineCount = body ? body.split('\n').length : 0;
  const wordCount = body.split(/\s+/).filter(Boolean).length;
  return {
    structure: {
      kind: 'text',
      lineCount,
      headings,
      markers: detectMarkers(body),
      frontmatter,
    },
    chunks,
    headings: headings.map((h) => h.text),
    statsLine: `Lines: ${lineCount} | Words: ${wordCount} | Sections: ${headings.length}`,
  };
};
