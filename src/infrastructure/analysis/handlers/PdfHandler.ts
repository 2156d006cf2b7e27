import { getDocumentProxy } from 'unpdf';
import type { PageStructure } from '../../../domain/entities/Document.js';
import type { FileHandler, RawChunk } from './types.js';
import {
  classifyContent,
  collectHeadings,
  detectMarkers,
  packParagraphs,
  splitParagraphs,
} from '../TextHeuristics.js';

/** 逐頁取出文字，保留 pdf.js 標記的換行 */
export async function extractPageTexts(bytes: Uint8Array): Promise<string[]> {
  // unpdf 會接管傳入的 buffer，先複製一份
  const pdf = await getDocumentProxy(new Uint8Array(bytes));
  const pages: string[] = [];
  for (let i = 1; i <= pdf.numPages; i++) {
    const page = await pdf.getPage(i);
    const textContent = await page.getTextContent();
    let text = '';
    for (const item of textContent.items) {
      if (!('str' in item)) continue;
      text += item.str;
      text += item.hasEOL ? '\n' : ' ';
    }
    pages.push(text.replace(/[ \t]+\n/g, '\n').trim());
  }
  return pages;
}

/** PDF 文字通常沒有空白行；沒有段落分隔時退回逐行 */
function pageParagraphs(text: string): string[] {
  const paragraphs = splitParagraphs(text);
  if (paragraphs.length > 1 || text.length <= 400) return paragraphs;
  return text.split('\n').map((l) => l.trim()).filter(Boolean);
}

export const pdfHandler: FileHandler = async (bytes, ctx) => {
  const pageTexts = await extractPageTexts(bytes);

  const pages: PageStructure[] = [];
  const chunks: RawChunk[] = [];
  const headings: string[] = [];

  pageTexts.forEach((text, i) => {
    const pageNumber = i + 1;
    const paragraphs = pageParagraphs(text);
    const pageHeadings = collectHeadings(text, 10);
    headings.push(...pageHeadings.map((h) => h.text));

    pages.push({
      pageNumber,
      headings: pageHeadings,
      markers: detectMarkers(text),
      paragraphCount: paragraphs.filter((p) => p.length > 50).length,
      contentType: text ? classifyContent(text) : 'short_text',
    });

    // chunk 不跨頁
    for (const piece of packParagraphs(paragraphs, ctx.options.targetChunkChars)) {
      chunks.push({
        text: piece,
        location: `page ${pageNumber}`,
        contentType: classifyContent(piece),
      });
    }
  });

  const tableCount = pages.reduce((n, p) => n + p.markers.tables.length, 0);
  const figureCount = pages.reduce((n, p) => n + p.markers.figures.length, 0);
  return {
    structure: { kind: 'pdf', pageCount: pageTexts.length, pages },
    chunks,
    headings,
    statsLine: `Pages: ${pageTexts.length} | Tables: ${tableCount} | Figures: ${figureCount}`,
  };
};
