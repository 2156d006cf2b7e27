import path from 'node:path';
import type { FileType } from '../../domain/entities/Document.js';
import { truncate } from '../../shared/TextUtils.js';

export interface SummaryInput {
  filePath: string;
  fileType: FileType;
  headings: readonly string[];
  statsLine: string;
  chunkTexts: readonly string[];
}

export interface SummaryOptions {
  leadChunks: number;
  maxChars: number;
}

const MAX_SUMMARY_HEADINGS = 10;

/**
 * 文件摘要：檔名與類型、標題、類型統計，接著前幾個 chunk 的內容
 */
export function buildSummary(input: SummaryInput, options: SummaryOptions): string {
  const lines = [`${path.basename(input.filePath)} (${input.fileType})`];
  if (input.headings.length > 0) {
    lines.push(`Sections: ${input.headings.slice(0, MAX_SUMMARY_HEADINGS).join('; ')}`);
  }
  if (input.statsLine) lines.push(input.statsLine);

  const lead = input.chunkTexts.slice(0, options.leadChunks);
  const summary = lead.length > 0
    ? `${lines.join('\n')}\n\n${lead.join('\n\n')}`
    : lines.join('\n');
  return truncate(summary, options.maxChars);
}
