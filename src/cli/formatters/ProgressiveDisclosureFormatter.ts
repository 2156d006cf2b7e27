import path from 'node:path';
import type { SearchResponse } from '../../application/dto/SearchResponse.js';
import type { IndexReport } from '../../application/dto/IndexReport.js';
import type { GenerationError } from '../../domain/errors/DomainErrors.js';

export type OutputFormat = 'json' | 'text';
export type DetailLevel = 'brief' | 'normal' | 'full';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text'];
export const DETAIL_LEVELS: readonly DetailLevel[] = ['brief', 'normal', 'full'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

export function isDetailLevel(value: string): value is DetailLevel {
  return DETAIL_LEVELS.some((l) => l === value);
}

/**
 * 漸進式揭露格式化器：根據 level 控制問答輸出的細節
 *
 * - brief：答案 + 引用檔名
 * - normal：再加上每份文件的 chunk 數、位置與耗時（預設）
 * - full：再加上送給模型的完整 context
 */
export class ProgressiveDisclosureFormatter {
  formatAnswer(
    response: SearchResponse,
    format: OutputFormat,
    level: DetailLevel = 'normal',
  ): string {
    if (format === 'json') {
      return JSON.stringify(this.shapeAnswer(response, level), null, 2);
    }
    return this.textAnswer(response, level);
  }

  /** 生成失敗時的抽取式回覆：直接列出已組好的摘要與片段 */
  formatFallback(err: GenerationError, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify({
        error: err.message,
        code: err.code,
        citations: err.citations,
        timing: err.timing,
        context: err.context,
      }, null, 2);
    }
    return [
      err.message,
      'Relevant excerpts from the indexed documents:',
      '',
      err.context,
    ].join('\n');
  }

  formatIndexReport(report: IndexReport, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(report, null, 2);
    }
    const lines = [
      `Indexed: ${report.documentsIndexed} | Unchanged: ${report.documentsSkipped} | Removed: ${report.documentsRemoved} | Chunks embedded: ${report.chunksEmbedded}`,
      `Duration: ${report.durationMs}ms${report.cancelled ? ' (cancelled)' : ''}`,
    ];
    for (const f of report.failures) {
      lines.push(`  FAILED ${f.path} [${f.code}] ${f.message}`);
    }
    return lines.join('\n');
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 根據 level 篩選欄位 */
  private shapeAnswer(response: SearchResponse, level: DetailLevel): Record<string, unknown> {
    const shaped: Record<string, unknown> = {
      question: response.question,
      depth: response.depth,
      answer: response.answer,
      citations: response.citedDocuments.map((c) => c.sourcePath),
    };
    if (level === 'brief') return shaped;

    shaped.citedDocuments = response.citedDocuments;
    shaped.perDocumentChunkCounts = response.perDocumentChunkCounts;
    shaped.timing = response.timing;
    shaped.warnings = response.warnings;
    if (level === 'full') {
      shaped.chunks = response.chunks;
      shaped.context = response.context;
      shaped.indexReport = response.indexReport;
    }
    return shaped;
  }

  private textAnswer(response: SearchResponse, level: DetailLevel): string {
    const lines = [response.answer, ''];

    if (response.citedDocuments.length === 0) {
      lines.push('Sources: none');
    } else {
      lines.push('Sources:');
      for (const c of response.citedDocuments) {
        const name = path.basename(c.sourcePath);
        if (level === 'brief') {
          lines.push(`  - ${name}`);
          continue;
        }
        const count = response.perDocumentChunkCounts[c.documentId] ?? 0;
        lines.push(`  - ${name} (${c.fileType}, ${count} excerpt${count === 1 ? '' : 's'}): ${c.locations.join(', ')}`);
      }
    }
    if (level === 'brief') return lines.join('\n');

    const { indexMs, searchMs, generationMs } = response.timing;
    lines.push('', `Depth: ${response.depth} | index ${indexMs}ms | search ${searchMs}ms | generation ${generationMs}ms`);
    for (const w of response.warnings) {
      lines.push(`Warning: ${w}`);
    }

    if (level === 'full') {
      lines.push('', '--- context ---', response.context);
    }
    return lines.join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
