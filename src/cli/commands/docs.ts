import type { Command } from 'commander';
import path from 'node:path';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import type { OutputFormat } from '../formatters/ProgressiveDisclosureFormatter.js';
import type { DocumentEntry, DocumentSummary } from '../../application/CollectionUseCase.js';
import { parseFormat, withRuntime } from './shared.js';
import type { CommonOptions } from './shared.js';

/** 註冊 docs 指令群組：list / show */
export function registerDocsCommand(program: Command): void {
  const docsCmd = program
    .command('docs')
    .description('Inspect the indexed documents');

  docsCmd
    .command('list')
    .description('List every indexed document')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: CommonOptions) => {
      await withRuntime(opts, (runtime) => {
        const entries = runtime.collection.listDocuments();
        process.stdout.write(formatList(entries, opts.format) + '\n');
      });
    });

  docsCmd
    .command('show <id>')
    .description('Show the summary and structure of one document (id or file name)')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (id: string, opts: CommonOptions) => {
      await withRuntime(opts, (runtime) => {
        const summary = runtime.collection.getDocumentSummary(id);
        process.stdout.write(formatSummary(summary, opts.format) + '\n');
      });
    });
}

function formatList(entries: DocumentEntry[], format: OutputFormat): string {
  if (format === 'json') return JSON.stringify(entries, null, 2);
  if (entries.length === 0) return 'No documents indexed.';
  return entries
    .map((e) => `${e.documentId}  ${path.basename(e.sourcePath)} (${e.fileType})  ${e.topics.slice(0, 5).join(', ')}`)
    .join('\n');
}

function formatSummary(summary: DocumentSummary, format: OutputFormat): string {
  if (format === 'json') return JSON.stringify(summary, null, 2);
  return [
    `${summary.documentId}  ${summary.sourcePath}`,
    `Type: ${summary.fileType} | Chunks: ${summary.chunkCount} | Indexed: ${new Date(summary.indexedAt).toISOString()}`,
    `Topics: ${summary.topics.join(', ') || '(none)'}`,
    '',
    summary.summaryText,
    '',
    'Structure:',
    new ProgressiveDisclosureFormatter().formatObject(summary.structure, 'text'),
  ].join('\n');
}
