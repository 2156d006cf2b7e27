import type { Command } from 'commander';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import { parseFormat, withRuntime } from './shared.js';
import type { CommonOptions } from './shared.js';

/** 註冊 stats 指令：整個文件集合的概況 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show collection statistics and per-document topics')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: CommonOptions) => {
      const formatter = new ProgressiveDisclosureFormatter();
      await withRuntime(opts, (runtime) => {
        const analysis = runtime.collection.analyzeCollection();
        process.stdout.write(formatter.formatObject(analysis, opts.format) + '\n');
      });
    });
}
