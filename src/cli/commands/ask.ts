import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import path from 'node:path';
import { GenerationError } from '../../domain/errors/DomainErrors.js';
import { ANALYSIS_DEPTHS, isAnalysisDepth } from '../../domain/value-objects/AnalysisDepth.js';
import type { AnalysisDepth } from '../../domain/value-objects/AnalysisDepth.js';
import {
  ProgressiveDisclosureFormatter,
  isDetailLevel,
} from '../formatters/ProgressiveDisclosureFormatter.js';
import type { DetailLevel } from '../formatters/ProgressiveDisclosureFormatter.js';
import { interruptSignal, parseFormat, withRuntime } from './shared.js';
import type { CommonOptions } from './shared.js';

interface AskOptions extends CommonOptions {
  depth: AnalysisDepth;
  level: DetailLevel;
  refresh: boolean;
  source?: string[];
}

function parseDepth(value: string): AnalysisDepth {
  if (!isAnalysisDepth(value)) {
    throw new InvalidArgumentError(`Allowed values: ${ANALYSIS_DEPTHS.join(', ')}.`);
  }
  return value;
}

function parseLevel(value: string): DetailLevel {
  if (!isDetailLevel(value)) {
    throw new InvalidArgumentError('Allowed values: brief, normal, full.');
  }
  return value;
}

/** 註冊 ask 指令：跨文件問答 */
export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Answer a question from the indexed documents, citing its sources')
    .argument('<question>', 'Question to answer')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .option('--depth <depth>', 'Analysis depth: quick, standard, deep', parseDepth, 'standard')
    .option('--level <level>', 'Detail level: brief, normal, full', parseLevel, 'normal')
    .option('--source <paths...>', 'Only refresh these files before answering')
    .option('--no-refresh', 'Skip the index freshness sweep before answering')
    .action(async (question: string, opts: AskOptions) => {
      const formatter = new ProgressiveDisclosureFormatter();
      const interrupt = interruptSignal();

      try {
        await withRuntime(opts, async (runtime) => {
          try {
            const response = await runtime.search.comprehensiveSearch({
              question,
              depth: opts.depth,
              sourcePaths: opts.source?.map((p) => path.resolve(p)),
              skipFreshness: !opts.refresh,
              signal: interrupt.signal,
            });

            if (opts.format === 'text' && response.warnings.length > 0) {
              process.stderr.write(response.warnings.map((w) => `Warning: ${w}`).join('\n') + '\n');
            }
            process.stdout.write(formatter.formatAnswer(response, opts.format, opts.level) + '\n');
          } catch (err) {
            if (!(err instanceof GenerationError)) throw err;
            // 生成失敗仍輸出已檢索到的內容
            process.stdout.write(formatter.formatFallback(err, opts.format) + '\n');
            process.exitCode = 2;
          }
        });
      } finally {
        interrupt.dispose();
      }
    });
}
