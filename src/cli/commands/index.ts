import type { Command } from 'commander';
import path from 'node:path';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import { interruptSignal, parseFormat, withRuntime } from './shared.js';
import type { CommonOptions } from './shared.js';

interface IndexOptions extends CommonOptions {
  export?: string;
}

/**
 * 註冊 index 指令
 *
 * 用法：
 *   crossdoc index                 同步整個文件目錄（刪除已消失的文件）
 *   crossdoc index a.pdf b.csv     只同步指定檔案
 *   crossdoc index --export out.db 同步後另存一份索引
 */
export function registerIndexCommand(program: Command): void {
  program
    .command('index')
    .description('Bring the index up to date with the document collection')
    .argument('[paths...]', 'Files to index (default: the configured collection root)')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .option('--export <file>', 'Write a copy of the index to this file afterwards')
    .action(async (paths: string[], opts: IndexOptions) => {
      const formatter = new ProgressiveDisclosureFormatter();
      const interrupt = interruptSignal();

      try {
        await withRuntime(opts, async (runtime) => {
          const report = paths.length > 0
            ? await runtime.index.ensureFresh(
                paths.map((p) => path.resolve(p)),
                { signal: interrupt.signal },
              )
            : await runtime.index.ensureFreshDirectory(runtime.collectionRoot, interrupt.signal);

          runtime.store.save();
          if (opts.export) {
            const dest = path.resolve(opts.export);
            await runtime.store.saveTo(dest);
            runtime.logger.info('Index exported', { dest });
          }

          process.stdout.write(formatter.formatIndexReport(report, opts.format) + '\n');
          process.exitCode = report.failures.length > 0 || report.cancelled ? 1 : 0;
        });
      } finally {
        interrupt.dispose();
      }
    });
}
