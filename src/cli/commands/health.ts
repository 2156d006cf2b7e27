import type { Command } from 'commander';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import { parseFormat, withRuntime } from './shared.js';
import type { CommonOptions } from './shared.js';

interface HealthOptions extends CommonOptions {
  fix: boolean;
  services: boolean;
}

/** 註冊 health 指令 */
export function registerHealthCommand(program: Command): void {
  program
    .command('health')
    .description('Check index health and consistency')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .option('--fix', 'Delete orphaned chunks and vectors', false)
    .option('--services', 'Also check the embedding and generation providers', false)
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: HealthOptions) => {
      const formatter = new ProgressiveDisclosureFormatter();
      await withRuntime(opts, async (runtime) => {
        const report = runtime.health.check({ fix: opts.fix });
        const services = opts.services ? await runtime.health.checkServices() : undefined;
        process.stdout.write(formatter.formatObject(services ? { ...report, services } : report, opts.format) + '\n');
        process.exitCode = report.healthy ? 0 : 1;
      });
    });
}
