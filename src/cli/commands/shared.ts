import { InvalidArgumentError } from 'commander';
import { createRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { isOutputFormat } from '../formatters/ProgressiveDisclosureFormatter.js';
import type { OutputFormat } from '../formatters/ProgressiveDisclosureFormatter.js';

/** 每個指令共用的選項 */
export interface CommonOptions {
  repoRoot: string;
  format: OutputFormat;
}

/** commander 的 argParser：驗證 --format */
export function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError('Allowed values: json, text.');
  }
  return value;
}

/** 開啟 runtime、執行指令，結束時一定關閉資料庫 */
export async function withRuntime<T>(
  opts: CommonOptions,
  action: (runtime: Runtime) => Promise<T> | T,
): Promise<T> {
  const runtime = createRuntime(opts.repoRoot);
  try {
    return await action(runtime);
  } finally {
    runtime.close();
  }
}

/** SIGINT 轉成 AbortSignal，讓長時間的同步可以在文件之間停下 */
export function interruptSignal(): { signal: AbortSignal; dispose(): void } {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => process.off('SIGINT', onInterrupt),
  };
}
