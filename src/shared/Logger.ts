export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

/** 結構化 JSON logger，一行一筆寫到 stderr（stdout 保留給指令輸出與 MCP stdio） */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = 'info',
  ) {}

  /** 沿用同一個最低等級，換一個 context */
  child(context: string): Logger {
    return new Logger(`${this.context}.${context}`, this.minLevel);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}

/** 把未知的錯誤值轉成可記錄的欄位 */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = 'code' in err ? err.code : undefined;
    return { error: err.message, errorName: err.name, ...(code !== undefined ? { code } : {}) };
  }
  return { error: String(err) };
}
