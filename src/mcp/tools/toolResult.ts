import { CrossdocError } from '../../domain/errors/DomainErrors.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text' as const, text }] };
}

/** 領域錯誤轉成工具錯誤結果；其他錯誤往上拋給 SDK */
export function domainErrorResult(err: unknown): ToolResult {
  if (!(err instanceof CrossdocError)) throw err;
  return {
    content: [{ type: 'text' as const, text: `Error [${err.code}]: ${err.message}` }],
    isError: true,
  };
}
