import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import type { CrossdocConfig, PartialConfig } from './types.js';
import { LOG_LEVELS, isLogLevel } from '../shared/Logger.js';

export type { CrossdocConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.crossdoc.json';

const positiveInt = z.number().int().positive();

const depthSchema = z.object({
  numDocuments: positiveInt,
  numChunks: positiveInt,
});

const configSchema = z.object({
  version: z.number(),
  collection: z.object({ root: z.string().min(1) }),
  index: z.object({ dbPath: z.string().min(1) }),
  embedding: z.object({
    provider: z.enum(['openai', 'local']),
    model: z.string().min(1),
    dimension: z.number().int().positive({ message: 'dimension must be a positive integer' }),
    maxBatchSize: positiveInt,
    apiKey: z.string().optional(),
    baseUrl: z.string().optional(),
  }),
  analysis: z.object({
    targetChunkChars: positiveInt,
    tabularRowsPerChunk: positiveInt,
    wordParagraphsPerChunk: positiveInt,
    structuredChunkChars: positiveInt,
    summaryMaxChars: positiveInt,
    summaryLeadChunks: z.number().int().nonnegative(),
    maxTopics: positiveInt,
  }),
  search: z.object({
    depths: z.object({ quick: depthSchema, standard: depthSchema, deep: depthSchema }),
    candidateMultiplier: positiveInt,
    maxContextChars: positiveInt,
    summaryCharsInContext: z.number().int().nonnegative(),
    ensureFreshBeforeQuery: z.boolean(),
  }),
  llm: z.object({
    provider: z.enum(['openai-compatible', 'none']),
    baseUrl: z.string().min(1),
    apiKey: z.string().optional(),
    model: z.string().min(1),
    timeoutMs: positiveInt,
    maxRetries: z.number().int().nonnegative(),
    retryBaseDelayMs: z.number().nonnegative(),
    temperature: z.number().min(0).max(2),
    maxTokens: positiveInt,
  }),
  logging: z.object({ level: z.enum(['debug', 'info', 'warn', 'error']) }),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 深層合併：override 覆蓋 base，undefined 不覆蓋 */
function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;

  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    result[key] = deepMerge(base[key], val);
  }
  return result;
}

/**
 * 環境變數覆蓋 config：
 * OPENAI_BASE_URL → embedding.baseUrl & llm.baseUrl
 * CROSSDOC_LOG_LEVEL → logging.level
 */
function applyEnvOverrides(config: CrossdocConfig): void {
  const baseUrl = process.env.OPENAI_BASE_URL;
  if (baseUrl) {
    config.embedding.baseUrl = baseUrl;
    config.llm.baseUrl = baseUrl;
  }

  const level = process.env.CROSSDOC_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(`CROSSDOC_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }
    config.logging.level = level;
  }
}

/** 驗證設定值的合法性 */
function validate(merged: unknown): CrossdocConfig {
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

/**
 * 載入設定：讀取 .crossdoc.json（若存在）並合併到預設值上
 * @param repoRoot - repo 根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  repoRoot: string,
  overrides?: PartialConfig,
): CrossdocConfig {
  let fileConfig: unknown = {};

  const configPath = path.join(repoRoot, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf-8');
    try {
      fileConfig = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Cannot parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }

  // 合併順序：defaults < file config < overrides
  let merged = deepMerge(structuredClone(DEFAULT_CONFIG), fileConfig);
  if (overrides) {
    merged = deepMerge(merged, overrides);
  }

  const config = validate(merged);

  // 環境變數覆蓋（.mcp.json env 或系統環境變數）優先於檔案設定
  applyEnvOverrides(config);
  return config;
}

/** 把相對路徑設定解析成絕對路徑 */
export function resolveConfigPath(repoRoot: string, configured: string): string {
  return path.isAbsolute(configured) ? configured : path.join(repoRoot, configured);
}
