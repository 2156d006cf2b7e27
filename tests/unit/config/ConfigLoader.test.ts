import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CONFIG_FILE_NAME, loadConfig, resolveConfigPath } from '../../../src/config/ConfigLoader.js';

describe('ConfigLoader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crossdoc-config-'));
    vi.stubEnv('OPENAI_BASE_URL', '');
    vi.stubEnv('CROSSDOC_LOG_LEVEL', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should return default config when no file exists', () => {
    const config = loadConfig(tmpDir);

    expect(config.embedding.provider).toBe('openai');
    expect(config.embedding.dimension).toBe(1536);
    expect(config.search.depths.quick).toEqual({ numDocuments: 2, numChunks: 5 });
    expect(config.search.depths.standard).toEqual({ numDocuments: 3, numChunks: 8 });
    expect(config.search.depths.deep).toEqual({ numDocuments: 5, numChunks: 15 });
    expect(config.llm.provider).toBe('none');
  });

  it('should merge partial overrides over defaults', () => {
    const config = loadConfig(tmpDir, {
      embedding: { provider: 'local', dimension: 384 },
    });

    expect(config.embedding.provider).toBe('local');
    expect(config.embedding.dimension).toBe(384);
    // 其他欄位仍用 defaults
    expect(config.embedding.maxBatchSize).toBe(100);
    expect(config.analysis.tabularRowsPerChunk).toBe(20);
  });

  /**
   * Scenario: 合併順序
   * Given .crossdoc.json 設定 quick 深度與 collection root
   * And 程式碼覆蓋 collection root
   * When 載入設定
   * Then 覆蓋值優先於檔案，檔案優先於預設
   */
  it('should layer defaults, file and overrides in that order', () => {
    fs.writeFileSync(path.join(tmpDir, CONFIG_FILE_NAME), JSON.stringify({
      collection: { root: 'from-file' },
      search: { depths: { quick: { numDocuments: 1, numChunks: 3 } } },
    }));

    const config = loadConfig(tmpDir, { collection: { root: 'from-override' } });

    expect(config.collection.root).toBe('from-override');
    expect(config.search.depths.quick).toEqual({ numDocuments: 1, numChunks: 3 });
    expect(config.search.depths.deep).toEqual({ numDocuments: 5, numChunks: 15 });
  });

  it('should validate dimension is a positive integer', () => {
    expect(() => loadConfig(tmpDir, { embedding: { dimension: -1 } }))
      .toThrow('embedding.dimension: dimension must be a positive integer');
  });

  it('should reject an unknown embedding provider from the file', () => {
    fs.writeFileSync(path.join(tmpDir, CONFIG_FILE_NAME), JSON.stringify({
      embedding: { provider: 'carrier-pigeon' },
    }));

    expect(() => loadConfig(tmpDir)).toThrow(/^Invalid configuration: embedding\.provider/);
  });

  it('should report a config file that is not JSON', () => {
    fs.writeFileSync(path.join(tmpDir, CONFIG_FILE_NAME), '{ not json');

    expect(() => loadConfig(tmpDir)).toThrow(/^Cannot parse \.crossdoc\.json/);
  });

  it('should apply environment overrides after validation', () => {
    vi.stubEnv('OPENAI_BASE_URL', 'http://localhost:8080/v1');
    vi.stubEnv('CROSSDOC_LOG_LEVEL', 'debug');

    const config = loadConfig(tmpDir);

    expect(config.embedding.baseUrl).toBe('http://localhost:8080/v1');
    expect(config.llm.baseUrl).toBe('http://localhost:8080/v1');
    expect(config.logging.level).toBe('debug');
  });

  it('should reject an unknown log level from the environment', () => {
    vi.stubEnv('CROSSDOC_LOG_LEVEL', 'loud');

    expect(() => loadConfig(tmpDir)).toThrow('CROSSDOC_LOG_LEVEL must be one of debug, info, warn, error');
  });

  it('should resolve relative paths against the repo root', () => {
    expect(resolveConfigPath('/repo', '.crossdoc/index.db')).toBe(path.join('/repo', '.crossdoc/index.db'));
    expect(resolveConfigPath('/repo', '/var/index.db')).toBe('/var/index.db');
  });
});
