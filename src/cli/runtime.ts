import path from 'node:path';
import { loadConfig, resolveConfigPath } from '../config/ConfigLoader.js';
import type { CrossdocConfig, PartialConfig } from '../config/ConfigLoader.js';
import { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import { SqliteVectorStore } from '../infrastructure/sqlite/SqliteVectorStore.js';
import { OpenAIEmbeddingAdapter } from '../infrastructure/embedding/OpenAIEmbeddingAdapter.js';
import { HashingEmbeddingAdapter } from '../infrastructure/embedding/HashingEmbeddingAdapter.js';
import { EmbeddingBatcher } from '../infrastructure/embedding/EmbeddingBatcher.js';
import { HttpGenerationAdapter } from '../infrastructure/generation/HttpGenerationAdapter.js';
import { NullGenerationAdapter } from '../infrastructure/generation/NullGenerationAdapter.js';
import { FileSystemSourceAdapter } from '../infrastructure/filesystem/FileSystemSourceAdapter.js';
import { DocumentAnalyzer } from '../infrastructure/analysis/DocumentAnalyzer.js';
import { IndexUseCase } from '../application/IndexUseCase.js';
import { SearchUseCase } from '../application/SearchUseCase.js';
import type { FreshnessSweep } from '../application/SearchUseCase.js';
import { CollectionUseCase } from '../application/CollectionUseCase.js';
import { HealthCheckUseCase } from '../application/HealthCheckUseCase.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { GenerationPort } from '../domain/ports/GenerationPort.js';
import { Logger } from '../shared/Logger.js';

/** CLI 與 MCP 共用的組裝結果 */
export interface Runtime {
  repoRoot: string;
  collectionRoot: string;
  config: CrossdocConfig;
  logger: Logger;
  store: SqliteVectorStore;
  index: IndexUseCase;
  search: SearchUseCase;
  collection: CollectionUseCase;
  health: HealthCheckUseCase;
  close(): void;
}

/** 可替換的外部依賴（測試注入假的 embedding / generation） */
export interface RuntimeOverrides {
  config?: PartialConfig;
  embedding?: EmbeddingPort;
  generator?: GenerationPort;
}

export function createEmbedding(config: CrossdocConfig): EmbeddingPort {
  if (config.embedding.provider === 'local') {
    return new HashingEmbeddingAdapter(config.embedding.dimension);
  }
  return new OpenAIEmbeddingAdapter({
    apiKey: config.embedding.apiKey ?? process.env.OPENAI_API_KEY ?? '',
    model: config.embedding.model,
    dimension: config.embedding.dimension,
    baseUrl: config.embedding.baseUrl,
  });
}

export function createGenerator(config: CrossdocConfig, logger: Logger): GenerationPort {
  if (config.llm.provider === 'openai-compatible') {
    return new HttpGenerationAdapter({
      baseUrl: config.llm.baseUrl,
      apiKey: config.llm.apiKey ?? process.env.OPENAI_API_KEY,
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
    }, logger.child('generation'));
  }
  return new NullGenerationAdapter();
}

export function createRuntime(repoRootArg: string, overrides: RuntimeOverrides = {}): Runtime {
  const repoRoot = path.resolve(repoRootArg);
  const config = loadConfig(repoRoot, overrides.config);
  const logger = new Logger('crossdoc', config.logging.level);

  const embedding = overrides.embedding ?? createEmbedding(config);
  const generator = overrides.generator ?? createGenerator(config, logger);

  const dbMgr = new DatabaseManager(
    resolveConfigPath(repoRoot, config.index.dbPath),
    { dimension: embedding.dimension, modelId: embedding.modelId },
    logger.child('db'),
  );

  try {
    const store = new SqliteVectorStore(
      dbMgr,
      { candidateMultiplier: config.search.candidateMultiplier },
      logger.child('store'),
    );
    const files = new FileSystemSourceAdapter();
    const batcher = new EmbeddingBatcher(embedding, config.embedding.maxBatchSize, logger.child('embedding'));
    const analyzer = new DocumentAnalyzer(files, batcher, config.analysis, undefined, logger.child('analyzer'));
    const index = new IndexUseCase(store, analyzer, files, logger.child('index'));

    const collectionRoot = resolveConfigPath(repoRoot, config.collection.root);
    const freshness: FreshnessSweep = (sourcePaths, signal) =>
      sourcePaths && sourcePaths.length > 0
        ? index.ensureFresh(sourcePaths, { signal })
        : index.ensureFreshDirectory(collectionRoot, signal);

    const search = new SearchUseCase(
      store,
      embedding,
      generator,
      config.search,
      config.llm,
      freshness,
      logger.child('search'),
    );

    return {
      repoRoot,
      collectionRoot,
      config,
      logger,
      store,
      index,
      search,
      collection: new CollectionUseCase(store),
      health: new HealthCheckUseCase(dbMgr.getDb(), embedding.dimension, { embedding, generator }),
      close: () => store.teardown(),
    };
  } catch (err) {
    dbMgr.close();
    throw err;
  }
}
