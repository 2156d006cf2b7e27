import type { VectorStorePort } from '../domain/ports/VectorStorePort.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { GenerationPort } from '../domain/ports/GenerationPort.js';
import type { LLMConfig, SearchConfig } from '../config/types.js';
import type { SearchRequest } from './dto/SearchRequest.js';
import type { Citation, SearchResponse } from './dto/SearchResponse.js';
import type { IndexReport } from './dto/IndexReport.js';
import type { ScoredDocument, StageTiming } from '../domain/entities/SearchResult.js';
import { assembleContext } from './ContextBuilder.js';
import { buildAnswerPrompt } from './PromptTemplate.js';
import {
  GenerationError,
  NoDocumentsIndexedError,
  isRetryableError,
} from '../domain/errors/DomainErrors.js';
import { withRetry } from '../shared/RetryPolicy.js';
import { Logger, describeError } from '../shared/Logger.js';
import { errorMessageOf } from '../shared/HttpErrors.js';

/** 查詢前的索引同步；sourcePaths 未指定時同步整個文件集合 */
export type FreshnessSweep = (sourcePaths: string[] | undefined, signal?: AbortSignal) => Promise<IndexReport>;

export type GenerationSettings = Pick<LLMConfig, 'timeoutMs' | 'maxRetries' | 'retryBaseDelayMs'>;

/**
 * 跨文件問答管線
 *
 *   (1) 同步索引（可關閉）
 *   (2) 問題嵌入（與索引同一個 embedder）
 *   (3) 文件層 + chunk 層的平衡檢索
 *   (4) 組 context（摘要 + chunk，受字元上限約束）
 *   (5) 生成（逾時 + 有限次重試）
 *
 * 生成失敗時拋出 GenerationError，保留已組好的 context 與引用。
 */
export class SearchUseCase {
  private readonly logger: Logger;

  constructor(
    private readonly store: VectorStorePort,
    private readonly embedding: EmbeddingPort,
    private readonly generator: GenerationPort,
    private readonly searchConfig: SearchConfig,
    private readonly generation: GenerationSettings,
    private readonly freshness?: FreshnessSweep,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger('SearchUseCase');
  }

  async comprehensiveSearch(request: SearchRequest): Promise<SearchResponse> {
    const depth = request.depth ?? 'standard';
    const { numDocuments, numChunks } = this.searchConfig.depths[depth];
    const warnings: string[] = [];
    const timing: StageTiming = { indexMs: 0, searchMs: 0, generationMs: 0 };

    // (1) 同步索引
    let indexReport: IndexReport | undefined;
    if (this.freshness && this.searchConfig.ensureFreshBeforeQuery && !request.skipFreshness) {
      const indexStart = Date.now();
      indexReport = await this.freshness(request.sourcePaths, request.signal);
      timing.indexMs = Date.now() - indexStart;
      for (const failure of indexReport.failures) {
        warnings.push(`Skipped ${failure.path}: ${failure.message}`);
      }
    }

    if (this.store.stats().totalDocuments === 0) {
      throw new NoDocumentsIndexedError();
    }

    // (2)(3) 嵌入問題並檢索
    const searchStart = Date.now();
    const { vector } = await this.embedding.embedOne(request.question);
    const hybrid = this.store.hybridSearch(vector, numDocuments, numChunks);

    // (4) context
    const context = assembleContext(hybrid.documents, hybrid.chunks, {
      maxChars: this.searchConfig.maxContextChars,
      summaryChars: this.searchConfig.summaryCharsInContext,
    });
    timing.searchMs = Date.now() - searchStart;
    if (context.droppedChunks > 0) {
      warnings.push(`${context.droppedChunks} chunk(s) dropped to fit the context limit`);
    }

    // (5) 生成
    const generationStart = Date.now();
    let answer: string;
    try {
      answer = await withRetry(
        () => this.generator.generate(buildAnswerPrompt(request.question, context.text), {
          timeoutMs: this.generation.timeoutMs,
          signal: request.signal,
        }),
        {
          maxRetries: this.generation.maxRetries,
          baseDelayMs: this.generation.retryBaseDelayMs,
          isRetryable: isRetryableError,
          onRetry: (attempt, err) => this.logger.warn('Generation failed, retrying', { attempt, ...describeError(err) }),
          signal: request.signal,
        },
      );
    } catch (err) {
      timing.generationMs = Date.now() - generationStart;
      this.logger.error('Generation failed', { depth, ...describeError(err) });
      throw new GenerationError(
        `Answer generation failed: ${errorMessageOf(err)}`,
        context.text,
        context.documentIds,
        timing,
        { cause: err },
      );
    }
    timing.generationMs = Date.now() - generationStart;

    this.logger.info('Question answered', {
      depth,
      documents: context.documentIds.length,
      chunks: context.chunks.length,
      ...timing,
    });

    return {
      question: request.question,
      depth,
      answer,
      citations: context.documentIds,
      citedDocuments: this.describeCitations(hybrid.documents, context.chunks, context.documentIds),
      perDocumentChunkCounts: context.perDocumentChunkCounts,
      chunks: context.chunks,
      context: context.text,
      timing,
      indexReport,
      warnings,
    };
  }

  private describeCitations(
    documents: ScoredDocument[],
    chunks: SearchResponse['chunks'],
    documentIds: string[],
  ): Citation[] {
    const byId = new Map(documents.map((d) => [d.documentId, d]));
    const citations: Citation[] = [];
    for (const id of documentIds) {
      const doc = byId.get(id);
      if (!doc) continue;
      citations.push({
        documentId: id,
        sourcePath: doc.sourcePath,
        fileType: doc.fileType,
        locations: [...new Set(chunks.filter((c) => c.documentId === id).map((c) => c.location))],
      });
    }
    return citations;
  }
}
