import path from 'node:path';
import type { BalancedChunk, ScoredDocument } from '../domain/entities/SearchResult.js';
import { truncate } from '../shared/TextUtils.js';

export interface ContextOptions {
  maxChars: number;
  summaryChars: number;
}

export interface AssembledContext {
  text: string;
  /** 留在 context 中的 chunk，依原本的平衡選取順序 */
  chunks: BalancedChunk[];
  /** 有 chunk 留下的文件 id，依 context 中出現的順序 */
  documentIds: string[];
  perDocumentChunkCounts: Record<string, number>;
  droppedChunks: number;
}

function renderDocument(doc: ScoredDocument | undefined, documentId: string, chunks: BalancedChunk[], summaryChars: number): string {
  const name = doc ? path.basename(doc.sourcePath) : documentId;
  const lines = [`=== Document: ${name}${doc ? ` (${doc.fileType})` : ''} ===`];
  if (doc && summaryChars > 0) {
    lines.push(`Summary: ${truncate(doc.summaryText, summaryChars)}`);
    if (doc.topics.length > 0) lines.push(`Topics: ${doc.topics.slice(0, 10).join(', ')}`);
  }
  for (const chunk of chunks) {
    lines.push('', `[${chunk.location}]`, chunk.text);
  }
  return lines.join('\n');
}

function render(documents: Map<string, ScoredDocument>, chunks: BalancedChunk[], summaryChars: number): string {
  const order: string[] = [];
  const grouped = new Map<string, BalancedChunk[]>();
  for (const chunk of chunks) {
    const list = grouped.get(chunk.documentId);
    if (list) {
      list.push(chunk);
    } else {
      grouped.set(chunk.documentId, [chunk]);
      order.push(chunk.documentId);
    }
  }
  return order
    .map((id) => renderDocument(documents.get(id), id, grouped.get(id) ?? [], summaryChars))
    .join('\n\n');
}

/** 分數最低者；同分時取平衡順序中較後面的 */
function lowestRankedIndex(chunks: BalancedChunk[]): number {
  let worst = 0;
  for (let i = 1; i < chunks.length; i++) {
    if (chunks[i].score <= chunks[worst].score) worst = i;
  }
  return worst;
}

/**
 * 組出送給模型的 context
 *
 * 每份文件（依首次出現順序）先放一次摘要，再放其 chunk。
 * 超過 maxChars 時從分數最低的 chunk 開始捨棄；摘要與標頭也算在上限內。
 * 沒有 chunk 留下的文件連同摘要一起移除，因此引用只會指向 context 中真的存在的內容。
 */
export function assembleContext(
  documents: readonly ScoredDocument[],
  chunks: readonly BalancedChunk[],
  options: ContextOptions,
): AssembledContext {
  const byId = new Map(documents.map((d) => [d.documentId, d]));
  let kept = [...chunks];
  let summaryChars = options.summaryChars;
  let text = render(byId, kept, summaryChars);

  while (text.length > options.maxChars && kept.length > 1) {
    kept.splice(lowestRankedIndex(kept), 1);
    text = render(byId, kept, summaryChars);
  }
  if (text.length > options.maxChars && kept.length === 1) {
    // 只剩一個 chunk 仍超過上限：依序縮短 chunk 與摘要，而不是清空 context
    const only = kept[0];
    const overflow = text.length - options.maxChars;
    kept = [{ ...only, text: truncate(only.text, Math.max(only.text.length - overflow, 0)) }];
    text = render(byId, kept, summaryChars);

    const doc = byId.get(only.documentId);
    if (text.length > options.maxChars && doc && summaryChars > 0) {
      const summaryLength = Math.min(doc.summaryText.length, summaryChars);
      summaryChars = Math.max(summaryLength - (text.length - options.maxChars), 0);
      text = render(byId, kept, summaryChars);
    }
    if (text.length > options.maxChars) {
      // 文件標頭本身就超過上限
      text = truncate(text, options.maxChars);
    }
  }

  const documentIds: string[] = [];
  const perDocumentChunkCounts: Record<string, number> = {};
  for (const chunk of kept) {
    if (!(chunk.documentId in perDocumentChunkCounts)) {
      documentIds.push(chunk.documentId);
      perDocumentChunkCounts[chunk.documentId] = 0;
    }
    perDocumentChunkCounts[chunk.documentId]++;
  }

  return {
    text,
    chunks: kept,
    documentIds,
    perDocumentChunkCounts,
    droppedChunks: chunks.length - kept.length,
  };
}
