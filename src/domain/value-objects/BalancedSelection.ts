import type { BalancedChunk, ScoredChunk } from '../entities/SearchResult.js';

/** 分數高者優先，同分依 id 排序以保持結果穩定 */
export function compareByScore(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

/**
 * 跨文件平衡選取
 *
 * 1. 每份文件配額 = ceil(numChunks / 實際選中的文件數)
 *    索引中的文件少於要求的 numDocuments 時，以實際文件數計算，配額會較大
 * 2. 依文件名次輪流挑選各自分數最高的候選 chunk，直到配額或候選用盡
 * 3. 剩餘名額從未選中的候選依全域分數補滿（可能超過名目配額）
 *
 * 輸出順序：配額選取（輪詢順序）在前，補位選取在後；rank 為輸出中的名次（從 1 開始）
 */
export class BalancedSelection {
  static select(
    rankedDocumentIds: readonly string[],
    candidates: readonly ScoredChunk[],
    numChunks: number,
  ): BalancedChunk[] {
    if (rankedDocumentIds.length === 0 || numChunks <= 0) return [];

    const quota = BalancedSelection.quotaFor(numChunks, rankedDocumentIds.length);
    const rankOf = new Map<string, number>();
    rankedDocumentIds.forEach((id, i) => rankOf.set(id, i + 1));

    const queues = new Map<string, ScoredChunk[]>();
    for (const id of rankedDocumentIds) queues.set(id, []);
    for (const c of candidates) queues.get(c.documentId)?.push(c);
    for (const queue of queues.values()) queue.sort(compareByScore);

    const selected: BalancedChunk[] = [];
    const taken = new Set<string>();
    const perDoc = new Map<string, number>();

    let progressed = true;
    while (selected.length < numChunks && progressed) {
      progressed = false;
      for (const docId of rankedDocumentIds) {
        if (selected.length >= numChunks) break;
        const count = perDoc.get(docId) ?? 0;
        if (count >= quota) continue;
        const next = queues.get(docId)?.shift();
        if (!next) continue;
        selected.push({ ...next, rank: selected.length + 1, documentRank: rankOf.get(docId) ?? 0, selection: 'quota' });
        taken.add(next.chunkId);
        perDoc.set(docId, count + 1);
        progressed = true;
      }
    }

    if (selected.length < numChunks) {
      const leftovers = candidates
        .filter((c) => !taken.has(c.chunkId) && rankOf.has(c.documentId))
        .sort(compareByScore);
      for (const c of leftovers) {
        if (selected.length >= numChunks) break;
        selected.push({ ...c, rank: selected.length + 1, documentRank: rankOf.get(c.documentId) ?? 0, selection: 'fill' });
        taken.add(c.chunkId);
      }
    }

    return selected;
  }

  static quotaFor(numChunks: number, documentCount: number): number {
    if (documentCount <= 0) return 0;
    return Math.ceil(numChunks / documentCount);
  }
}
