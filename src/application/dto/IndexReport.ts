/** 單一檔案的失敗紀錄 */
export interface IndexFailure {
  path: string;
  code: string;
  message: string;
}

/** ensureFresh 的批次結果 */
export interface IndexReport {
  documentsIndexed: number;
  documentsSkipped: number;
  documentsRemoved: number;
  chunksEmbedded: number;
  failures: IndexFailure[];
  /** 被 AbortSignal 中止；已寫入的文件保留，進行中的文件捨棄 */
  cancelled: boolean;
  durationMs: number;
}

export function emptyIndexReport(): IndexReport {
  return {
    documentsIndexed: 0,
    documentsSkipped: 0,
    documentsRemoved: 0,
    chunksEmbedded: 0,
    failures: [],
    cancelled: false,
    durationMs: 0,
  };
}
