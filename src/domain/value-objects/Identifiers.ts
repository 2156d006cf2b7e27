import path from 'node:path';
import { ContentHash } from './ContentHash.js';

/** 文件 id 由解析後的絕對路徑決定；內容相同但路徑不同的檔案不會合併 */
export function documentIdFor(sourcePath: string): string {
  const resolved = path.resolve(sourcePath).replace(/\\/g, '/');
  return `doc_${ContentHash.fromText(resolved).short(16)}`;
}

/** 同一位置的內容不變時，chunk id 才會保持不變 */
export function chunkIdFor(documentId: string, sequenceIndex: number, text: string): string {
  return `${documentId}:${sequenceIndex}:${ContentHash.fromText(text).short(8)}`;
}
