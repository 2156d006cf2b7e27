/** Float32Array ↔ SQLite BLOB（little-endian float32，sqlite-vec 的向量格式） */
export function toBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

/** 複製一份，避免共用 Buffer pool 造成的對齊問題 */
export function fromBlob(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer);
}
