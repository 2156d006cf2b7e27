export const SCHEMA_VERSION = '1';

export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA foreign_keys = ON;
PRAGMA cache_size = -64000;
`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS documents (
  document_id TEXT PRIMARY KEY,
  source_path TEXT NOT NULL UNIQUE,
  file_type TEXT NOT NULL
    CHECK(file_type IN ('pdf','text','tabular','spreadsheet','word','structured_record')),
  content_hash TEXT NOT NULL,
  file_size INTEGER NOT NULL,
  summary_text TEXT NOT NULL,
  topics_json TEXT NOT NULL,
  structure_json TEXT NOT NULL,
  chunk_ids_json TEXT NOT NULL,
  indexed_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS chunks (
  chunk_id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL,
  sequence_index INTEGER NOT NULL,
  location TEXT NOT NULL,
  content_type TEXT NOT NULL,
  text TEXT NOT NULL,
  text_hash TEXT NOT NULL,
  prev_id TEXT,
  next_id TEXT,
  UNIQUE(document_id, sequence_index),
  FOREIGN KEY(document_id) REFERENCES documents(document_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS document_vectors (
  document_id TEXT PRIMARY KEY,
  embedding BLOB NOT NULL,
  FOREIGN KEY(document_id) REFERENCES documents(document_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS chunk_vectors (
  chunk_id TEXT PRIMARY KEY,
  embedding BLOB NOT NULL,
  FOREIGN KEY(chunk_id) REFERENCES chunks(chunk_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS audit_log (
  log_id INTEGER PRIMARY KEY,
  timestamp_ms INTEGER NOT NULL,
  actor TEXT NOT NULL,
  action TEXT NOT NULL,
  target_path TEXT,
  detail_json TEXT,
  content_hash_before TEXT,
  content_hash_after TEXT
);

CREATE INDEX IF NOT EXISTS idx_documents_content_hash ON documents(content_hash);
CREATE INDEX IF NOT EXISTS idx_documents_file_type ON documents(file_type);
CREATE INDEX IF NOT EXISTS idx_chunks_document_id ON chunks(document_id);
CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_log(timestamp_ms);
CREATE INDEX IF NOT EXISTS idx_audit_target ON audit_log(target_path);
`;
