import Database from "better-sqlite3";

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS documents (
  doc_key TEXT PRIMARY KEY,
  file_name TEXT NOT NULL,
  extracted_text TEXT NOT NULL,
  file_extension TEXT NOT NULL,
  size INTEGER NOT NULL DEFAULT 0,
  modified_at TEXT NOT NULL,
  fingerprint TEXT NOT NULL,
  url TEXT NOT NULL DEFAULT '',
  indexed_at TEXT NOT NULL
)`;

// External-content table: text lives once, in `documents`
const CREATE_FTS_SQL = `
CREATE VIRTUAL TABLE IF NOT EXISTS documents_fts USING fts5(
  file_name,
  extracted_text,
  content='documents',
  content_rowid='rowid',
  tokenize='unicode61 remove_diacritics 2'
)`;

const CREATE_TRIGGERS_SQL = [
  `CREATE TRIGGER IF NOT EXISTS documents_ai AFTER INSERT ON documents BEGIN
     INSERT INTO documents_fts(rowid, file_name, extracted_text)
     VALUES (new.rowid, new.file_name, new.extracted_text);
   END`,
  `CREATE TRIGGER IF NOT EXISTS documents_ad AFTER DELETE ON documents BEGIN
     INSERT INTO documents_fts(documents_fts, rowid, file_name, extracted_text)
     VALUES ('delete', old.rowid, old.file_name, old.extracted_text);
   END`,
  `CREATE TRIGGER IF NOT EXISTS documents_au AFTER UPDATE ON documents BEGIN
     INSERT INTO documents_fts(documents_fts, rowid, file_name, extracted_text)
     VALUES ('delete', old.rowid, old.file_name, old.extracted_text);
     INSERT INTO documents_fts(rowid, file_name, extracted_text)
     VALUES (new.rowid, new.file_name, new.extracted_text);
   END`,
];

const CREATE_INDEXES_SQL = [
  "CREATE INDEX IF NOT EXISTS idx_documents_modified_at ON documents (modified_at)",
];

/** Open/create the index database, create tables and triggers, set WAL mode */
export function initializeSearchDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");

  db.exec(CREATE_TABLE_SQL);
  db.exec(CREATE_FTS_SQL);
  for (const sql of [...CREATE_TRIGGERS_SQL, ...CREATE_INDEXES_SQL]) {
    db.exec(sql);
  }

  return db;
}
