import type Database from "better-sqlite3";
import { IndexWriteError } from "../errors/catalog.js";
import type { SearchIndex } from "./interface.js";
import { buildMatchQuery } from "./query.js";
import type { IndexRecord, SearchHighlights, SearchHit } from "./types.js";

const HIGHLIGHT_OPEN = "<em>";
const HIGHLIGHT_CLOSE = "</em>";
const SNIPPET_TOKENS = 24;

// bm25 column weights, in documents_fts column order
const FILE_NAME_WEIGHT = 1.5;
const TEXT_WEIGHT = 2.0;

interface RawRecordRow {
  doc_key: string;
  file_name: string;
  extracted_text: string;
  file_extension: string;
  size: number;
  modified_at: string;
  fingerprint: string;
  url: string;
  indexed_at: string;
}

interface RawHitRow {
  doc_key: string;
  file_name: string;
  file_extension: string;
  size: number;
  modified_at: string;
  url: string;
  score_rank: number;
  name_highlight: string;
  text_snippet: string;
}

function rowToRecord(row: RawRecordRow): IndexRecord {
  return {
    key: row.doc_key,
    fileName: row.file_name,
    extractedText: row.extracted_text,
    fileExtension: row.file_extension,
    size: row.size,
    modifiedAt: row.modified_at,
    fingerprint: row.fingerprint,
    url: row.url,
    indexedAt: row.indexed_at,
  };
}

function rowToHit(row: RawHitRow): SearchHit {
  const highlights: SearchHighlights = {};
  if (row.name_highlight.includes(HIGHLIGHT_OPEN)) {
    highlights.fileName = [row.name_highlight];
  }
  if (row.text_snippet.includes(HIGHLIGHT_OPEN)) {
    highlights.extractedText = [row.text_snippet];
  }
  return {
    key: row.doc_key,
    fileName: row.file_name,
    fileExtension: row.file_extension,
    size: row.size,
    modifiedAt: row.modified_at,
    url: row.url,
    // bm25 is lower-is-better and negative for matches
    score: -row.score_rank,
    highlights,
  };
}

export interface SqliteSearchIndexOptions {
  name: string;
}

export function createSqliteSearchIndex(
  db: Database.Database,
  options: SqliteSearchIndexOptions,
): SearchIndex {
  const getStmt = db.prepare<{ key: string }, RawRecordRow>(
    "SELECT * FROM documents WHERE doc_key = @key",
  );

  const upsertStmt = db.prepare<RawRecordRow>(
    `INSERT INTO documents
       (doc_key, file_name, extracted_text, file_extension, size,
        modified_at, fingerprint, url, indexed_at)
     VALUES
       (@doc_key, @file_name, @extracted_text, @file_extension, @size,
        @modified_at, @fingerprint, @url, @indexed_at)
     ON CONFLICT(doc_key) DO UPDATE SET
       file_name = excluded.file_name,
       extracted_text = excluded.extracted_text,
       file_extension = excluded.file_extension,
       size = excluded.size,
       modified_at = excluded.modified_at,
       fingerprint = excluded.fingerprint,
       url = excluded.url,
       indexed_at = excluded.indexed_at`,
  );

  const deleteStmt = db.prepare<{ key: string }>(
    "DELETE FROM documents WHERE doc_key = @key",
  );

  const listKeysStmt = db.prepare<{ after: string; limit: number }, { doc_key: string }>(
    "SELECT doc_key FROM documents WHERE doc_key > @after ORDER BY doc_key ASC LIMIT @limit",
  );

  const countStmt = db.prepare<[], { cnt: number }>(
    "SELECT COUNT(*) AS cnt FROM documents",
  );

  const searchStmt = db.prepare<
    { match: string; size: number; offset: number },
    RawHitRow
  >(
    `SELECT d.doc_key, d.file_name, d.file_extension, d.size, d.modified_at, d.url,
            bm25(documents_fts, ${FILE_NAME_WEIGHT}, ${TEXT_WEIGHT}) AS score_rank,
            highlight(documents_fts, 0, '${HIGHLIGHT_OPEN}', '${HIGHLIGHT_CLOSE}') AS name_highlight,
            snippet(documents_fts, 1, '${HIGHLIGHT_OPEN}', '${HIGHLIGHT_CLOSE}', '...', ${SNIPPET_TOKENS}) AS text_snippet
     FROM documents_fts
     JOIN documents d ON d.rowid = documents_fts.rowid
     WHERE documents_fts MATCH @match
     ORDER BY score_rank ASC, d.modified_at DESC
     LIMIT @size OFFSET @offset`,
  );

  const searchCountStmt = db.prepare<{ match: string }, { cnt: number }>(
    "SELECT COUNT(*) AS cnt FROM documents_fts WHERE documents_fts MATCH @match",
  );

  return {
    name: options.name,

    async ping() {
      db.prepare("SELECT 1").get();
    },

    async get(key) {
      const row = getStmt.get({ key });
      return row ? rowToRecord(row) : null;
    },

    async upsert(record) {
      try {
        upsertStmt.run({
          doc_key: record.key,
          file_name: record.fileName,
          extracted_text: record.extractedText,
          file_extension: record.fileExtension,
          size: record.size,
          modified_at: record.modifiedAt,
          fingerprint: record.fingerprint,
          url: record.url,
          indexed_at: record.indexedAt,
        });
      } catch (err) {
        throw new IndexWriteError(record.key, { cause: err });
      }
    },

    async delete(key) {
      return deleteStmt.run({ key }).changes > 0;
    },

    async listKeys({ after, limit }) {
      // One extra row tells whether another page follows
      const rows = listKeysStmt.all({ after: after ?? "", limit: limit + 1 });
      const keys = rows.slice(0, limit).map((row) => row.doc_key);
      const nextCursor = rows.length > limit ? (keys.at(-1) ?? null) : null;
      return { keys, nextCursor };
    },

    async refresh() {
      db.pragma("wal_checkpoint(PASSIVE)");
    },

    async stats() {
      const row = countStmt.get();
      const pageCount = Number(db.pragma("page_count", { simple: true }));
      const pageSize = Number(db.pragma("page_size", { simple: true }));
      return { count: row?.cnt ?? 0, sizeBytes: pageCount * pageSize };
    },

    async search(query, { size, offset }) {
      const match = buildMatchQuery(query);
      if (match === null) return { hits: [], total: 0 };

      const total = searchCountStmt.get({ match })?.cnt ?? 0;
      const hits = searchStmt.all({ match, size, offset }).map(rowToHit);
      return { hits, total };
    },

    close() {
      db.close();
    },
  };
}
