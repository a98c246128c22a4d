export type {
  IndexRecord,
  IndexStats,
  KeyPage,
  SearchHighlights,
  SearchHit,
  SearchOptions,
  SearchResult,
} from "./types.js";
export type { SearchIndex } from "./interface.js";
export { initializeSearchDatabase } from "./schema.js";
export { buildMatchQuery } from "./query.js";
export { collectAllKeys } from "./collect.js";
export {
  createSqliteSearchIndex,
  type SqliteSearchIndexOptions,
} from "./sqlite.js";
