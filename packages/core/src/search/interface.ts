import type {
  IndexRecord,
  IndexStats,
  KeyPage,
  SearchOptions,
  SearchResult,
} from "./types.js";

/** Keyed document index with keyword search. */
export interface SearchIndex {
  readonly name: string;

  /** @throws when the index cannot be reached */
  ping(): Promise<void>;

  get(key: string): Promise<IndexRecord | null>;

  /**
   * Insert or fully replace the record stored under `record.key`.
   * @throws IndexWriteError when the write is rejected
   */
  upsert(record: IndexRecord): Promise<void>;

  /** @returns false when no record was stored under `key` */
  delete(key: string): Promise<boolean>;

  /**
   * One page of stored keys in ascending order, strictly after `after`.
   * `nextCursor` is null on the last page.
   */
  listKeys(options: { after?: string; limit: number }): Promise<KeyPage>;

  /** Make every completed write visible to readers. */
  refresh(): Promise<void>;

  stats(): Promise<IndexStats>;

  search(query: string, options: SearchOptions): Promise<SearchResult>;

  close(): void;
}
