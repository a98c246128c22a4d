import type { DocumentDescriptor, StoreStats } from "./types.js";

/**
 * Read-only view of the blob store documents are ingested from.
 * Keys are store-relative paths ("reports/2026/q1.txt").
 * The store is never written to.
 */
export interface BlobStore {
  /**
   * List every current document whose suffix is allow-listed.
   * @throws when the store cannot be reached
   */
  list(): Promise<DocumentDescriptor[]>;

  /**
   * Current descriptor of one document.
   * @returns null when the key does not exist
   */
  head(key: string): Promise<DocumentDescriptor | null>;

  /**
   * Download the raw content of a document.
   * @throws DocumentNotFoundError when the key does not exist
   */
  fetch(key: string): Promise<Uint8Array>;

  /**
   * Time-limited URL a client can open the document with.
   * @param ttlSeconds - validity of the URL, where the backend supports expiry
   */
  urlFor(key: string, ttlSeconds: number): Promise<string>;

  /** Object count and total size across the whole store. */
  stats(): Promise<StoreStats>;
}
