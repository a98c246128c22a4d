/**
 * In-process stand-ins for the store and index collaborators.
 * Shared by unit tests across packages.
 */

import { DocumentNotFoundError } from "../errors/catalog.js";
import type { SearchIndex } from "../search/interface.js";
import type { IndexRecord, SearchHit } from "../search/types.js";
import { createDescriptor } from "../store/keys.js";
import type { BlobStore } from "../store/interface.js";
import type { DocumentDescriptor } from "../store/types.js";

export interface MemoryBlobStore extends BlobStore {
  /** Add or replace a document; every put yields a new fingerprint. */
  put(key: string, text: string, modifiedAt?: string): DocumentDescriptor;
  remove(key: string): void;
}

export function createMemoryBlobStore(
  initial: Record<string, string> = {},
): MemoryBlobStore {
  const contents = new Map<string, Uint8Array>();
  const descriptors = new Map<string, DocumentDescriptor>();
  let version = 0;

  const store: MemoryBlobStore = {
    put(key, text, modifiedAt = "2026-01-01T00:00:00.000Z") {
      const bytes = new TextEncoder().encode(text);
      version++;
      const descriptor = createDescriptor({
        key,
        size: bytes.byteLength,
        modifiedAt,
        fingerprint: `fp-${version}`,
      });
      contents.set(key, bytes);
      descriptors.set(key, descriptor);
      return descriptor;
    },

    remove(key) {
      contents.delete(key);
      descriptors.delete(key);
    },

    async list() {
      return [...descriptors.values()].sort((a, b) => a.key.localeCompare(b.key));
    },

    async head(key) {
      return descriptors.get(key) ?? null;
    },

    async fetch(key) {
      const bytes = contents.get(key);
      if (!bytes) throw new DocumentNotFoundError(key);
      return bytes;
    },

    async urlFor(key) {
      return `memory://store/${key}`;
    },

    async stats() {
      let totalSizeBytes = 0;
      for (const descriptor of descriptors.values()) totalSizeBytes += descriptor.size;
      return {
        backend: "memory",
        location: "memory://store",
        documentCount: descriptors.size,
        totalSizeBytes,
      };
    },
  };

  for (const [key, text] of Object.entries(initial)) store.put(key, text);
  return store;
}

export interface MemorySearchIndex extends SearchIndex {
  readonly records: Map<string, IndexRecord>;
}

/** Map-backed index; search is a case-insensitive substring match. */
export function createMemorySearchIndex(name = "documents"): MemorySearchIndex {
  const records = new Map<string, IndexRecord>();

  return {
    name,
    records,

    async ping() {},

    async get(key) {
      return records.get(key) ?? null;
    },

    async upsert(record) {
      records.set(record.key, { ...record });
    },

    async delete(key) {
      return records.delete(key);
    },

    async listKeys({ after, limit }) {
      const sorted = [...records.keys()].sort();
      const remaining = after === undefined ? sorted : sorted.filter((key) => key > after);
      const keys = remaining.slice(0, limit);
      const nextCursor = remaining.length > limit ? (keys.at(-1) ?? null) : null;
      return { keys, nextCursor };
    },

    async refresh() {},

    async stats() {
      return { count: records.size, sizeBytes: 0 };
    },

    async search(query, { size, offset }) {
      const needle = query.trim().toLowerCase();
      const matches: SearchHit[] = [...records.values()]
        .filter(
          (record) =>
            needle !== "" &&
            (record.extractedText.toLowerCase().includes(needle) ||
              record.fileName.toLowerCase().includes(needle)),
        )
        .sort((a, b) => a.key.localeCompare(b.key))
        .map((record) => ({
          key: record.key,
          fileName: record.fileName,
          fileExtension: record.fileExtension,
          size: record.size,
          modifiedAt: record.modifiedAt,
          url: record.url,
          score: 1,
          highlights: {},
        }));
      return { hits: matches.slice(offset, offset + size), total: matches.length };
    },

    close() {},
  };
}

/** Build an index record the way the processor would for `key`. */
export function makeIndexRecord(
  key: string,
  overrides: Partial<IndexRecord> = {},
): IndexRecord {
  const descriptor = createDescriptor({
    key,
    size: 10,
    modifiedAt: "2026-01-01T00:00:00.000Z",
    fingerprint: "fp-indexed",
  });
  return {
    key,
    fileName: descriptor.fileName,
    extractedText: "indexed text",
    fileExtension: descriptor.fileExtension,
    size: descriptor.size,
    modifiedAt: descriptor.modifiedAt,
    fingerprint: descriptor.fingerprint,
    url: "",
    indexedAt: "2026-01-02T00:00:00.000Z",
    ...overrides,
  };
}
