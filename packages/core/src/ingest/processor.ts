import type { Logger } from "pino";
import { DocumentNotFoundError, describeError } from "../errors/catalog.js";
import type { TextExtractor } from "../extract/interface.js";
import type { SearchIndex } from "../search/interface.js";
import type { BlobStore } from "../store/interface.js";
import type { DocumentDescriptor } from "../store/types.js";
import { failed, succeeded, systemClock, type Clock } from "./outcome.js";
import type { ProcessingOutcome } from "./types.js";

export const MESSAGES = {
  unchanged: "Document already indexed (unchanged)",
  indexed: "Document processed and indexed",
  extractionEmpty: "No text extracted from document",
  indexWriteFailed: "Failed to write document to search index",
} as const;

export interface DocumentProcessorDeps {
  store: BlobStore;
  extractor: TextExtractor;
  searchIndex: SearchIndex;
  logger: Logger;
  maxFileSizeBytes: number;
  urlTtlSeconds: number;
  clock?: Clock;
}

export interface DocumentProcessor {
  /** Run one descriptor through the pipeline. Never rejects. */
  process(descriptor: DocumentDescriptor): Promise<ProcessingOutcome>;

  /** Look the key up in the store first, then `process` it. Never rejects. */
  processKey(key: string): Promise<ProcessingOutcome>;
}

export function createDocumentProcessor(deps: DocumentProcessorDeps): DocumentProcessor {
  const { store, extractor, searchIndex, maxFileSizeBytes, urlTtlSeconds } = deps;
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger.child({ component: "processor" });

  async function accessUrl(key: string): Promise<string> {
    try {
      return await store.urlFor(key, urlTtlSeconds);
    } catch (err) {
      logger.warn({ key, error: describeError(err) }, "Could not issue document URL");
      return "";
    }
  }

  async function run(descriptor: DocumentDescriptor): Promise<ProcessingOutcome> {
    const { key } = descriptor;

    const existing = await searchIndex.get(key);
    if (existing && existing.fingerprint === descriptor.fingerprint) {
      return succeeded(key, MESSAGES.unchanged, clock);
    }

    if (descriptor.size > maxFileSizeBytes) {
      return failed(
        key,
        "too_large",
        `File too large: ${descriptor.size} bytes (max: ${maxFileSizeBytes})`,
        clock,
      );
    }

    let content: Uint8Array;
    try {
      content = await store.fetch(key);
    } catch (err) {
      if (err instanceof DocumentNotFoundError) {
        return failed(key, "not_found", err.message, clock);
      }
      return failed(
        key,
        "fetch_failed",
        `Failed to fetch document: ${describeError(err)}`,
        clock,
      );
    }

    const extractedText = await extractor.extract(content, descriptor.fileExtension);
    if (!extractedText.trim()) {
      return failed(key, "extraction_empty", MESSAGES.extractionEmpty, clock);
    }

    const url = await accessUrl(key);

    try {
      await searchIndex.upsert({
        key,
        fileName: descriptor.fileName,
        extractedText,
        fileExtension: descriptor.fileExtension,
        size: descriptor.size,
        modifiedAt: descriptor.modifiedAt,
        fingerprint: descriptor.fingerprint,
        url,
        indexedAt: clock().toISOString(),
      });
    } catch (err) {
      logger.error({ key, error: describeError(err) }, "Index write failed");
      return failed(key, "index_write_failed", MESSAGES.indexWriteFailed, clock);
    }

    return succeeded(key, MESSAGES.indexed, clock);
  }

  async function process(descriptor: DocumentDescriptor): Promise<ProcessingOutcome> {
    let outcome: ProcessingOutcome;
    try {
      outcome = await run(descriptor);
    } catch (err) {
      outcome = failed(descriptor.key, "unexpected", describeError(err), clock);
    }

    if (outcome.status === "failed") {
      logger.warn({ key: outcome.key, failure: outcome.failure }, outcome.message);
    } else {
      logger.debug({ key: outcome.key }, outcome.message);
    }
    return outcome;
  }

  return {
    process,

    async processKey(key) {
      let descriptor: DocumentDescriptor | null;
      try {
        descriptor = await store.head(key);
      } catch (err) {
        const outcome = failed(
          key,
          "fetch_failed",
          `Failed to look up document: ${describeError(err)}`,
          clock,
        );
        logger.warn({ key, failure: outcome.failure }, outcome.message);
        return outcome;
      }

      if (!descriptor) {
        const outcome = failed(key, "not_found", new DocumentNotFoundError(key).message, clock);
        logger.warn({ key, failure: outcome.failure }, outcome.message);
        return outcome;
      }

      return process(descriptor);
    },
  };
}
