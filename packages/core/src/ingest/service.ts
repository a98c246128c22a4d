import type { Logger } from "pino";
import { describeError } from "../errors/catalog.js";
import type { TextExtractor } from "../extract/interface.js";
import {
  maxFileSizeBytes,
  type ProcessingConfig,
  type StoreConfig,
} from "../schemas/server-config.js";
import type { SearchIndex } from "../search/interface.js";
import type { SearchOptions, SearchResult } from "../search/types.js";
import type { BlobStore } from "../store/interface.js";
import { createBatchCoordinator, type BatchCoordinator } from "./batch.js";
import { indexCall, storeCall } from "./guard.js";
import type { Clock } from "./outcome.js";
import { createDocumentProcessor, type DocumentProcessor } from "./processor.js";
import { createReconciler, type Reconciler } from "./reconciler.js";
import type {
  BatchSummary,
  ProcessingOutcome,
  StatusSnapshot,
  SyncSummary,
} from "./types.js";

export interface DocumentServiceDeps {
  store: BlobStore;
  extractor: TextExtractor;
  searchIndex: SearchIndex;
  logger: Logger;
  processing: ProcessingConfig;
  storeConfig: Pick<StoreConfig, "supportedExtensions" | "urlTtlSeconds">;
  clock?: Clock;
}

/** Outward operations of the ingestion engine. */
export interface DocumentService {
  processAll(concurrency?: number): Promise<BatchSummary>;
  processOne(key: string): Promise<ProcessingOutcome>;
  sync(): Promise<SyncSummary>;
  search(query: string, options: SearchOptions): Promise<SearchResult>;
  /** Remove one record from the index. The store is never touched. */
  deleteFromIndex(key: string): Promise<boolean>;
  status(): Promise<StatusSnapshot>;
  close(): void;
}

export function createDocumentService(deps: DocumentServiceDeps): DocumentService {
  const { store, extractor, searchIndex, processing, storeConfig, clock } = deps;
  const logger = deps.logger.child({ component: "service" });

  const processor: DocumentProcessor = createDocumentProcessor({
    store,
    extractor,
    searchIndex,
    logger: deps.logger,
    maxFileSizeBytes: maxFileSizeBytes(processing),
    urlTtlSeconds: storeConfig.urlTtlSeconds,
    clock,
  });
  const coordinator: BatchCoordinator = createBatchCoordinator({
    processor,
    logger: deps.logger,
    maxConcurrency: processing.maxConcurrency,
    clock,
  });
  const reconciler: Reconciler = createReconciler({
    store,
    searchIndex,
    coordinator,
    logger: deps.logger,
    syncConcurrency: processing.syncConcurrency,
    keyPageSize: processing.keyPageSize,
    clock,
  });

  const ensureIndex = () => indexCall(() => searchIndex.ping());

  async function urlOrEmpty(key: string): Promise<string> {
    try {
      return await store.urlFor(key, storeConfig.urlTtlSeconds);
    } catch (err) {
      logger.warn({ key, error: describeError(err) }, "Could not issue document URL");
      return "";
    }
  }

  return {
    async processAll(concurrency) {
      await ensureIndex();
      const summary = await coordinator.processBatch(
        () => storeCall(() => store.list()),
        concurrency ?? processing.defaultConcurrency,
      );
      await indexCall(() => searchIndex.refresh());
      return summary;
    },

    async processOne(key) {
      await ensureIndex();
      const outcome = await processor.processKey(key);
      if (outcome.status === "success") {
        await indexCall(() => searchIndex.refresh());
      }
      return outcome;
    },

    async sync() {
      await ensureIndex();
      return reconciler.sync();
    },

    async search(query, options) {
      const result = await indexCall(() => searchIndex.search(query, options));
      const hits = await Promise.all(
        result.hits.map(async (hit) =>
          hit.url ? hit : { ...hit, url: await urlOrEmpty(hit.key) },
        ),
      );
      return { hits, total: result.total };
    },

    async deleteFromIndex(key) {
      await ensureIndex();
      const removed = await indexCall(() => searchIndex.delete(key));
      if (removed) {
        await indexCall(() => searchIndex.refresh());
        logger.info({ key }, "Removed document from index");
      }
      return removed;
    },

    async status() {
      const storeStats = await storeCall(() => store.stats());
      const indexStats = await indexCall(() => searchIndex.stats());
      return {
        store: storeStats,
        index: {
          name: searchIndex.name,
          documentCount: indexStats.count,
          sizeBytes: indexStats.sizeBytes,
        },
        supportedExtensions: [...storeConfig.supportedExtensions],
        maxFileSizeMb: processing.maxFileSizeMb,
      };
    },

    close() {
      searchIndex.close();
    },
  };
}
