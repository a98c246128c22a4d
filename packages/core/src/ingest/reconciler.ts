import type { Logger } from "pino";
import { describeError } from "../errors/catalog.js";
import { collectAllKeys } from "../search/collect.js";
import type { SearchIndex } from "../search/interface.js";
import type { BlobStore } from "../store/interface.js";
import type { BatchCoordinator } from "./batch.js";
import { indexCall, storeCall } from "./guard.js";
import { systemClock, type Clock } from "./outcome.js";
import type { SyncSummary } from "./types.js";

export interface ReconcilerDeps {
  store: BlobStore;
  searchIndex: SearchIndex;
  coordinator: BatchCoordinator;
  logger: Logger;
  syncConcurrency: number;
  keyPageSize: number;
  clock?: Clock;
}

export interface Reconciler {
  /**
   * Index store documents missing from the index and drop index records
   * whose document left the store. Documents present on both sides are
   * not re-checked.
   * @throws StoreUnavailableError | IndexUnavailableError before any change
   */
  sync(): Promise<SyncSummary>;
}

export function createReconciler(deps: ReconcilerDeps): Reconciler {
  const { store, searchIndex, coordinator, syncConcurrency, keyPageSize } = deps;
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger.child({ component: "reconciler" });

  async function removeAll(keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      try {
        if (await searchIndex.delete(key)) removed++;
      } catch (err) {
        logger.warn({ key, error: describeError(err) }, "Failed to remove stale record");
      }
    }
    return removed;
  }

  return {
    async sync() {
      let storeCount = 0;
      let indexedCount = 0;
      let toRemove: string[] = [];

      // Listed inside the batch so the diff sees every earlier batch's writes
      const batch = await coordinator.processBatch(async () => {
        const descriptors = await storeCall(() => store.list());
        const indexedKeys = await indexCall(() => collectAllKeys(searchIndex, keyPageSize));
        const storeKeys = new Set(descriptors.map((descriptor) => descriptor.key));

        const toAdd = descriptors.filter((descriptor) => !indexedKeys.has(descriptor.key));
        toRemove = [...indexedKeys].filter((key) => !storeKeys.has(key));
        storeCount = storeKeys.size;
        indexedCount = indexedKeys.size;

        logger.info(
          {
            storeCount,
            indexedCount,
            toAdd: toAdd.length,
            toRemove: toRemove.length,
          },
          "Sync started",
        );
        return toAdd;
      }, syncConcurrency);

      const removed = await removeAll(toRemove);
      await indexCall(() => searchIndex.refresh());

      const summary: SyncSummary = {
        storeDocumentCount: storeCount,
        indexedDocumentCount: indexedCount,
        added: batch.processedCount,
        removed,
        completedAt: clock().toISOString(),
      };
      logger.info({ added: summary.added, removed: summary.removed }, "Sync completed");
      return summary;
    },
  };
}
