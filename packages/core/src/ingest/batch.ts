import pLimit from "p-limit";
import type { Logger } from "pino";
import { describeError } from "../errors/catalog.js";
import type { DocumentDescriptor } from "../store/types.js";
import { failed, summarize, systemClock, type Clock } from "./outcome.js";
import type { DocumentProcessor } from "./processor.js";
import type { BatchSummary, ProcessingOutcome } from "./types.js";

type Limit = ReturnType<typeof pLimit>;

export interface BatchCoordinatorDeps {
  processor: Pick<DocumentProcessor, "process">;
  logger: Logger;
  maxConcurrency: number;
  clock?: Clock;
}

/**
 * Documents for one batch. A function is called only once the batch holds
 * the coordinator, so a listing taken there cannot go stale while an
 * earlier batch is still writing.
 */
export type BatchSource =
  | DocumentDescriptor[]
  | (() => Promise<DocumentDescriptor[]>);

export interface BatchCoordinator {
  /**
   * Process every descriptor with at most `concurrency` in flight.
   * Batches on one coordinator run one at a time; a second call waits.
   * Rejects only when `source` does.
   */
  processBatch(source: BatchSource, concurrency: number): Promise<BatchSummary>;
}

export function clampConcurrency(requested: number, max: number): number {
  if (!Number.isFinite(requested)) return 1;
  return Math.min(Math.max(1, Math.floor(requested)), max);
}

export function createBatchCoordinator(deps: BatchCoordinatorDeps): BatchCoordinator {
  const { processor, maxConcurrency } = deps;
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger.child({ component: "batch" });
  const exclusive: Limit = pLimit(1);

  async function runBatch(
    descriptors: DocumentDescriptor[],
    concurrency: number,
  ): Promise<BatchSummary> {
    if (descriptors.length === 0) return summarize(0, []);

    const workers: Limit = pLimit(concurrency);
    const outcomes: ProcessingOutcome[] = [];
    const startedAt = Date.now();

    logger.info({ total: descriptors.length, concurrency }, "Batch started");

    await Promise.all(
      descriptors.map((descriptor) =>
        workers(async () => {
          let outcome: ProcessingOutcome;
          try {
            outcome = await processor.process(descriptor);
          } catch (err) {
            outcome = failed(descriptor.key, "unexpected", describeError(err), clock);
          }
          outcomes.push(outcome);
        }),
      ),
    );

    const summary = summarize(descriptors.length, outcomes);
    logger.info(
      {
        total: summary.totalDocuments,
        processed: summary.processedCount,
        failed: summary.failedCount,
        durationMs: Date.now() - startedAt,
      },
      "Batch completed",
    );
    return summary;
  }

  return {
    processBatch(source, concurrency) {
      const bounded = clampConcurrency(concurrency, maxConcurrency);
      if (exclusive.pendingCount > 0 || exclusive.activeCount > 0) {
        logger.debug({ queued: exclusive.pendingCount + 1 }, "Waiting for running batch");
      }
      return exclusive(async () => {
        const descriptors = typeof source === "function" ? await source() : source;
        return runBatch(descriptors, bounded);
      });
    },
  };
}
