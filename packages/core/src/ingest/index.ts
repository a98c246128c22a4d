export type {
  BatchSummary,
  FailureKind,
  OutcomeStatus,
  ProcessingOutcome,
  StatusSnapshot,
  SyncSummary,
} from "./types.js";
export { systemClock, type Clock } from "./outcome.js";
export {
  createDocumentProcessor,
  MESSAGES,
  type DocumentProcessor,
  type DocumentProcessorDeps,
} from "./processor.js";
export {
  clampConcurrency,
  createBatchCoordinator,
  type BatchCoordinator,
  type BatchCoordinatorDeps,
} from "./batch.js";
export {
  createReconciler,
  type Reconciler,
  type ReconcilerDeps,
} from "./reconciler.js";
export {
  createDocumentService,
  type DocumentService,
  type DocumentServiceDeps,
} from "./service.js";
