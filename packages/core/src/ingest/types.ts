import type { StoreStats } from "../store/types.js";

export type OutcomeStatus = "success" | "skipped" | "failed";

export type FailureKind =
  | "not_found"
  | "too_large"
  | "fetch_failed"
  | "extraction_empty"
  | "index_write_failed"
  | "unexpected";

export interface ProcessingOutcome {
  key: string;
  status: OutcomeStatus;
  message: string;
  completedAt: string;
  failure?: FailureKind; // set on failed outcomes only
}

export interface BatchSummary {
  totalDocuments: number;
  processedCount: number;
  failedCount: number;
  skippedCount: number;
  outcomes: ProcessingOutcome[]; // completion order
}

export interface SyncSummary {
  storeDocumentCount: number;
  indexedDocumentCount: number;
  added: number;
  removed: number;
  completedAt: string;
}

export interface StatusSnapshot {
  store: StoreStats;
  index: { name: string; documentCount: number; sizeBytes: number };
  supportedExtensions: string[];
  maxFileSizeMb: number;
}
