import { vi } from "vitest";
import type {
  BatchSummary,
  DocumentService,
  ProcessingOutcome,
  StatusSnapshot,
  SyncSummary,
} from "@docindex/core/ingest";

export const BATCH_SUMMARY: BatchSummary = {
  totalDocuments: 2,
  processedCount: 1,
  failedCount: 1,
  skippedCount: 0,
  outcomes: [
    {
      key: "a.txt",
      status: "success",
      message: "Document processed and indexed",
      completedAt: "2026-05-01T12:00:00.000Z",
    },
    {
      key: "b.txt",
      status: "failed",
      message: "No text extracted from document",
      completedAt: "2026-05-01T12:00:01.000Z",
      failure: "extraction_empty",
    },
  ],
};

export const OUTCOME: ProcessingOutcome = {
  key: "reports/2026/q1.txt",
  status: "success",
  message: "Document processed and indexed",
  completedAt: "2026-05-01T12:00:00.000Z",
};

export const SYNC_SUMMARY: SyncSummary = {
  storeDocumentCount: 3,
  indexedDocumentCount: 3,
  added: 1,
  removed: 1,
  completedAt: "2026-05-01T12:00:00.000Z",
};

export const STATUS: StatusSnapshot = {
  store: {
    backend: "local",
    location: "/srv/documents",
    documentCount: 3,
    totalSizeBytes: 2048,
  },
  index: { name: "documents", documentCount: 2, sizeBytes: 4096 },
  supportedExtensions: [".txt", ".md"],
  maxFileSizeMb: 100,
};

export function createMockService(overrides?: Partial<DocumentService>): DocumentService {
  return {
    processAll: vi.fn().mockResolvedValue(BATCH_SUMMARY),
    processOne: vi.fn().mockResolvedValue(OUTCOME),
    sync: vi.fn().mockResolvedValue(SYNC_SUMMARY),
    search: vi.fn().mockResolvedValue({ hits: [], total: 0 }),
    deleteFromIndex: vi.fn().mockResolvedValue(true),
    status: vi.fn().mockResolvedValue(STATUS),
    close: vi.fn(),
    ...overrides,
  };
}
