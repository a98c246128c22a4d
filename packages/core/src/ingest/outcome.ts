import type {
  BatchSummary,
  FailureKind,
  ProcessingOutcome,
} from "./types.js";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function succeeded(key: string, message: string, clock: Clock): ProcessingOutcome {
  return { key, status: "success", message, completedAt: clock().toISOString() };
}

export function failed(
  key: string,
  failure: FailureKind,
  message: string,
  clock: Clock,
): ProcessingOutcome {
  return {
    key,
    status: "failed",
    message,
    completedAt: clock().toISOString(),
    failure,
  };
}

export function summarize(
  totalDocuments: number,
  outcomes: ProcessingOutcome[],
): BatchSummary {
  const count = (status: ProcessingOutcome["status"]) =>
    outcomes.filter((outcome) => outcome.status === status).length;

  return {
    totalDocuments,
    processedCount: count("success"),
    failedCount: count("failed"),
    skippedCount: count("skipped"),
    outcomes,
  };
}
