import type {
  BatchResults,
  SearchResponse,
  StatusResponse,
  SyncResults,
} from "./client.js";

const MAX_LISTED_FAILURES = 10;

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

export function formatStatus(response: StatusResponse): string[] {
  const { store, index, supportedExtensions, maxFileSizeMb } = response.serviceInfo;
  return [
    `Store (${store.backend}): ${store.location}`,
    `  documents: ${store.documentCount}, total size: ${formatBytes(store.totalSizeBytes)}`,
    `Index "${index.name}"`,
    `  documents: ${index.documentCount}, size: ${formatBytes(index.sizeBytes)}`,
    `Supported extensions: ${supportedExtensions.join(", ")}`,
    `Max file size: ${maxFileSizeMb} MB`,
  ];
}

export function formatSearch(response: SearchResponse): string[] {
  if (response.documents.length === 0) {
    return [`No documents found matching '${response.query}'`];
  }

  const lines = [
    `Found ${response.totalResults} total results, showing ${response.returnedResults}:`,
  ];
  response.documents.forEach((doc, i) => {
    lines.push(`${response.from + i + 1}. ${doc.fileName} (Score: ${doc.score.toFixed(2)})`);
    lines.push(`   Key: ${doc.key}`);
    if (doc.url) lines.push(`   URL: ${doc.url}`);
    const snippet = doc.highlights.extractedText?.[0];
    if (snippet) lines.push(`   ${snippet.replace(/<\/?em>/g, "*")}`);
  });
  return lines;
}

export function formatBatch(results: BatchResults): string[] {
  const lines = [
    `Total documents: ${results.totalDocuments}`,
    `Processed: ${results.processedCount}`,
    `Failed: ${results.failedCount}`,
    `Skipped: ${results.skippedCount}`,
  ];

  const failed = results.outcomes.filter((outcome) => outcome.status === "failed");
  if (failed.length > 0) {
    lines.push("Failed documents:");
    for (const outcome of failed.slice(0, MAX_LISTED_FAILURES)) {
      lines.push(`  - ${outcome.key}: ${outcome.message}`);
    }
    if (failed.length > MAX_LISTED_FAILURES) {
      lines.push(`  ... and ${failed.length - MAX_LISTED_FAILURES} more`);
    }
  }
  return lines;
}

export function formatSync(results: SyncResults): string[] {
  return [
    `Documents in store: ${results.storeDocumentCount}`,
    `Documents in index before sync: ${results.indexedDocumentCount}`,
    `Added: ${results.added}`,
    `Removed: ${results.removed}`,
  ];
}
