/**
 * HTTP client for the docindex front end. Every method resolves with the
 * parsed JSON body or throws ApiError for a non-2xx answer.
 */

export interface BatchOutcome {
  key: string;
  status: "success" | "skipped" | "failed";
  message: string;
  completedAt: string;
  failure?: string;
}

export interface BatchResults {
  totalDocuments: number;
  processedCount: number;
  failedCount: number;
  skippedCount: number;
  outcomes: BatchOutcome[];
}

export interface SyncResults {
  storeDocumentCount: number;
  indexedDocumentCount: number;
  added: number;
  removed: number;
  completedAt: string;
}

export interface HealthResponse {
  status: string;
  version: string;
  uptime: number;
}

export interface StatusResponse {
  status: string;
  serviceInfo: {
    store: {
      backend: string;
      location: string;
      documentCount: number;
      totalSizeBytes: number;
    };
    index: { name: string; documentCount: number; sizeBytes: number };
    supportedExtensions: string[];
    maxFileSizeMb: number;
  };
  timestamp: string;
}

export interface SearchDocument {
  fileName: string;
  key: string;
  fileExtension: string;
  sizeBytes: number;
  modifiedAt: string;
  url: string;
  score: number;
  highlights: { fileName?: string[]; extractedText?: string[] };
}

export interface SearchResponse {
  query: string;
  totalResults: number;
  returnedResults: number;
  from: number;
  size: number;
  documents: SearchDocument[];
  timestamp: string;
}

export interface ProcessResponse {
  message: string;
  results: BatchResults;
  timestamp: string;
}

export interface SyncResponse {
  message: string;
  results: SyncResults;
  timestamp: string;
}

export interface SingleDocumentResponse {
  message: string;
  key: string;
  success: boolean;
  details: string;
  processedAt: string;
  timestamp: string;
}

export interface DeleteResponse {
  message: string;
  key: string;
  timestamp: string;
}

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly errorCode: string,
    message: string,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export interface ApiClientOptions {
  baseUrl: string;
  token?: string;
  fetch?: typeof fetch;
}

export interface ApiClient {
  health(): Promise<HealthResponse>;
  status(): Promise<StatusResponse>;
  search(query: string, options?: { size?: number; from?: number }): Promise<SearchResponse>;
  processAll(concurrency?: number): Promise<ProcessResponse>;
  processOne(key: string): Promise<SingleDocumentResponse>;
  deleteDocument(key: string): Promise<DeleteResponse>;
  sync(): Promise<SyncResponse>;
}

/** Keys keep their "/" separators; each segment is escaped on its own. */
export function encodeKey(key: string): string {
  return key.split("/").map(encodeURIComponent).join("/");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

async function toApiError(res: Response): Promise<ApiError> {
  const text = await res.text();
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = undefined;
  }

  const error = isRecord(parsed) ? parsed.error : undefined;
  if (isRecord(error)) {
    const errorCode = typeof error.errorCode === "string" ? error.errorCode : "UNKNOWN";
    const message = typeof error.message === "string" ? error.message : res.statusText;
    return new ApiError(res.status, errorCode, message);
  }
  return new ApiError(res.status, "UNKNOWN", text || res.statusText || `HTTP ${res.status}`);
}

export function createApiClient(options: ApiClientOptions): ApiClient {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const fetchFn = options.fetch ?? globalThis.fetch;

  async function send<T>(method: string, path: string, body?: unknown): Promise<T> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers["Content-Type"] = "application/json";
    if (options.token) headers.Authorization = `Bearer ${options.token}`;

    const res = await fetchFn(`${baseUrl}${path}`, {
      method,
      headers,
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });
    if (!res.ok) {
      throw await toApiError(res);
    }
    return (await res.json()) as T;
  }

  return {
    health: () => send<HealthResponse>("GET", "/health"),

    status: () => send<StatusResponse>("GET", "/status"),

    search(query, searchOptions) {
      const params = new URLSearchParams({ q: query });
      if (searchOptions?.size !== undefined) params.set("size", String(searchOptions.size));
      if (searchOptions?.from !== undefined) params.set("from", String(searchOptions.from));
      return send<SearchResponse>("GET", `/v1/search?${params.toString()}`);
    },

    processAll(concurrency) {
      return send<ProcessResponse>(
        "POST",
        "/v1/documents/process",
        concurrency !== undefined ? { concurrency } : {},
      );
    },

    processOne: (key) =>
      send<SingleDocumentResponse>("POST", `/v1/documents/${encodeKey(key)}`),

    deleteDocument: (key) =>
      send<DeleteResponse>("DELETE", `/v1/documents/${encodeKey(key)}`),

    sync: () => send<SyncResponse>("POST", "/v1/sync"),
  };
}
