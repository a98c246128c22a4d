/** Metadata snapshot of one document as currently listed by the store. */
export interface DocumentDescriptor {
  key: string; // store-relative path, "/"-separated
  size: number; // bytes
  modifiedAt: string; // ISO 8601
  fingerprint: string; // strong content-version token (etag / content hash)
  fileName: string; // last path segment of key
  fileExtension: string; // lower-cased, no dot; "" when absent
}

export interface StoreStats {
  backend: string;
  location: string;
  documentCount: number;
  totalSizeBytes: number;
}
