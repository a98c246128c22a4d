import type { DocumentDescriptor } from "./types.js";

export function fileNameOf(key: string): string {
  const segments = key.split("/");
  return segments[segments.length - 1] ?? key;
}

/** Lower-cased suffix without the dot, "" when the file name has none. */
export function extensionOf(key: string): string {
  const name = fileNameOf(key);
  const dot = name.lastIndexOf(".");
  return dot === -1 ? "" : name.slice(dot + 1).toLowerCase();
}

/**
 * Whether `key` ends in one of the allow-listed suffixes
 * (given as ".txt", ".md", …).
 */
export function hasSupportedExtension(
  key: string,
  supportedExtensions: readonly string[],
): boolean {
  const ext = extensionOf(key);
  if (!ext) return false;
  return supportedExtensions.some((allowed) => allowed.toLowerCase() === `.${ext}`);
}

/** Etags come quoted ("\"abc\"") and sometimes weak-prefixed. */
export function normalizeEtag(etag: string): string {
  return etag.replace(/^W\//, "").replace(/^"+|"+$/g, "");
}

/**
 * Fingerprint of a remote object from its etag. An object without one
 * cannot be compared against the index, so it is reported as a failure.
 */
export function fingerprintFromEtag(
  key: string,
  etag: string | null | undefined,
): string {
  const fingerprint = normalizeEtag(etag ?? "");
  if (!fingerprint) {
    throw new Error(`No etag returned for ${key}`);
  }
  return fingerprint;
}

export function createDescriptor(fields: {
  key: string;
  size: number;
  modifiedAt: string;
  fingerprint: string;
}): DocumentDescriptor {
  return {
    ...fields,
    fileName: fileNameOf(fields.key),
    fileExtension: extensionOf(fields.key),
  };
}
