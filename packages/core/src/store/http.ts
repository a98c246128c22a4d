/**
 * HTTP blob store adapter.
 * REST against {apiUrl}/v1/buckets/{bucket}:
 *   GET  /objects?cursor=…   paginated listing
 *   HEAD /objects/{key}      metadata (content-length, last-modified, etag)
 *   GET  /objects/{key}      raw bytes
 *   POST /presign            { key, expiresIn } → { url }
 *   GET  /                   { objectCount, totalSizeBytes }
 * Auth: optional "Bearer {token}" header on every request.
 */

import { z } from "zod";
import { DocumentNotFoundError } from "../errors/catalog.js";
import type { BlobStore } from "./interface.js";
import {
  createDescriptor,
  fingerprintFromEtag,
  hasSupportedExtension,
} from "./keys.js";
import type { DocumentDescriptor } from "./types.js";

export interface HttpBlobStoreOptions {
  apiUrl: string;
  bucket: string;
  token?: string;
  supportedExtensions: readonly string[];
}

const ObjectListingSchema = z.object({
  objects: z.array(
    z.object({
      key: z.string().min(1),
      size: z.number().int().nonnegative(),
      lastModified: z.string(),
      etag: z.string().min(1),
    }),
  ),
  nextCursor: z.string().nullable().optional(),
});

const PresignResponseSchema = z.object({ url: z.string().min(1) });

const BucketInfoSchema = z.object({
  objectCount: z.number().int().nonnegative(),
  totalSizeBytes: z.number().nonnegative(),
});

function toIsoDate(value: string): string {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? value : date.toISOString();
}

export function createHttpBlobStore(options: HttpBlobStoreOptions): BlobStore {
  const base = `${options.apiUrl.replace(/\/+$/, "")}/v1/buckets/${encodeURIComponent(options.bucket)}`;

  function objectUrl(key: string): string {
    const encoded = key.split("/").map(encodeURIComponent).join("/");
    return `${base}/objects/${encoded}`;
  }

  function headers(extra?: Record<string, string>): Record<string, string> {
    return {
      ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
      ...extra,
    };
  }

  function failure(operation: string, res: Response): Error {
    return new Error(
      `Blob store ${operation} failed: ${res.status} ${res.statusText}`,
    );
  }

  return {
    async list() {
      const documents: DocumentDescriptor[] = [];
      let cursor: string | null = null;

      do {
        const url = new URL(`${base}/objects`);
        if (cursor) url.searchParams.set("cursor", cursor);

        const res = await fetch(url, { headers: headers() });
        if (!res.ok) throw failure("list", res);

        const page = ObjectListingSchema.parse(await res.json());
        for (const object of page.objects) {
          if (!hasSupportedExtension(object.key, options.supportedExtensions)) {
            continue;
          }
          documents.push(
            createDescriptor({
              key: object.key,
              size: object.size,
              modifiedAt: toIsoDate(object.lastModified),
              fingerprint: fingerprintFromEtag(object.key, object.etag),
            }),
          );
        }
        cursor = page.nextCursor ?? null;
      } while (cursor);

      return documents;
    },

    async head(key) {
      const res = await fetch(objectUrl(key), {
        method: "HEAD",
        headers: headers(),
      });
      if (res.status === 404) return null;
      if (!res.ok) throw failure("head", res);

      return createDescriptor({
        key,
        size: Number(res.headers.get("content-length") ?? 0),
        modifiedAt: toIsoDate(res.headers.get("last-modified") ?? ""),
        fingerprint: fingerprintFromEtag(key, res.headers.get("etag")),
      });
    },

    async fetch(key) {
      const res = await fetch(objectUrl(key), { headers: headers() });
      if (res.status === 404) {
        throw new DocumentNotFoundError(key);
      }
      if (!res.ok) throw failure("download", res);
      return new Uint8Array(await res.arrayBuffer());
    },

    async urlFor(key, ttlSeconds) {
      const res = await fetch(`${base}/presign`, {
        method: "POST",
        headers: headers({ "Content-Type": "application/json" }),
        body: JSON.stringify({ key, expiresIn: ttlSeconds }),
      });
      if (!res.ok) throw failure("presign", res);
      return PresignResponseSchema.parse(await res.json()).url;
    },

    async stats() {
      const res = await fetch(base, { headers: headers() });
      if (!res.ok) throw failure("stats", res);
      const info = BucketInfoSchema.parse(await res.json());
      return {
        backend: "http",
        location: `${options.apiUrl.replace(/\/+$/, "")}/${options.bucket}`,
        documentCount: info.objectCount,
        totalSizeBytes: info.totalSizeBytes,
      };
    },
  };
}
