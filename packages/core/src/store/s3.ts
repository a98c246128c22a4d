import {
  GetObjectCommand,
  HeadObjectCommand,
  S3Client,
  S3ServiceException,
  paginateListObjectsV2,
  type _Object,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { DocumentNotFoundError } from "../errors/catalog.js";
import type { S3StoreConfig } from "../schemas/server-config.js";
import type { BlobStore } from "./interface.js";
import {
  createDescriptor,
  fingerprintFromEtag,
  hasSupportedExtension,
} from "./keys.js";
import type { DocumentDescriptor } from "./types.js";

export interface S3BlobStoreOptions {
  client: S3Client;
  bucket: string;
  /** Listing is restricted to keys under this prefix. Keys stay whole. */
  prefix?: string;
  supportedExtensions: readonly string[];
}

/**
 * Client for the configured region and endpoint. Credentials come from the
 * SDK's default chain (AWS_ACCESS_KEY_ID and friends, profiles, roles).
 */
export function createS3Client(config: S3StoreConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
  });
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof S3ServiceException &&
    (err.name === "NoSuchKey" ||
      err.name === "NotFound" ||
      err.$metadata.httpStatusCode === 404)
  );
}

export function createS3BlobStore(options: S3BlobStoreOptions): BlobStore {
  const { client, bucket, prefix } = options;

  async function* objects(): AsyncGenerator<_Object> {
    const pages = paginateListObjectsV2({ client }, { Bucket: bucket, Prefix: prefix });
    for await (const page of pages) {
      yield* page.Contents ?? [];
    }
  }

  return {
    async list() {
      const documents: DocumentDescriptor[] = [];
      for await (const object of objects()) {
        const key = object.Key;
        if (!key || !hasSupportedExtension(key, options.supportedExtensions)) {
          continue;
        }
        documents.push(
          createDescriptor({
            key,
            size: object.Size ?? 0,
            modifiedAt: object.LastModified?.toISOString() ?? "",
            fingerprint: fingerprintFromEtag(key, object.ETag),
          }),
        );
      }
      return documents;
    },

    async head(key) {
      try {
        const res = await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
        return createDescriptor({
          key,
          size: res.ContentLength ?? 0,
          modifiedAt: res.LastModified?.toISOString() ?? "",
          fingerprint: fingerprintFromEtag(key, res.ETag),
        });
      } catch (err) {
        if (isNotFound(err)) return null;
        throw err;
      }
    },

    async fetch(key) {
      try {
        const res = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        if (!res.Body) return new Uint8Array();
        return await res.Body.transformToByteArray();
      } catch (err) {
        if (isNotFound(err)) throw new DocumentNotFoundError(key, { cause: err });
        throw err;
      }
    },

    async urlFor(key, ttlSeconds) {
      return getSignedUrl(client, new GetObjectCommand({ Bucket: bucket, Key: key }), {
        expiresIn: ttlSeconds,
      });
    },

    async stats() {
      let documentCount = 0;
      let totalSizeBytes = 0;
      for await (const object of objects()) {
        documentCount++;
        totalSizeBytes += object.Size ?? 0;
      }
      return {
        backend: "s3",
        location: `s3://${bucket}/${prefix ?? ""}`,
        documentCount,
        totalSizeBytes,
      };
    },
  };
}
