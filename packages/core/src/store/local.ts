import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { join, relative, resolve, sep } from "node:path";
import { pathToFileURL } from "node:url";
import { DocumentNotFoundError, ValidationError } from "../errors/catalog.js";
import type { BlobStore } from "./interface.js";
import { createDescriptor, hasSupportedExtension } from "./keys.js";
import type { DocumentDescriptor } from "./types.js";

export interface LocalBlobStoreOptions {
  rootDir: string;
  supportedExtensions: readonly string[];
}

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err as NodeJS.ErrnoException).code === "ENOENT"
  );
}

/** SHA-256 of a file, read as a stream so size is not bounded by a Buffer. */
async function hashFile(path: string): Promise<string> {
  const hash = createHash("sha256");
  await pipeline(createReadStream(path), async (source: AsyncIterable<Buffer>) => {
    for await (const chunk of source) hash.update(chunk);
  });
  return hash.digest("hex");
}

/**
 * Blob store over a directory tree. Keys are paths relative to `rootDir`;
 * the fingerprint is the SHA-256 of the file content.
 */
export function createLocalBlobStore(options: LocalBlobStoreOptions): BlobStore {
  const root = resolve(options.rootDir);

  function pathFor(key: string): string {
    const full = resolve(root, ...key.split("/"));
    if (full !== root && !full.startsWith(root + sep)) {
      throw new ValidationError(`Key escapes the store root: ${key}`);
    }
    return full;
  }

  async function listFiles(dir = root): Promise<string[]> {
    const keys: string[] = [];
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        keys.push(...(await listFiles(full)));
      } else if (entry.isFile()) {
        keys.push(relative(root, full).split(sep).join("/"));
      }
    }
    return dir === root ? keys.sort() : keys;
  }

  async function describe(key: string): Promise<DocumentDescriptor> {
    const path = pathFor(key);
    const [info, fingerprint] = await Promise.all([stat(path), hashFile(path)]);
    return createDescriptor({
      key,
      size: info.size,
      modifiedAt: info.mtime.toISOString(),
      fingerprint,
    });
  }

  return {
    async list() {
      const keys = (await listFiles()).filter((key) =>
        hasSupportedExtension(key, options.supportedExtensions),
      );
      const documents: DocumentDescriptor[] = [];
      for (const key of keys) {
        try {
          documents.push(await describe(key));
        } catch (err) {
          // Removed between readdir and stat
          if (!isMissing(err)) throw err;
        }
      }
      return documents;
    },

    async head(key) {
      try {
        return await describe(key);
      } catch (err) {
        if (isMissing(err)) return null;
        throw err;
      }
    },

    async fetch(key) {
      try {
        return new Uint8Array(await readFile(pathFor(key)));
      } catch (err) {
        if (isMissing(err)) throw new DocumentNotFoundError(key, { cause: err });
        throw err;
      }
    },

    async urlFor(key) {
      return pathToFileURL(pathFor(key)).href;
    },

    async stats() {
      let totalSizeBytes = 0;
      const keys = await listFiles();
      for (const key of keys) {
        try {
          totalSizeBytes += (await stat(pathFor(key))).size;
        } catch (err) {
          if (!isMissing(err)) throw err;
        }
      }
      return {
        backend: "local",
        location: root,
        documentCount: keys.length,
        totalSizeBytes,
      };
    },
  };
}
