import { mkdir } from "node:fs/promises";
import { createRequire } from "node:module";
import { dirname } from "node:path";
import type { Hono } from "hono";
import type { ServerConfig } from "@docindex/core/schemas";
import {
  DEFAULT_ROOT_PATH,
  resolveConfiguredPath,
  resolveRootPath,
} from "@docindex/core/config";
import { createLogger, type Logger } from "@docindex/core/logger";
import {
  createHttpBlobStore,
  createLocalBlobStore,
  createS3BlobStore,
  createS3Client,
  type BlobStore,
} from "@docindex/core/store";
import { createTextExtractor } from "@docindex/core/extract";
import {
  createSqliteSearchIndex,
  initializeSearchDatabase,
} from "@docindex/core/search";
import { createDocumentService, type DocumentService } from "@docindex/core/ingest";
import { createApp } from "./app.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: ServerConfig;
  startedAt: Date;
  storageRoot: string;
  service: DocumentService;
  cleanup: () => Promise<void>;
}

export interface CreateServerOptions {
  rootPath?: string;
  /** Replaces the pino logger built from `config.logging`. */
  logger?: Logger;
}

async function createBlobStore(
  config: ServerConfig,
  storageRoot: string,
  logger: Logger,
): Promise<BlobStore> {
  const { supportedExtensions } = config.store;

  if (config.store.backend === "http" && config.store.http) {
    const { apiUrl, bucket, token } = config.store.http;
    logger.info({ apiUrl, bucket }, "Using HTTP blob store");
    return createHttpBlobStore({ apiUrl, bucket, token, supportedExtensions });
  }

  if (config.store.backend === "s3" && config.store.s3) {
    const { bucket, prefix, region, endpoint } = config.store.s3;
    logger.info({ bucket, prefix, region, endpoint }, "Using S3 blob store");
    return createS3BlobStore({
      client: createS3Client(config.store.s3),
      bucket,
      prefix,
      supportedExtensions,
    });
  }

  const rootDir = resolveConfiguredPath(
    storageRoot,
    config.store.local.rootDir,
    "documents",
  );
  await mkdir(rootDir, { recursive: true });
  logger.info({ rootDir }, "Using local blob store");
  return createLocalBlobStore({ rootDir, supportedExtensions });
}

export async function createServer(
  config: ServerConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const storageRoot = resolveRootPath(options?.rootPath ?? DEFAULT_ROOT_PATH);
  await mkdir(storageRoot, { recursive: true });

  const store = await createBlobStore(config, storageRoot, logger);

  const indexPath = resolveConfiguredPath(storageRoot, config.index.path, "index.db");
  await mkdir(dirname(indexPath), { recursive: true });
  const db = initializeSearchDatabase(indexPath);
  const searchIndex = createSqliteSearchIndex(db, { name: config.index.name });
  logger.info({ indexPath, name: config.index.name }, "Search index opened");

  const service = createDocumentService({
    store,
    extractor: createTextExtractor({ logger }),
    searchIndex,
    logger,
    processing: config.processing,
    storeConfig: config.store,
  });

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    service,
    adminToken: config.server.adminToken,
  });

  if (!config.server.adminToken) {
    logger.warn("No admin token configured: mutating routes are open");
  }

  const cleanup = async () => {
    service.close();
  };

  return {
    app,
    logger,
    config,
    startedAt,
    storageRoot,
    service,
    cleanup,
  };
}
