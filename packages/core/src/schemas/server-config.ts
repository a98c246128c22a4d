import { z } from "zod";

export const DEFAULTS = {
  server: {
    port: 8080,
    origin: "http://localhost:8080",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  store: {
    backend: "local" as const,
    local: {},
    supportedExtensions: [
      ".txt",
      ".md",
      ".csv",
      ".tsv",
      ".json",
      ".log",
      ".html",
      ".htm",
      ".pdf",
      ".docx",
      ".xlsx",
    ],
    urlTtlSeconds: 3600,
  },
  index: {
    name: "documents",
  },
  processing: {
    maxFileSizeMb: 100,
    defaultConcurrency: 5,
    maxConcurrency: 20,
    syncConcurrency: 3,
    keyPageSize: 500,
  },
};

export const StoreBackend = z.enum(["local", "http", "s3"]);

export const LocalStoreConfigSchema = z.object({
  rootDir: z
    .string()
    .min(1)
    .optional()
    .describe("Directory holding the documents (default: <root>/documents)"),
});

export const HttpStoreConfigSchema = z.object({
  apiUrl: z.url(),
  bucket: z.string().min(1),
  token: z.string().min(1).optional(),
});

export const S3StoreConfigSchema = z.object({
  bucket: z.string().min(1),
  region: z.string().min(1).default("us-east-1"),
  prefix: z
    .string()
    .optional()
    .describe("Only keys under this prefix are listed, e.g. \"reports/\""),
  endpoint: z
    .url()
    .optional()
    .describe("S3-compatible endpoint such as MinIO; AWS when unset"),
  forcePathStyle: z.boolean().default(false),
});

export const ServerConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
      origin: z.url().default(DEFAULTS.server.origin),
      adminToken: z
        .string()
        .min(1)
        .optional()
        .describe("Bearer token required on mutating routes when set"),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  store: z
    .object({
      backend: StoreBackend.default(DEFAULTS.store.backend),
      local: LocalStoreConfigSchema.default(DEFAULTS.store.local),
      http: HttpStoreConfigSchema.optional(),
      s3: S3StoreConfigSchema.optional(),
      supportedExtensions: z
        .array(z.string().regex(/^\.[a-z0-9]+$/, "must look like \".txt\""))
        .min(1)
        .default(DEFAULTS.store.supportedExtensions),
      urlTtlSeconds: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.store.urlTtlSeconds),
    })
    .refine((store) => store.backend !== "http" || store.http !== undefined, {
      message: 'store.http is required when store.backend is "http"',
      path: ["http"],
    })
    .refine((store) => store.backend !== "s3" || store.s3 !== undefined, {
      message: 'store.s3 is required when store.backend is "s3"',
      path: ["s3"],
    })
    .default(DEFAULTS.store),
  index: z
    .object({
      name: z.string().min(1).default(DEFAULTS.index.name),
      path: z
        .string()
        .min(1)
        .optional()
        .describe("SQLite file (default: <root>/index.db)"),
    })
    .default(DEFAULTS.index),
  processing: z
    .object({
      maxFileSizeMb: z
        .number()
        .positive()
        .default(DEFAULTS.processing.maxFileSizeMb),
      defaultConcurrency: z
        .number()
        .int()
        .min(1)
        .max(20)
        .default(DEFAULTS.processing.defaultConcurrency),
      maxConcurrency: z
        .number()
        .int()
        .min(1)
        .max(20)
        .default(DEFAULTS.processing.maxConcurrency),
      syncConcurrency: z
        .number()
        .int()
        .min(1)
        .max(20)
        .default(DEFAULTS.processing.syncConcurrency),
      keyPageSize: z
        .number()
        .int()
        .min(1)
        .max(10_000)
        .default(DEFAULTS.processing.keyPageSize),
    })
    .default(DEFAULTS.processing),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
export type StoreConfig = ServerConfig["store"];
export type ProcessingConfig = ServerConfig["processing"];
export type HttpStoreConfig = z.infer<typeof HttpStoreConfigSchema>;
export type S3StoreConfig = z.infer<typeof S3StoreConfigSchema>;

/** Converts the configured megabyte limit to bytes. */
export function maxFileSizeBytes(processing: ProcessingConfig): number {
  return Math.floor(processing.maxFileSizeMb * 1024 * 1024);
}
