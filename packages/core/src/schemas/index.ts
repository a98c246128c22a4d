export {
  DEFAULTS,
  StoreBackend,
  LocalStoreConfigSchema,
  HttpStoreConfigSchema,
  S3StoreConfigSchema,
  ServerConfigSchema,
  maxFileSizeBytes,
  type ServerConfig,
  type LoggingConfig,
  type StoreConfig,
  type ProcessingConfig,
  type HttpStoreConfig,
  type S3StoreConfig,
} from "./server-config.js";
export {
  ProcessRequestSchema,
  SearchQuerySchema,
  DocumentKeySchema,
  type ProcessRequest,
  type SearchQuery,
} from "./requests.js";
