export type { DocumentDescriptor, StoreStats } from "./types.js";
export type { BlobStore } from "./interface.js";
export {
  createDescriptor,
  extensionOf,
  fileNameOf,
  fingerprintFromEtag,
  hasSupportedExtension,
  normalizeEtag,
} from "./keys.js";
export {
  createHttpBlobStore,
  type HttpBlobStoreOptions,
} from "./http.js";
export {
  createLocalBlobStore,
  type LocalBlobStoreOptions,
} from "./local.js";
export {
  createS3BlobStore,
  createS3Client,
  type S3BlobStoreOptions,
} from "./s3.js";
