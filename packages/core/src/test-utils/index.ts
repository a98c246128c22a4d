export {
  createMemoryBlobStore,
  createMemorySearchIndex,
  makeIndexRecord,
  type MemoryBlobStore,
  type MemorySearchIndex,
} from "./fakes.js";
