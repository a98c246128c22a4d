import { mkdtemp, open, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { IndexUnavailableError, StoreUnavailableError } from "../errors/catalog.js";
import { createTextExtractor } from "../extract/text.js";
import type { ProcessingConfig } from "../schemas/server-config.js";
import {
  createMemoryBlobStore,
  createMemorySearchIndex,
  makeIndexRecord,
  type MemoryBlobStore,
  type MemorySearchIndex,
} from "../test-utils/fakes.js";
import { createLocalBlobStore } from "../store/local.js";
import { MESSAGES } from "./processor.js";
import { createDocumentService, type DocumentService } from "./service.js";

const logger = pino({ level: "silent" });
const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const processing: ProcessingConfig = {
  maxFileSizeMb: 1,
  defaultConcurrency: 5,
  maxConcurrency: 20,
  syncConcurrency: 3,
  keyPageSize: 500,
};

describe("DocumentService", () => {
  let store: MemoryBlobStore;
  let index: MemorySearchIndex;
  let service: DocumentService;

  beforeEach(() => {
    store = createMemoryBlobStore();
    index = createMemorySearchIndex();
    service = createDocumentService({
      store,
      extractor: createTextExtractor(),
      searchIndex: index,
      logger,
      processing,
      storeConfig: { supportedExtensions: [".txt", ".md"], urlTtlSeconds: 3600 },
    });
  });

  describe("processAll", () => {
    it("bounds concurrent fetches by the requested concurrency", async () => {
      for (const name of ["a", "b", "c", "d", "e", "f", "g", "h"]) {
        store.put(`${name}.txt`, `document ${name}`);
      }
      const realFetch = store.fetch;
      let inFlight = 0;
      let maxInFlight = 0;
      vi.spyOn(store, "fetch").mockImplementation(async (key) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(5);
        inFlight--;
        return realFetch(key);
      });

      const summary = await service.processAll(2);

      expect(maxInFlight).toBe(2);
      expect(summary.totalDocuments).toBe(8);
      expect(summary.processedCount).toBe(8);
      expect(index.records.size).toBe(8);
    });

    it("is idempotent", async () => {
      store.put("a.txt", "alpha");
      store.put("b.txt", "beta");

      await service.processAll();
      const second = await service.processAll();

      expect(second.processedCount).toBe(2);
      expect(second.outcomes.map((outcome) => outcome.message)).toEqual([
        MESSAGES.unchanged,
        MESSAGES.unchanged,
      ]);
    });

    it("refreshes the index after the batch", async () => {
      store.put("a.txt", "alpha");
      const refresh = vi.spyOn(index, "refresh");

      await service.processAll();

      expect(refresh).toHaveBeenCalledTimes(1);
    });

    it("fails fast when the index is unreachable", async () => {
      vi.spyOn(index, "ping").mockRejectedValue(new Error("no such table"));
      const list = vi.spyOn(store, "list");

      await expect(service.processAll()).rejects.toBeInstanceOf(IndexUnavailableError);
      expect(list).not.toHaveBeenCalled();
    });

    it("fails fast when the store cannot be listed", async () => {
      vi.spyOn(store, "list").mockRejectedValue(new Error("ECONNREFUSED"));

      const error = await service.processAll().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StoreUnavailableError);
      expect(error).toMatchObject({ code: 503, details: { reason: "ECONNREFUSED" } });
    });

    it("lists the store only after a running batch has finished", async () => {
      store.put("a.txt", "alpha");

      const [summary, synced] = await Promise.all([service.processAll(), service.sync()]);

      expect(summary.processedCount).toBe(1);
      expect(synced).toMatchObject({
        storeDocumentCount: 1,
        indexedDocumentCount: 1,
        added: 0,
        removed: 0,
      });
    });
  });

  describe("processOne", () => {
    it("indexes a single document", async () => {
      store.put("docs/a.md", "# Alpha");

      const outcome = await service.processOne("docs/a.md");

      expect(outcome.status).toBe("success");
      expect(index.records.get("docs/a.md")?.extractedText).toBe("# Alpha");
    });

    it("reports a key the store does not have", async () => {
      const outcome = await service.processOne("missing.txt");
      expect(outcome).toMatchObject({ status: "failed", failure: "not_found" });
    });
  });

  it("sync reconciles the store with the index", async () => {
    store.put("a.txt", "alpha");
    index.records.set("stale.txt", makeIndexRecord("stale.txt"));

    const summary = await service.sync();

    expect(summary.added).toBe(1);
    expect(summary.removed).toBe(1);
  });

  describe("search", () => {
    beforeEach(() => {
      index.records.set(
        "a.txt",
        makeIndexRecord("a.txt", { extractedText: "needle one", url: "" }),
      );
      index.records.set(
        "b.txt",
        makeIndexRecord("b.txt", { extractedText: "needle two", url: "https://files.test/b" }),
      );
    });

    it("fills in URLs only for hits without one", async () => {
      const urlFor = vi.spyOn(store, "urlFor");

      const result = await service.search("needle", { size: 10, offset: 0 });

      expect(result.total).toBe(2);
      expect(result.hits.map((hit) => hit.url)).toEqual([
        "memory://store/a.txt",
        "https://files.test/b",
      ]);
      expect(urlFor).toHaveBeenCalledTimes(1);
      expect(urlFor).toHaveBeenCalledWith("a.txt", 3600);
    });

    it("leaves the URL empty when none can be issued", async () => {
      vi.spyOn(store, "urlFor").mockRejectedValue(new Error("denied"));

      const result = await service.search("needle", { size: 1, offset: 0 });

      expect(result.hits).toHaveLength(1);
      expect(result.hits[0]?.url).toBe("");
    });

    it("reports an unreachable index", async () => {
      vi.spyOn(index, "search").mockRejectedValue(new Error("database is locked"));

      await expect(service.search("needle", { size: 10, offset: 0 })).rejects.toBeInstanceOf(
        IndexUnavailableError,
      );
    });
  });

  describe("deleteFromIndex", () => {
    it("removes an indexed record but never the stored document", async () => {
      store.put("a.txt", "alpha");
      await service.processOne("a.txt");

      expect(await service.deleteFromIndex("a.txt")).toBe(true);
      expect(index.records.has("a.txt")).toBe(false);
      expect((await store.list()).map((d) => d.key)).toEqual(["a.txt"]);
    });

    it("returns false for a key that is not indexed", async () => {
      expect(await service.deleteFromIndex("a.txt")).toBe(false);
    });
  });

  describe("status", () => {
    it("reports store, index and limits", async () => {
      store.put("a.txt", "alpha");
      store.put("b.txt", "be");
      index.records.set("a.txt", makeIndexRecord("a.txt"));

      expect(await service.status()).toEqual({
        store: {
          backend: "memory",
          location: "memory://store",
          documentCount: 2,
          totalSizeBytes: 7,
        },
        index: { name: "documents", documentCount: 1, sizeBytes: 0 },
        supportedExtensions: [".txt", ".md"],
        maxFileSizeMb: 1,
      });
    });

    it("reports an unreachable store", async () => {
      vi.spyOn(store, "stats").mockRejectedValue(new Error("timeout"));
      await expect(service.status()).rejects.toBeInstanceOf(StoreUnavailableError);
    });
  });
});

describe("DocumentService over a directory", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), "service-local-test-"));
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it(
    "reports a file larger than a Buffer can hold as too large",
    async () => {
      await writeFile(join(rootDir, "small.txt"), "quarterly numbers");
      const huge = await open(join(rootDir, "huge.txt"), "w");
      try {
        // Sparse, so it takes no disk space
        await huge.truncate(2 ** 31 + 1024);
      } finally {
        await huge.close();
      }
      const index = createMemorySearchIndex();
      const service = createDocumentService({
        store: createLocalBlobStore({ rootDir, supportedExtensions: [".txt"] }),
        extractor: createTextExtractor(),
        searchIndex: index,
        logger,
        processing,
        storeConfig: { supportedExtensions: [".txt"], urlTtlSeconds: 3600 },
      });

      const summary = await service.processAll();

      expect(summary.totalDocuments).toBe(2);
      expect(summary.processedCount).toBe(1);
      expect(summary.failedCount).toBe(1);
      expect(summary.outcomes.find((outcome) => outcome.key === "huge.txt")).toMatchObject({
        status: "failed",
        failure: "too_large",
        message: "File too large: 2147484672 bytes (max: 1048576)",
      });
      expect([...index.records.keys()]).toEqual(["small.txt"]);
    },
    120_000,
  );
});
