import { createHash } from "node:crypto";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { DocumentNotFoundError, ValidationError } from "../errors/catalog.js";
import { createLocalBlobStore } from "./local.js";

function sha256(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

describe("LocalBlobStore", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), "local-store-test-"));
    await mkdir(join(rootDir, "reports", "2026"), { recursive: true });
    await writeFile(join(rootDir, "readme.md"), "# Hello");
    await writeFile(join(rootDir, "reports", "2026", "q1.txt"), "revenue up");
    await writeFile(join(rootDir, "reports", "photo.png"), "binary");
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  function store() {
    return createLocalBlobStore({
      rootDir,
      supportedExtensions: [".txt", ".md"],
    });
  }

  it("lists allow-listed files with content fingerprints, sorted by key", async () => {
    const documents = await store().list();

    expect(documents.map((d) => d.key)).toEqual([
      "readme.md",
      "reports/2026/q1.txt",
    ]);
    expect(documents[1]).toMatchObject({
      key: "reports/2026/q1.txt",
      size: 10,
      fingerprint: sha256("revenue up"),
      fileName: "q1.txt",
      fileExtension: "txt",
    });
  });

  it("changes the fingerprint when content changes", async () => {
    const before = await store().head("readme.md");
    await writeFile(join(rootDir, "readme.md"), "# Changed");
    const after = await store().head("readme.md");

    expect(before?.fingerprint).toBe(sha256("# Hello"));
    expect(after?.fingerprint).toBe(sha256("# Changed"));
  });

  it("head returns null for a missing key", async () => {
    await expect(store().head("nope.txt")).resolves.toBeNull();
  });

  it("fetch returns file bytes", async () => {
    const bytes = await store().fetch("reports/2026/q1.txt");
    expect(new TextDecoder().decode(bytes)).toBe("revenue up");
  });

  it("fetch throws DocumentNotFoundError for a missing key", async () => {
    await expect(store().fetch("nope.txt")).rejects.toBeInstanceOf(
      DocumentNotFoundError,
    );
  });

  it("rejects keys that escape the root", async () => {
    await expect(store().fetch("../outside.txt")).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it("urlFor returns a file URL", async () => {
    await expect(store().urlFor("readme.md", 60)).resolves.toBe(
      pathToFileURL(join(rootDir, "readme.md")).href,
    );
  });

  it("stats counts every file regardless of extension", async () => {
    const stats = await store().stats();

    expect(stats.backend).toBe("local");
    expect(stats.documentCount).toBe(3);
    expect(stats.totalSizeBytes).toBe(7 + 10 + 6);
  });

  it("list throws when the root directory does not exist", async () => {
    const missing = createLocalBlobStore({
      rootDir: join(rootDir, "absent"),
      supportedExtensions: [".txt"],
    });

    await expect(missing.list()).rejects.toThrow();
  });
});
