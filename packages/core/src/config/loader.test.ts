import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { access, mkdtemp, readFile, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { applyEnvOverrides, loadConfig } from "./loader.js";
import { ServerConfigSchema } from "../schemas/server-config.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "config-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("loadConfig", () => {
  it("returns defaults when file is missing", async () => {
    await withTempDir(async (dir) => {
      const config = await loadConfig({
        configPath: join(dir, "config.json"),
        env: {},
      });

      expect(config.server.port).toBe(8080);
      expect(config.logging.level).toBe("info");
      expect(config.logging.pretty).toBe(false);
      expect(config.store.backend).toBe("local");
      expect(config.index.name).toBe("documents");
      expect(config.processing.maxFileSizeMb).toBe(100);
    });
  });

  it("parses valid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(
        configPath,
        JSON.stringify({
          server: { port: 3000 },
          logging: { level: "debug", pretty: true },
          store: {
            backend: "http",
            http: { apiUrl: "https://blobs.example.com", bucket: "docs" },
          },
          processing: { maxFileSizeMb: 10 },
        }),
      );

      const config = await loadConfig({ configPath, env: {} });

      expect(config.server.port).toBe(3000);
      expect(config.logging.level).toBe("debug");
      expect(config.logging.pretty).toBe(true);
      expect(config.store.backend).toBe("http");
      expect(config.store.http?.bucket).toBe("docs");
      expect(config.processing.maxFileSizeMb).toBe(10);
      expect(config.processing.defaultConcurrency).toBe(5);
    });
  });

  it("throws ZodError for invalid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, JSON.stringify({ server: { port: -1 } }));

      await expect(loadConfig({ configPath, env: {} })).rejects.toThrow();
    });
  });

  it("throws for malformed JSON", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, "{ invalid json }}}");

      await expect(loadConfig({ configPath, env: {} })).rejects.toThrow(
        SyntaxError,
      );
    });
  });

  it("writes defaults to disk when file is missing", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "subdir", "config.json");
      await loadConfig({ configPath, env: {} });

      await expect(access(configPath)).resolves.toBeUndefined();
      const contents = JSON.parse(await readFile(configPath, "utf-8"));
      expect(contents.server.port).toBe(8080);
      expect(contents.processing.syncConcurrency).toBe(3);
    });
  });

  it("does not rewrite file when config already has all defaults", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");

      await loadConfig({ configPath, env: {} });
      const firstWrite = await readFile(configPath, "utf-8");

      await loadConfig({ configPath, env: {} });
      const secondRead = await readFile(configPath, "utf-8");

      expect(secondRead).toBe(firstWrite);
    });
  });

  it("applies environment overrides without writing them to disk", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(
        configPath,
        JSON.stringify({
          store: {
            backend: "http",
            http: { apiUrl: "https://blobs.example.com", bucket: "docs" },
          },
        }),
      );

      const config = await loadConfig({
        configPath,
        env: { DOCINDEX_STORE_TOKEN: "test-secret" },
      });

      expect(config.store.http?.token).toBe("test-secret");
      const onDisk = await readFile(configPath, "utf-8");
      expect(onDisk).not.toContain("test-secret");
    });
  });
});

describe("applyEnvOverrides", () => {
  it("sets the admin token and log level", () => {
    const config = applyEnvOverrides(ServerConfigSchema.parse({}), {
      DOCINDEX_ADMIN_TOKEN: "test-admin",
      DOCINDEX_LOG_LEVEL: "warn",
    });

    expect(config.server.adminToken).toBe("test-admin");
    expect(config.logging.level).toBe("warn");
  });

  it("ignores the store token when the store is local", () => {
    const config = applyEnvOverrides(ServerConfigSchema.parse({}), {
      DOCINDEX_STORE_TOKEN: "test-secret",
    });

    expect(config.store.http).toBeUndefined();
  });

  it("rejects an unknown log level", () => {
    expect(() =>
      applyEnvOverrides(ServerConfigSchema.parse({}), {
        DOCINDEX_LOG_LEVEL: "verbose",
      }),
    ).toThrow();
  });
});
