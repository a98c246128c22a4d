import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { serve } from "@hono/node-server";
import type { ServerType } from "@hono/node-server";
import pino from "pino";
import { ServerConfigSchema } from "../../../packages/core/src/schemas/server-config.js";
import { createServer } from "../../../packages/server/src/bootstrap.js";

export interface TestServer {
  url: string;
  /** Root directory of the server; documents live under `documents/`. */
  rootPath: string;
  documentsDir: string;
  cleanup: () => Promise<void>;
}

export async function startTestServer(options?: {
  adminToken?: string;
}): Promise<TestServer> {
  const rootPath = await mkdtemp(join(tmpdir(), "e2e-docindex-"));

  const config = ServerConfigSchema.parse({
    server: { adminToken: options?.adminToken },
    logging: { level: "fatal" },
  });

  const context = await createServer(config, {
    rootPath,
    logger: pino({ level: "silent" }),
  });

  const server: ServerType = serve({ fetch: context.app.fetch, port: 0 });
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Failed to get test server address");
  }
  const { port } = address;

  return {
    url: `http://localhost:${port}`,
    rootPath,
    documentsDir: join(rootPath, "documents"),
    cleanup: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      await context.cleanup();
      await rm(rootPath, { recursive: true, force: true });
    },
  };
}
