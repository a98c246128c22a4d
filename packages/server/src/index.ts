import { serve } from "@hono/node-server";
import { createRequire } from "node:module";
import { loadConfig } from "@docindex/core/config";
import { createServer } from "./bootstrap.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const rootPath = process.env.DOCINDEX_ROOT_PATH;
  const config = await loadConfig({ rootPath });
  const context = await createServer(config, { rootPath });
  const { app, logger } = context;

  const server = serve(
    { fetch: app.fetch, port: config.server.port },
    (info) => {
      logger.info(
        { port: info.port, version: pkg.version },
        "HTTP server started",
      );
    },
  );

  function shutdown(signal: string): void {
    logger.info({ signal }, "Shutdown signal received, draining connections");

    // The search index closes once in-flight requests have drained
    server.close(() => {
      context.cleanup().then(
        () => {
          logger.info("Server stopped");
          process.exit(0);
        },
        (err: unknown) => {
          logger.error({ err }, "Failed to close the search index");
          process.exit(1);
        },
      );
    });

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
