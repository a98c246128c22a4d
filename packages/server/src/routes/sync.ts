import { Hono } from "hono";
import type { Logger } from "pino";
import type { DocumentService } from "@docindex/core/ingest";
import { createAdminAuthMiddleware } from "../middleware/admin-auth.js";

export interface SyncRouteDeps {
  service: Pick<DocumentService, "sync">;
  logger: Logger;
  adminToken?: string;
}

export function syncRoutes(deps: SyncRouteDeps): Hono {
  const app = new Hono();
  const adminAuth = createAdminAuthMiddleware(deps.adminToken);

  // POST /v1/sync, reconcile the index with the store
  app.post("/", adminAuth, async (c) => {
    const results = await deps.service.sync();
    deps.logger.info({ added: results.added, removed: results.removed }, "Sync request completed");

    return c.json({
      message: "Synchronization completed",
      results,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
