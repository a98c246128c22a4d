import { Hono } from "hono";
import type { DocumentService } from "@docindex/core/ingest";

export interface HealthDeps {
  version: string;
  startedAt: Date;
  service: Pick<DocumentService, "status">;
}

export function healthRoute(deps: HealthDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const uptimeMs = Date.now() - deps.startedAt.getTime();
    return c.json({
      status: "healthy",
      version: deps.version,
      uptime: Math.floor(uptimeMs / 1000),
    });
  });

  // GET /status, store and index statistics; 503 when either is unreachable
  app.get("/status", async (c) => {
    const serviceInfo = await deps.service.status();
    return c.json({
      status: "ok",
      serviceInfo,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
