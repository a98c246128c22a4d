import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { ServiceError } from "@docindex/core/errors";
import type { DocumentService } from "@docindex/core/ingest";
import { healthRoute } from "./routes/health.js";
import { searchRoutes } from "./routes/search.js";
import { documentRoutes } from "./routes/documents.js";
import { syncRoutes } from "./routes/sync.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  service: DocumentService;
  adminToken?: string;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // CORS: allow all origins for browser-based clients
  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ["Content-Type", "Authorization"],
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      maxAge: 86400,
    }),
  );

  app.route(
    "/",
    healthRoute({
      version: deps.version,
      startedAt: deps.startedAt,
      service: deps.service,
    }),
  );

  app.route("/v1/search", searchRoutes({ service: deps.service }));

  // Mutating routes take the admin token when one is configured
  app.route(
    "/v1/documents",
    documentRoutes({
      service: deps.service,
      logger: deps.logger,
      adminToken: deps.adminToken,
    }),
  );

  app.route(
    "/v1/sync",
    syncRoutes({
      service: deps.service,
      logger: deps.logger,
      adminToken: deps.adminToken,
    }),
  );

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof ServiceError) {
      if (err.code >= 500) {
        deps.logger.error({ err }, err.message);
      } else {
        deps.logger.warn({ errorCode: err.errorCode }, err.message);
      }
      return c.json(err.toJSON(), err.code as ContentfulStatusCode);
    }

    deps.logger.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          code: 500,
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  // 404 fallback
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 404,
          errorCode: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}
