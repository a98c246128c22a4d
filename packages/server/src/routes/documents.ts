import { Hono, type Context } from "hono";
import type { Logger } from "pino";
import { DocumentNotFoundError, ValidationError } from "@docindex/core/errors";
import type { DocumentService } from "@docindex/core/ingest";
import { DocumentKeySchema, ProcessRequestSchema } from "@docindex/core/schemas";
import { createAdminAuthMiddleware } from "../middleware/admin-auth.js";
import { createBodyLimit, DEFAULT_MAX_SIZE } from "../middleware/body-limit.js";
import { parseOrThrow } from "../validate.js";

export interface DocumentRouteDeps {
  service: Pick<DocumentService, "processAll" | "processOne" | "deleteFromIndex">;
  logger: Logger;
  adminToken?: string;
}

/** Empty body means "all defaults". */
async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
}

export function documentRoutes(deps: DocumentRouteDeps): Hono {
  const app = new Hono();
  const adminAuth = createAdminAuthMiddleware(deps.adminToken);
  const bodyLimit = createBodyLimit(DEFAULT_MAX_SIZE);

  // POST /v1/documents/process, index every store document
  app.post("/process", adminAuth, bodyLimit, async (c) => {
    const { concurrency } = parseOrThrow(ProcessRequestSchema, await readJsonBody(c));
    const results = await deps.service.processAll(concurrency);

    deps.logger.info(
      {
        total: results.totalDocuments,
        processed: results.processedCount,
        failed: results.failedCount,
      },
      "Process-all request completed",
    );

    return c.json({
      message: "Document processing completed",
      results,
      timestamp: new Date().toISOString(),
    });
  });

  // POST /v1/documents/:key, index one document; keys may contain "/"
  app.post("/:key{.+}", adminAuth, async (c) => {
    const key = parseOrThrow(DocumentKeySchema, c.req.param("key"));
    const outcome = await deps.service.processOne(key);

    return c.json({
      message: "Document processing completed",
      key,
      success: outcome.status === "success",
      details: outcome.message,
      processedAt: outcome.completedAt,
      timestamp: new Date().toISOString(),
    });
  });

  // DELETE /v1/documents/:key, drop from the index; the store is untouched
  app.delete("/:key{.+}", adminAuth, async (c) => {
    const key = parseOrThrow(DocumentKeySchema, c.req.param("key"));
    const removed = await deps.service.deleteFromIndex(key);
    if (!removed) {
      throw new DocumentNotFoundError(key);
    }

    return c.json({
      message: "Document deleted from search index",
      key,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
