import { Hono } from "hono";
import type { DocumentService } from "@docindex/core/ingest";
import { SearchQuerySchema } from "@docindex/core/schemas";
import { parseOrThrow } from "../validate.js";

export interface SearchRouteDeps {
  service: Pick<DocumentService, "search">;
}

export function searchRoutes(deps: SearchRouteDeps): Hono {
  const app = new Hono();

  // GET /v1/search?q=&size=&from=
  app.get("/", async (c) => {
    const { q, size, from } = parseOrThrow(SearchQuerySchema, c.req.query());
    const result = await deps.service.search(q, { size, offset: from });

    const documents = result.hits.map((hit) => ({
      fileName: hit.fileName,
      key: hit.key,
      fileExtension: hit.fileExtension,
      sizeBytes: hit.size,
      modifiedAt: hit.modifiedAt,
      url: hit.url,
      score: hit.score,
      highlights: hit.highlights,
    }));

    return c.json({
      query: q,
      totalResults: result.total,
      returnedResults: documents.length,
      from,
      size,
      documents,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
