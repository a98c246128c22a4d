import { z } from "zod";

/** Body of POST /v1/documents/process. */
export const ProcessRequestSchema = z.object({
  concurrency: z.number().int().min(1).max(20).optional(),
});

/** Query string of GET /v1/search. */
export const SearchQuerySchema = z.object({
  q: z
    .string({ error: "Search query cannot be empty" })
    .trim()
    .min(1, "Search query cannot be empty"),
  size: z.coerce.number().int().min(1).max(100).default(10),
  from: z.coerce.number().int().min(0).default(0),
});

/** Document keys are store-relative paths. */
export const DocumentKeySchema = z
  .string()
  .min(1, "Document key cannot be empty")
  .max(1024)
  .refine((key) => !key.startsWith("/"), "Document key must be relative")
  .refine(
    (key) => !key.split("/").includes(".."),
    "Document key must not contain '..' segments",
  );

export type ProcessRequest = z.infer<typeof ProcessRequestSchema>;
export type SearchQuery = z.infer<typeof SearchQuerySchema>;
