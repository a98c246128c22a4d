import { bodyLimit } from "hono/body-limit";
import type { MiddlewareHandler } from "hono";
import { ContentTooLargeError } from "@docindex/core/errors";

/** 1 MB: max JSON body size for every route */
export const DEFAULT_MAX_SIZE = 1 * 1024 * 1024;

/**
 * Creates a Hono body-limit middleware that returns 413 JSON on overflow.
 */
export function createBodyLimit(maxSize: number): MiddlewareHandler {
  return bodyLimit({
    maxSize,
    onError: (c) => {
      const err = new ContentTooLargeError({ maxSizeBytes: maxSize });
      return c.json(err.toJSON(), 413);
    },
  });
}
