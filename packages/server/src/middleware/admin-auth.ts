import { timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { UnauthorizedError } from "@docindex/core/errors";

function sameToken(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Guards mutating routes with a static bearer token.
 * Without a configured token every request passes.
 */
export function createAdminAuthMiddleware(adminToken?: string): MiddlewareHandler {
  return async (c, next) => {
    if (!adminToken) {
      await next();
      return;
    }

    const header = c.req.header("authorization") ?? "";
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (!match?.[1] || !sameToken(match[1].trim(), adminToken)) {
      throw new UnauthorizedError();
    }

    await next();
  };
}
