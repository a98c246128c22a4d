import type { z } from "zod";
import { ValidationError } from "@docindex/core/errors";

/** Parse `input` or throw a ValidationError carrying the first issue's message. */
export function parseOrThrow<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    throw new ValidationError(issues[0]?.message ?? "Invalid request", { issues });
  }
  return result.data;
}
