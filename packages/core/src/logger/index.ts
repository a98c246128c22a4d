import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../schemas/server-config.js";

export type { Logger } from "pino";

export interface CreateLoggerOptions {
  /** Component name bound to every line (default: "docindex") */
  name?: string;
}

/** Fields that may carry credentials; never written out. */
export const REDACTED_PATHS = [
  "token",
  "*.token",
  "headers.authorization",
  "*.headers.authorization",
];

export function createLogger(
  config: LoggingConfig,
  options?: CreateLoggerOptions,
): Logger {
  const usePretty = config.pretty || process.env.NODE_ENV !== "production";

  return pino({
    name: options?.name ?? "docindex",
    level: config.level,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    ...(usePretty ? { transport: { target: "pino-pretty" } } : {}),
  });
}
