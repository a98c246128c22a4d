import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured root path (or default) to an absolute path.
 */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

/**
 * Resolves a path from config.json. Relative paths are taken from the root
 * path, a missing value falls back to `fallback` under the root path.
 */
export function resolveConfiguredPath(
  rootPath: string,
  configured: string | undefined,
  fallback: string,
): string {
  const value = expandHomePath(configured ?? fallback);
  return isAbsolute(value) ? value : join(rootPath, value);
}
