import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  ServerConfigSchema,
  type ServerConfig,
} from "../schemas/server-config.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
  /**
   * Environment to read overrides from (default: process.env).
   * Overrides are applied after the file is written back, so secrets
   * passed through the environment never land in config.json.
   */
  env?: NodeJS.ProcessEnv;
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ServerConfig> {
  const configPath =
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json");

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      // Missing file: defaults apply
    } else {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = ServerConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return applyEnvOverrides(config, options?.env ?? process.env);
}

export async function saveConfig(
  config: ServerConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath =
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json");
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

/**
 * DOCINDEX_STORE_TOKEN → store.http.token
 * DOCINDEX_ADMIN_TOKEN → server.adminToken
 * DOCINDEX_LOG_LEVEL   → logging.level
 */
export function applyEnvOverrides(
  config: ServerConfig,
  env: NodeJS.ProcessEnv,
): ServerConfig {
  const storeToken = env.DOCINDEX_STORE_TOKEN;
  const adminToken = env.DOCINDEX_ADMIN_TOKEN;
  const logLevel = env.DOCINDEX_LOG_LEVEL;

  return ServerConfigSchema.parse({
    ...config,
    server: adminToken ? { ...config.server, adminToken } : config.server,
    logging: logLevel ? { ...config.logging, level: logLevel } : config.logging,
    store:
      storeToken && config.store.http
        ? { ...config.store, http: { ...config.store.http, token: storeToken } }
        : config.store,
  });
}
