export { DEFAULT_ROOT_PATH } from "./defaults.js";
export {
  loadConfig,
  saveConfig,
  applyEnvOverrides,
  type LoadConfigOptions,
} from "./loader.js";
export {
  expandHomePath,
  resolveRootPath,
  resolveConfiguredPath,
} from "./paths.js";
