/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_INSTALL_DIR, TELEGRAM_FILE_LIMIT_BYTES, deepMerge } from "./defaults";
// Install files
export { parseEnvFile, readEnvFile } from "./env-file";
// Loader
export {
  CONFIG_FILE_NAMES,
  ConfigError,
  configFromEnvironment,
  configFromInstallFiles,
  findConfigFile,
  loadConfigFile,
  loadRunContext,
  type LoadOptions,
} from "./loader";
// Resolver
export {
  buildRunContext,
  LOCK_FILE_NAME,
  resolveCredentials,
  resolveDatabaseKind,
  resolvePaths,
} from "./resolver";
// Validator
export { validateConfig } from "./validator";
