/**
 * Configuration loading: defaults, install files, config file, environment
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { RunContext } from "../types";
import { isFile } from "../utils/fs";
import { DEFAULT_CONFIG, DEFAULT_INSTALL_DIR, deepMerge, isPlainObject, type PlainObject } from "./defaults";
import { type EnvMap, readEnvFile } from "./env-file";
import { buildRunContext } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "n8n-backup.config.yaml",
  "n8n-backup.config.yml",
  "n8n-backup.config.json",
];

export interface LoadOptions {
  /** Explicit config file path (--config) */
  configPath?: string;
  /** Install directory override (--install-dir) */
  installDir?: string;
  /** Retention override (--retention-count) */
  retentionCount?: number;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Parse a config file
 */
export async function loadConfigFile(configPath: string): Promise<PlainObject> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${absolutePath}`);
  }

  // Relative install.dir is relative to the config file
  const install = parsed.install;
  if (isPlainObject(install) && typeof install.dir === "string" && !path.isAbsolute(install.dir)) {
    return deepMerge(parsed, {
      install: { dir: path.resolve(path.dirname(absolutePath), install.dir) },
    });
  }

  return parsed;
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${(e as Error).message}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${(e as Error).message}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directories, first match wins
 */
export async function findConfigFile(searchDirs: string[]): Promise<string | null> {
  for (const dir of searchDirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(dir, name);
      if (await isFile(configPath)) {
        return configPath;
      }
    }
  }
  return null;
}

/**
 * Settings the installer wrote next to the compose file
 */
export function configFromInstallFiles(
  dotEnv: EnvMap,
  telegramFile: EnvMap,
  remoteFile: EnvMap,
): PlainObject {
  const partial: PlainObject = {};

  if (dotEnv.POSTGRES_USER || dotEnv.POSTGRES_DB || dotEnv.POSTGRES_PASSWORD) {
    partial.database = {
      postgres: {
        user: dotEnv.POSTGRES_USER,
        password: dotEnv.POSTGRES_PASSWORD,
        database: dotEnv.POSTGRES_DB,
      },
    };
  }

  if (telegramFile.TELEGRAM_BOT_TOKEN && telegramFile.TELEGRAM_CHAT_ID) {
    partial.telegram = {
      enabled: true,
      botToken: telegramFile.TELEGRAM_BOT_TOKEN,
      chatId: telegramFile.TELEGRAM_CHAT_ID,
    };
  }

  if (remoteFile.RCLONE_REMOTE_NAME && remoteFile.GDRIVE_BACKUP_FOLDER) {
    partial.remote = {
      enabled: true,
      remoteName: remoteFile.RCLONE_REMOTE_NAME,
      folder: remoteFile.GDRIVE_BACKUP_FOLDER,
    };
  }

  return partial;
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Settings taken from the process environment
 */
export function configFromEnvironment(env: NodeJS.ProcessEnv): PlainObject {
  const partial: PlainObject = {};

  const kind = env.N8N_BACKUP_DB_KIND;
  if (kind !== undefined && kind !== "") {
    if (kind !== "sqlite" && kind !== "postgres") {
      throw new ConfigError(`N8N_BACKUP_DB_KIND must be 'sqlite' or 'postgres', got "${kind}"`);
    }
    partial.database = { kind };
  }

  if (env.POSTGRES_USER || env.POSTGRES_DB || env.POSTGRES_PASSWORD) {
    partial.database = deepMerge(isPlainObject(partial.database) ? partial.database : {}, {
      postgres: {
        user: env.POSTGRES_USER || undefined,
        password: env.POSTGRES_PASSWORD || undefined,
        database: env.POSTGRES_DB || undefined,
      },
    });
  }

  const maxCount = parsePositiveInt(env.BACKUP_RETENTION_COUNT, "BACKUP_RETENTION_COUNT");
  if (maxCount !== undefined) {
    partial.retention = { maxCount };
  }

  if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
    partial.telegram = {
      enabled: true,
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId: env.TELEGRAM_CHAT_ID,
    };
  }

  if (env.RCLONE_REMOTE_NAME) {
    partial.remote = {
      enabled: true,
      remoteName: env.RCLONE_REMOTE_NAME,
      folder: env.GDRIVE_BACKUP_FOLDER || undefined,
    };
  }

  return partial;
}

/**
 * Build the immutable run context for one invocation
 */
export async function loadRunContext(options: LoadOptions = {}): Promise<RunContext> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const hintedInstallDir = options.installDir ?? env.N8N_INSTALL_DIR ?? DEFAULT_INSTALL_DIR;

  const configPath =
    options.configPath ?? (await findConfigFile([cwd, path.resolve(hintedInstallDir)]));
  const fileConfig = configPath ? await loadConfigFile(configPath) : {};

  const fileInstall = isPlainObject(fileConfig.install) ? fileConfig.install : {};
  const installDir = path.resolve(
    options.installDir ??
      (typeof fileInstall.dir === "string" ? fileInstall.dir : undefined) ??
      env.N8N_INSTALL_DIR ??
      DEFAULT_INSTALL_DIR,
  );

  const [dotEnv, telegramFile, remoteFile] = await Promise.all([
    readEnvFile(path.join(installDir, ".env")),
    readEnvFile(path.join(installDir, "telegram_config.txt")),
    readEnvFile(path.join(installDir, "gdrive_config.txt")),
  ]);

  const flags: PlainObject = { install: { dir: installDir } };
  if (options.retentionCount !== undefined) {
    flags.retention = { maxCount: options.retentionCount };
  }

  const merged = deepMerge(
    Object.fromEntries(Object.entries(structuredClone(DEFAULT_CONFIG))),
    configFromInstallFiles(dotEnv, telegramFile, remoteFile),
    fileConfig,
    configFromEnvironment(env),
    flags,
  );

  validateConfig(merged);

  return buildRunContext(merged, dotEnv);
}
