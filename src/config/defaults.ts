/**
 * Default configuration values
 */

import type { N8nBackupConfig } from "../types";

export const DEFAULT_INSTALL_DIR = "/home/n8n";

/** Telegram rejects bot uploads above this size */
export const TELEGRAM_FILE_LIMIT_BYTES = 20 * 1024 * 1024;

export const DEFAULT_CONFIG: N8nBackupConfig = {
  version: "1",
  install: {
    dir: DEFAULT_INSTALL_DIR,
    dataDir: "files",
    composeFile: "docker-compose.yml",
    appService: "n8n",
    owner: { uid: 1000, gid: 1000 },
  },
  database: {
    // kind is resolved from the install when unset
    sqlite: {
      file: "database.sqlite",
      encryptionKeyFile: "encryptionKey",
    },
    postgres: {
      service: "postgres",
      host: "postgres",
      port: 5432,
    },
  },
  backup: {
    dir: "files/backup_full",
    prefix: "n8n_backup",
    compression: 6,
    configFiles: [
      "docker-compose.yml",
      "Caddyfile",
      ".env",
      "telegram_config.txt",
      "gdrive_config.txt",
    ],
    schedule: "0 2 * * *",
  },
  retention: {
    maxCount: 30,
    remoteMaxAgeDays: 30,
  },
  telegram: {
    enabled: false,
    apiBaseUrl: "https://api.telegram.org",
  },
  remote: {
    enabled: false,
    remoteName: "gdrive_n8n",
    folder: "n8n_backups",
  },
  restore: {
    readiness: { maxAttempts: 24, intervalMs: 5000 },
  },
  log: {
    file: "logs/backup.log",
    maxBytes: 5 * 1024 * 1024,
    maxFiles: 3,
  },
};

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge plain objects left to right, later sources override earlier ones.
 * Arrays and scalars are replaced, undefined values are skipped.
 */
export function deepMerge(target: PlainObject, ...sources: PlainObject[]): PlainObject {
  let result: PlainObject = { ...target };

  for (const source of sources) {
    const next: PlainObject = { ...result };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      const targetValue = next[key];

      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        next[key] = deepMerge(targetValue, sourceValue);
      } else if (sourceValue !== undefined) {
        next[key] = sourceValue;
      }
    }

    result = next;
  }

  return result;
}
