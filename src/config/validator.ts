/**
 * Configuration validation
 */

import { BackupToolError } from "../core/errors";
import type { N8nBackupConfig } from "../types";
import { isPlainObject, type PlainObject } from "./defaults";

export class ConfigError extends BackupToolError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

type Validator = (config: PlainObject) => void;

function section(c: PlainObject, name: string): PlainObject {
  const value = c[name];
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

function requireString(obj: PlainObject, key: string, label: string): void {
  if (typeof obj[key] !== "string" || obj[key] === "") {
    throw new ConfigError(`${label} must be a non-empty string`);
  }
}

function optionalString(obj: PlainObject, key: string, label: string): void {
  if (obj[key] !== undefined && typeof obj[key] !== "string") {
    throw new ConfigError(`${label} must be a string`);
  }
}

function requireBoolean(obj: PlainObject, key: string, label: string): void {
  if (typeof obj[key] !== "boolean") {
    throw new ConfigError(`${label} must be a boolean`);
  }
}

function requireInteger(
  obj: PlainObject,
  key: string,
  label: string,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): void {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ConfigError(`${label} must be an integer ${range}`);
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  install: (c) => {
    const install = section(c, "install");
    requireString(install, "dir", "install.dir");
    requireString(install, "dataDir", "install.dataDir");
    requireString(install, "composeFile", "install.composeFile");
    requireString(install, "appService", "install.appService");
    const owner = install.owner;
    if (!isPlainObject(owner)) {
      throw new ConfigError("install.owner must be an object with uid and gid");
    }
    requireInteger(owner, "uid", "install.owner.uid", 0);
    requireInteger(owner, "gid", "install.owner.gid", 0);
  },

  database: (c) => {
    const db = section(c, "database");
    if (db.kind !== undefined && db.kind !== "sqlite" && db.kind !== "postgres") {
      throw new ConfigError("database.kind must be 'sqlite' or 'postgres'");
    }
    const sqlite = section(db, "sqlite");
    requireString(sqlite, "file", "database.sqlite.file");
    requireString(sqlite, "encryptionKeyFile", "database.sqlite.encryptionKeyFile");
    const pg = section(db, "postgres");
    requireString(pg, "service", "database.postgres.service");
    requireString(pg, "host", "database.postgres.host");
    requireInteger(pg, "port", "database.postgres.port", 1, 65535);
    optionalString(pg, "user", "database.postgres.user");
    optionalString(pg, "password", "database.postgres.password");
    optionalString(pg, "database", "database.postgres.database");
  },

  backup: (c) => {
    const backup = section(c, "backup");
    requireString(backup, "dir", "backup.dir");
    requireString(backup, "prefix", "backup.prefix");
    if (!/^[A-Za-z0-9-]+(?:_[A-Za-z0-9-]+)*$/.test(String(backup.prefix))) {
      throw new ConfigError("backup.prefix may only contain letters, digits, '-' and '_'");
    }
    requireInteger(backup, "compression", "backup.compression", 0, 9);
    requireString(backup, "schedule", "backup.schedule");
    const files = backup.configFiles;
    if (!Array.isArray(files) || files.some((f) => typeof f !== "string")) {
      throw new ConfigError("backup.configFiles must be an array of strings");
    }
  },

  retention: (c) => {
    const retention = section(c, "retention");
    requireInteger(retention, "maxCount", "retention.maxCount", 1);
    requireInteger(retention, "remoteMaxAgeDays", "retention.remoteMaxAgeDays", 1);
  },

  telegram: (c) => {
    const telegram = section(c, "telegram");
    requireBoolean(telegram, "enabled", "telegram.enabled");
    requireString(telegram, "apiBaseUrl", "telegram.apiBaseUrl");
    optionalString(telegram, "botToken", "telegram.botToken");
    optionalString(telegram, "chatId", "telegram.chatId");
    if (telegram.enabled && (!telegram.botToken || !telegram.chatId)) {
      throw new ConfigError("telegram.botToken and telegram.chatId are required when telegram.enabled is true");
    }
  },

  remote: (c) => {
    const remote = section(c, "remote");
    requireBoolean(remote, "enabled", "remote.enabled");
    requireString(remote, "remoteName", "remote.remoteName");
    requireString(remote, "folder", "remote.folder");
    if (String(remote.remoteName).includes(":")) {
      throw new ConfigError("remote.remoteName must be the rclone remote name without ':'");
    }
  },

  restore: (c) => {
    const restore = section(c, "restore");
    const readiness = section(restore, "readiness");
    requireInteger(readiness, "maxAttempts", "restore.readiness.maxAttempts", 1);
    requireInteger(readiness, "intervalMs", "restore.readiness.intervalMs", 0);
  },

  log: (c) => {
    const log = section(c, "log");
    requireString(log, "file", "log.file");
    requireInteger(log, "maxBytes", "log.maxBytes", 1024);
    requireInteger(log, "maxFiles", "log.maxFiles", 1);
  },
};

/**
 * Validate a merged configuration object
 */
export function validateConfig(config: unknown): asserts config is N8nBackupConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
