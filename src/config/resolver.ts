/**
 * Resolution of paths, database kind and credentials into a RunContext
 */

import * as path from "node:path";
import type {
  DatabaseCredentials,
  DatabaseKind,
  N8nBackupConfig,
  RunContext,
} from "../types";
import { resolveFrom } from "../utils/path";
import type { EnvMap } from "./env-file";
import { ConfigError } from "./validator";

export const LOCK_FILE_NAME = ".n8n-backup.lock";

export function resolvePaths(config: N8nBackupConfig): RunContext["paths"] {
  const installDir = path.resolve(config.install.dir);

  return {
    installDir,
    dataDir: resolveFrom(installDir, config.install.dataDir),
    backupDir: resolveFrom(installDir, config.backup.dir),
    composeFile: resolveFrom(installDir, config.install.composeFile),
    logFile: resolveFrom(installDir, config.log.file),
    lockFile: path.join(installDir, LOCK_FILE_NAME),
  };
}

/**
 * Decide the database backend once per run: explicit config wins, otherwise
 * an install whose .env carries PostgreSQL credentials runs on PostgreSQL.
 */
export function resolveDatabaseKind(config: N8nBackupConfig, installEnv: EnvMap): DatabaseKind {
  if (config.database.kind) {
    return config.database.kind;
  }
  return installEnv.POSTGRES_USER ? "postgres" : "sqlite";
}

export function resolveCredentials(
  config: N8nBackupConfig,
  kind: DatabaseKind,
  dataDir: string,
): DatabaseCredentials {
  if (kind === "sqlite") {
    return { kind, file: resolveFrom(dataDir, config.database.sqlite.file) };
  }

  const pg = config.database.postgres;
  if (!pg.user || !pg.database) {
    throw new ConfigError(
      "PostgreSQL credentials missing: set database.postgres.user/database or POSTGRES_USER/POSTGRES_DB in the install .env",
    );
  }

  return {
    kind,
    service: pg.service,
    user: pg.user,
    password: pg.password ?? "",
    database: pg.database,
    host: pg.host,
    port: pg.port,
  };
}

export function buildRunContext(config: N8nBackupConfig, installEnv: EnvMap): RunContext {
  const paths = resolvePaths(config);
  const databaseKind = resolveDatabaseKind(config, installEnv);
  const credentials = resolveCredentials(config, databaseKind, paths.dataDir);

  return deepFreeze({
    config: { ...config, database: { ...config.database, kind: databaseKind } },
    databaseKind,
    credentials,
    paths,
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
