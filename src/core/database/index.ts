/**
 * Database backend selection
 */

import type { DatabaseKind, PostgresCredentials, RunContext } from "../../types";
import type { ServiceController } from "../../docker/compose";
import { PostgresClient } from "../../docker/postgres";
import { resolveFrom } from "../../utils/path";
import type { Sleep } from "../../utils/polling";
import { PostgresBackend } from "./postgres";
import { SqliteBackend } from "./sqlite";
import type { DatabaseBackend } from "./types";

export { PostgresBackend } from "./postgres";
export { SqliteBackend } from "./sqlite";
export type { DatabaseBackend, DatabaseRestoreOutcome } from "./types";

export interface BackendDeps {
  services: ServiceController;
  sleep?: Sleep;
}

/**
 * Build the backend for kind. PostgreSQL credentials default to the run
 * context's; a restore passes the ones read from the restored .env.
 */
export function createDatabaseBackend(
  ctx: RunContext,
  kind: DatabaseKind,
  deps: BackendDeps,
  postgresCredentials?: PostgresCredentials,
): DatabaseBackend {
  if (kind === "sqlite") {
    return new SqliteBackend({
      file: resolveFrom(ctx.paths.dataDir, ctx.config.database.sqlite.file),
      dataDir: ctx.paths.dataDir,
      exclude: [ctx.paths.backupDir],
      owner: ctx.config.install.owner,
    });
  }

  const credentials =
    postgresCredentials ?? (ctx.credentials.kind === "postgres" ? ctx.credentials : null);
  if (!credentials) {
    throw new Error("PostgreSQL backend requested without PostgreSQL credentials");
  }

  return new PostgresBackend({
    client: new PostgresClient(deps.services, credentials),
    services: deps.services,
    readiness: ctx.config.restore.readiness,
    sleep: deps.sleep,
  });
}
