/**
 * PostgreSQL: logical dump taken and replayed inside the database service
 */

import { rm } from "node:fs/promises";
import * as path from "node:path";
import type { PollingPolicy } from "../../types";
import { PAYLOAD_FILES } from "../../types";
import type { ServiceController } from "../../docker/compose";
import { isCredentialFailure, type PostgresClient } from "../../docker/postgres";
import { ensureDir } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { pollUntil, type Sleep } from "../../utils/polling";
import {
  CredentialMismatchError,
  DatabaseNotReadyError,
  MissingDatabaseError,
  RestoreError,
} from "../errors";
import type { DatabaseBackend, DatabaseRestoreOutcome } from "./types";

export interface PostgresBackendOptions {
  client: PostgresClient;
  services: ServiceController;
  readiness: PollingPolicy;
  sleep?: Sleep;
}

export class PostgresBackend implements DatabaseBackend {
  readonly kind = "postgres" as const;
  readonly payloadName = PAYLOAD_FILES.postgres;

  constructor(private readonly options: PostgresBackendOptions) {}

  async capture(credentialsDir: string): Promise<string> {
    await ensureDir(credentialsDir);
    const target = path.join(credentialsDir, this.payloadName);
    const { client } = this.options;

    const result = await client.dump(target);
    if (!result.success) {
      await rm(target, { force: true });
      throw new MissingDatabaseError(
        `pg_dump failed in service "${client.service}": ${result.stderr || `exit code ${result.exitCode}`}`,
      );
    }

    return target;
  }

  async restore(payloadFile: string): Promise<DatabaseRestoreOutcome> {
    const { client, services, readiness, sleep } = this.options;

    const up = await services.up([client.service]);
    if (!up.success) {
      throw new RestoreError("apply", `Failed to start database service "${client.service}": ${up.stderr}`);
    }

    const poll = await pollUntil(
      () => client.isReady(),
      readiness,
      sleep,
      (attempt) => logger.debug(`Waiting for ${client.service} (attempt ${attempt}/${readiness.maxAttempts})`),
    );
    if (!poll.ready) {
      throw new DatabaseNotReadyError(client.service, poll.attempts);
    }

    const load = await client.load(payloadFile);
    if (!load.success) {
      const stopped = await services.stop([client.service]);
      if (!stopped.success) {
        logger.warn(`Failed to stop database service "${client.service}": ${stopped.stderr}`);
      }

      if (isCredentialFailure(load.stderr)) {
        throw new CredentialMismatchError(
          `Database rejected the restored credentials: ${load.stderr}`,
        );
      }
      throw new RestoreError("apply", `Replaying ${this.payloadName} failed: ${load.stderr}`);
    }

    return { backedUpFiles: [], warnings: [] };
  }
}
