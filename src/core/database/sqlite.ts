/**
 * SQLite: the database is a single file in the n8n data directory
 */

import { chmod, chown, copyFile } from "node:fs/promises";
import * as path from "node:path";
import type { OwnerConfig } from "../../types";
import { PAYLOAD_FILES } from "../../types";
import { copyToBackupFile, ensureDir, findFile, isFile } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { MissingDatabaseError } from "../errors";
import type { DatabaseBackend, DatabaseRestoreOutcome } from "./types";

export interface SqliteBackendOptions {
  /** Live database file */
  file: string;
  /** Directory searched when file is missing */
  dataDir: string;
  /** Directories never searched (the backup dir lives under data) */
  exclude?: string[];
  owner: OwnerConfig;
}

export class SqliteBackend implements DatabaseBackend {
  readonly kind = "sqlite" as const;
  readonly payloadName = PAYLOAD_FILES.sqlite;

  constructor(private readonly options: SqliteBackendOptions) {}

  /**
   * The configured path, else the first database.sqlite below the data dir
   */
  async locate(): Promise<string | null> {
    if (await isFile(this.options.file)) {
      return this.options.file;
    }

    const exclude = (this.options.exclude ?? []).map((p) => path.resolve(p));
    const found = await findFile(this.options.dataDir, path.basename(this.options.file), exclude);
    if (found) {
      logger.debug(`Using SQLite database found at ${found}`);
    }
    return found;
  }

  async capture(credentialsDir: string): Promise<string> {
    const source = await this.locate();
    if (!source) {
      throw new MissingDatabaseError(
        `SQLite database not found at ${this.options.file} or below ${this.options.dataDir}`,
      );
    }

    await ensureDir(credentialsDir);
    const target = path.join(credentialsDir, this.payloadName);

    // Copied while n8n may be writing
    logger.debug(`Copying SQLite database without pausing writers: ${source}`);
    try {
      await copyFile(source, target);
    } catch (err) {
      throw new MissingDatabaseError(`Failed to copy SQLite database ${source}`, { cause: err });
    }

    return target;
  }

  async restore(payloadFile: string): Promise<DatabaseRestoreOutcome> {
    const target = this.options.file;
    const outcome: DatabaseRestoreOutcome = { backedUpFiles: [], warnings: [] };

    await ensureDir(path.dirname(target));

    if (await isFile(target)) {
      const bak = await copyToBackupFile(target);
      outcome.backedUpFiles.push(bak);
      logger.debug(`Saved existing database to ${bak}`);
    }

    await copyFile(payloadFile, target);
    await chmod(target, 0o644);

    const { uid, gid } = this.options.owner;
    try {
      await chown(target, uid, gid);
    } catch (err) {
      const warning = `Could not change owner of ${target} to ${uid}:${gid}: ${
        err instanceof Error ? err.message : String(err)
      }`;
      logger.warn(warning);
      outcome.warnings.push(warning);
    }

    return outcome;
  }
}
