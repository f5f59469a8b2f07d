/**
 * Backup orchestration
 */

import type { ServiceController } from "../../docker/compose";
import type { BackupArchive, BackupRunResult, RemoteStore, RunContext } from "../../types";
import { cleanupOrphanTempDirs } from "../../utils/fs";
import { withLock } from "../../utils/lock";
import { logger } from "../../utils/logger";
import { formatBytes, formatDuration } from "../../utils/naming";
import { runRetention } from "../cleanup";
import type { DatabaseBackend } from "../database";
import { errorMessage } from "../errors";
import { distributeArchive, notifyFailure, type TelegramNotifier } from "../transport";
import { type Archiver, createArchive } from "./archive-creator";
import { createSnapshot } from "./snapshot";

export interface BackupDeps {
  backend: DatabaseBackend;
  archiver: Archiver;
  services?: ServiceController;
  remote: RemoteStore | null;
  telegram: TelegramNotifier | null;
  now?: () => Date;
  /** Where orphaned temp dirs are looked for (defaults to the OS temp dir) */
  tmpRoot?: string;
}

/**
 * Snapshot, archive and verify under the install lock, then apply
 * retention and distribute. Only the first half can fail the run.
 */
export async function runBackup(ctx: RunContext, deps: BackupDeps): Promise<BackupRunResult> {
  const startTime = Date.now();

  return withLock(ctx.paths.lockFile, async () => {
    logger.info(`Starting backup of ${ctx.paths.installDir} (${ctx.databaseKind})`);

    await cleanupOrphanTempDirs(ctx.paths.installDir, deps.tmpRoot);

    let archive: BackupArchive;
    try {
      const snapshot = await createSnapshot(ctx, {
        backend: deps.backend,
        services: deps.services,
        now: deps.now,
      });
      archive = await createArchive(
        snapshot,
        ctx.paths.backupDir,
        deps.archiver,
        ctx.config.backup.compression,
      );
    } catch (error) {
      logger.error(`Backup failed: ${errorMessage(error)}`);
      await notifyFailure(error, deps);
      throw error;
    }

    const retention = await runRetention(ctx, { remote: deps.remote });
    const distribution = await distributeArchive(archive, deps);

    const issues = [...retention.issues, ...distribution.issues];
    const durationMs = Date.now() - startTime;

    logger.info(
      `Backup complete: ${archive.fileName} (${formatBytes(archive.sizeBytes)}) in ${formatDuration(durationMs)}` +
        (issues.length > 0 ? ` with ${issues.length} warning(s)` : ""),
    );

    return {
      archive,
      durationMs,
      retention: {
        localKept: retention.localKept,
        localDeleted: retention.localDeleted,
        remotePruned: retention.remotePruned,
      },
      transport: distribution.transport,
      issues,
    };
  });
}
