/**
 * Install-wide lock file so backup and restore runs never overlap.
 * Acquired with O_EXCL; a lock whose owner process is gone is stale and
 * taken over with an atomic rename.
 */

import { open, readFile, rename, rm, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { LockError } from "../core/errors";
import { ensureDir } from "./fs";
import { logger } from "./logger";

interface LockInfo {
  pid: number;
  timestamp: number;
}

function parseLockContent(content: string): LockInfo | null {
  const [pidLine = "", timeLine = ""] = content.trim().split("\n");
  const pid = Number.parseInt(pidLine, 10);
  const timestamp = Number.parseInt(timeLine, 10);
  return Number.isNaN(pid) || Number.isNaN(timestamp) ? null : { pid, timestamp };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but owned by another user
    return (err as NodeJS.ErrnoException).code === "EPERM";
  }
}

async function readLockInfo(lockPath: string): Promise<LockInfo | null> {
  try {
    return parseLockContent(await readFile(lockPath, "utf8"));
  } catch {
    return null;
  }
}

function lockContent(): string {
  return `${process.pid}\n${Date.now()}\n`;
}

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

async function tryCreate(lockPath: string): Promise<boolean> {
  try {
    const handle = await open(lockPath, "wx", 0o600);
    try {
      await handle.writeFile(lockContent());
    } finally {
      await handle.close();
    }
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "EEXIST") return false;
    throw err;
  }
}

export async function acquireLock(lockPath: string): Promise<LockHandle> {
  await ensureDir(path.dirname(lockPath));

  if (!(await tryCreate(lockPath))) {
    const info = await readLockInfo(lockPath);

    if (info && info.pid !== process.pid && isProcessAlive(info.pid)) {
      throw new LockError(
        `Another backup or restore is running (pid ${info.pid}, lock ${lockPath})`,
      );
    }

    logger.warn(`Taking over stale lock: ${lockPath}`);
    const tempPath = `${lockPath}.${process.pid}.tmp`;
    await writeFile(tempPath, lockContent(), { mode: 0o600 });
    await rename(tempPath, lockPath);
  }

  logger.debug(`Lock acquired: ${lockPath}`);

  return {
    path: lockPath,
    release: async () => {
      const info = await readLockInfo(lockPath);
      if (info?.pid === process.pid) {
        await rm(lockPath, { force: true });
        logger.debug(`Lock released: ${lockPath}`);
      }
    },
  };
}

/**
 * Run fn while holding the lock; always released afterwards
 */
export async function withLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  const lock = await acquireLock(lockPath);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
