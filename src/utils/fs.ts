/**
 * Filesystem helpers shared by snapshot, archive and restore code
 */

import { constants } from "node:fs";
import { copyFile, mkdir, mkdtemp, readdir, rm, stat } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { computeStringHash } from "./crypto";
import { logger } from "./logger";

const TEMP_PREFIX = "n8n-backup";

export async function pathExists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isFile(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile();
  } catch {
    return false;
  }
}

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function removePath(p: string): Promise<void> {
  await rm(p, { recursive: true, force: true });
}

/**
 * Copy file to file.bak, or file.bak.1, file.bak.2, ... when earlier copies exist.
 * Earlier copies are never overwritten.
 */
export async function copyToBackupFile(file: string): Promise<string> {
  for (let n = 0; ; n++) {
    const candidate = n === 0 ? `${file}.bak` : `${file}.bak.${n}`;
    try {
      await copyFile(file, candidate, constants.COPYFILE_EXCL);
      return candidate;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
    }
  }
}

/**
 * Temp dir prefix unique to one install, so orphans from an interrupted
 * run can be found again without touching other installs.
 */
export function tempPrefixFor(installDir: string): string {
  const hash = computeStringHash(path.resolve(installDir)).slice(0, 8);
  return `${TEMP_PREFIX}-${hash}-`;
}

export async function makeRunTempDir(installDir: string, purpose: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `${tempPrefixFor(installDir)}${purpose}-`));
}

/**
 * Remove temp dirs left behind by earlier runs of this install.
 * Only call while holding the install lock.
 */
export async function cleanupOrphanTempDirs(
  installDir: string,
  tmpRoot: string = os.tmpdir(),
): Promise<string[]> {
  const prefix = tempPrefixFor(installDir);
  const removed: string[] = [];

  let entries: string[];
  try {
    entries = await readdir(tmpRoot);
  } catch {
    return removed;
  }

  for (const entry of entries) {
    if (!entry.startsWith(prefix)) continue;
    const full = path.join(tmpRoot, entry);
    try {
      await removePath(full);
      removed.push(full);
      logger.debug(`Removed orphaned temp directory: ${full}`);
    } catch (err) {
      logger.warn(`Could not remove orphaned temp directory ${full}`, err);
    }
  }

  return removed;
}

/**
 * Find the first file named fileName below dir (depth-first), skipping excluded dirs
 */
export async function findFile(
  dir: string,
  fileName: string,
  exclude: string[] = [],
): Promise<string | null> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch {
    return null;
  }

  for (const entry of entries) {
    if (entry.isFile() && entry.name === fileName) {
      return path.join(dir, entry.name);
    }
  }

  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory() && !exclude.includes(path.resolve(full))) {
      const found = await findFile(full, fileName, exclude);
      if (found) return found;
    }
  }

  return null;
}
