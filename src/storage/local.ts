/**
 * Local backup directory: the archives this install keeps on disk
 */

import { readdir, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import type { LocalArchiveEntry } from "../types";
import { isFile } from "../utils/fs";
import { logger } from "../utils/logger";
import { DEFAULT_ARCHIVE_PREFIX, isValidArchiveName, parseArchiveName } from "../utils/naming";
import { isPathWithinDir } from "../utils/path";

export class LocalArchiveStore {
  constructor(
    readonly dir: string,
    private readonly prefix: string = DEFAULT_ARCHIVE_PREFIX,
  ) {}

  /**
   * Archives in the directory, newest first. Files that don't follow the
   * archive naming pattern are not listed.
   */
  async list(): Promise<LocalArchiveEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw err;
    }

    const entries: LocalArchiveEntry[] = [];
    for (const fileName of names) {
      if (!isValidArchiveName(fileName, this.prefix)) continue;
      const parsed = parseArchiveName(fileName, this.prefix);
      if (!parsed) continue;

      const filePath = path.join(this.dir, fileName);
      const info = await stat(filePath);
      if (!info.isFile()) continue;

      entries.push({ fileName, path: filePath, sizeBytes: info.size, createdAt: parsed.createdAt });
    }

    return entries.sort((a, b) => (a.fileName < b.fileName ? 1 : a.fileName > b.fileName ? -1 : 0));
  }

  async delete(filePath: string): Promise<void> {
    if (!isPathWithinDir(filePath, this.dir) || path.resolve(filePath) === path.resolve(this.dir)) {
      throw new Error(`Refusing to delete path outside backup directory: ${filePath}`);
    }

    if (!(await isFile(filePath))) {
      logger.warn(`Local file not found (already deleted?): ${filePath}`);
      return;
    }

    await rm(filePath, { force: true });
    logger.debug(`Deleted local file: ${filePath}`);
  }
}
