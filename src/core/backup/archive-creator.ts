/**
 * Archive creation and verification
 */

import { rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { createGzip } from "node:zlib";
import type { BackupArchive, DatabaseKind, Snapshot } from "../../types";
import { CREDENTIALS_DIR, PAYLOAD_FILES } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { type CommandRunner, runCommand } from "../../utils/exec";
import { ensureDir, removePath } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { archiveFileName, formatBytes } from "../../utils/naming";
import { ArchiveExistsError, CorruptArchiveError, errorMessage } from "../errors";

/**
 * Failure reported by the archive tool, with its output kept verbatim
 */
export class ArchiveToolError extends Error {
  constructor(
    message: string,
    readonly diagnostics: string,
  ) {
    super(diagnostics ? `${message}: ${diagnostics}` : message);
    this.name = "ArchiveToolError";
  }
}

export interface Archiver {
  /** Pack baseDir/entry into a gzip-compressed tar at destFile */
  create(baseDir: string, entry: string, destFile: string, compression: number): Promise<void>;
  /** Entry names, in archive order */
  list(archivePath: string): Promise<string[]>;
  extract(archivePath: string, destDir: string): Promise<void>;
}

export class TarArchiver implements Archiver {
  constructor(private readonly runner: CommandRunner = runCommand) {}

  async create(baseDir: string, entry: string, destFile: string, compression: number): Promise<void> {
    logger.debug(`Creating tar.gz archive with compression level ${compression}`);

    const result = await this.runner("tar", ["-cf", "-", "-C", baseDir, entry], {
      stdoutFile: destFile,
      stdoutTransform: createGzip({ level: compression }),
    });
    if (!result.success) {
      throw new ArchiveToolError("tar create failed", result.stderr);
    }
  }

  async list(archivePath: string): Promise<string[]> {
    const result = await this.runner("tar", ["-tzf", archivePath]);
    if (!result.success) {
      throw new ArchiveToolError("tar list failed", result.stderr);
    }
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async extract(archivePath: string, destDir: string): Promise<void> {
    const result = await this.runner("tar", ["-xzf", archivePath, "-C", destDir, "--no-same-owner"]);
    if (!result.success) {
      throw new ArchiveToolError("tar extract failed", result.stderr);
    }
  }
}

export interface PayloadClassification {
  sqlite: string[];
  postgres: string[];
}

/**
 * Find database payload entries (credentials/database.sqlite|sql) in a listing
 */
export function classifyPayloadEntries(entries: string[]): PayloadClassification {
  const result: PayloadClassification = { sqlite: [], postgres: [] };

  for (const entry of entries) {
    const normalized = entry.replace(/^\.\//, "");
    const parts = normalized.split("/").filter(Boolean);
    const fileName = parts[parts.length - 1];
    const parent = parts[parts.length - 2];
    if (parent !== CREDENTIALS_DIR) continue;

    if (fileName === PAYLOAD_FILES.sqlite) result.sqlite.push(normalized);
    else if (fileName === PAYLOAD_FILES.postgres) result.postgres.push(normalized);
  }

  return result;
}

/**
 * The single database kind present, or null when none or both are
 */
export function payloadKind(classification: PayloadClassification): DatabaseKind | null {
  const { sqlite, postgres } = classification;
  if (sqlite.length === 1 && postgres.length === 0) return "sqlite";
  if (postgres.length === 1 && sqlite.length === 0) return "postgres";
  return null;
}

/**
 * Package a snapshot into <destDir>/<name>.tar.gz and verify it by listing.
 * An existing archive of the same name is never overwritten or removed.
 * The staging directory is removed whatever happens.
 */
export async function createArchive(
  snapshot: Snapshot,
  destDir: string,
  archiver: Archiver,
  compression: number = 6,
): Promise<BackupArchive> {
  const fileName = archiveFileName(snapshot.name);
  const archivePath = path.join(destDir, fileName);

  try {
    await ensureDir(destDir);
    await reserveArchivePath(archivePath);

    try {
      await archiver.create(snapshot.stagingRoot, snapshot.name, archivePath, compression);
    } catch (error) {
      await rm(archivePath, { force: true });
      throw new CorruptArchiveError(archivePath, errorMessage(error));
    }

    let entries: string[];
    try {
      entries = await archiver.list(archivePath);
    } catch (error) {
      await rm(archivePath, { force: true });
      throw new CorruptArchiveError(archivePath, errorMessage(error));
    }

    if (entries.length === 0) {
      await rm(archivePath, { force: true });
      throw new CorruptArchiveError(archivePath, "archive listing is empty");
    }

    const { size } = await stat(archivePath);
    const checksum = await computeFileChecksum(archivePath);

    logger.info(`Archive created: ${fileName} (${formatBytes(size)}, ${entries.length} entries)`);

    return {
      name: snapshot.name,
      fileName,
      path: archivePath,
      createdAt: snapshot.createdAt,
      databaseKind: snapshot.databaseKind,
      sizeBytes: size,
      checksum,
      contentsManifest: entries,
    };
  } finally {
    await removePath(snapshot.stagingRoot);
    logger.debug(`Cleaned up staging directory: ${snapshot.stagingRoot}`);
  }
}

async function reserveArchivePath(archivePath: string): Promise<void> {
  try {
    await writeFile(archivePath, "", { flag: "wx" });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "EEXIST") {
      throw new ArchiveExistsError(archivePath);
    }
    throw err;
  }
}

export interface ArchiveInspection {
  path: string;
  valid: boolean;
  entries: string[];
  databaseKind: DatabaseKind | null;
  sizeBytes: number;
  error?: string;
}

/**
 * List an archive and report which database payload it carries
 */
export async function inspectArchive(archivePath: string, archiver: Archiver): Promise<ArchiveInspection> {
  let sizeBytes = 0;
  try {
    sizeBytes = (await stat(archivePath)).size;
  } catch {
    return { path: archivePath, valid: false, entries: [], databaseKind: null, sizeBytes, error: "file not found" };
  }

  let entries: string[];
  try {
    entries = await archiver.list(archivePath);
  } catch (error) {
    return { path: archivePath, valid: false, entries: [], databaseKind: null, sizeBytes, error: errorMessage(error) };
  }

  if (entries.length === 0) {
    return { path: archivePath, valid: false, entries, databaseKind: null, sizeBytes, error: "archive is empty" };
  }

  const classification = classifyPayloadEntries(entries);
  const databaseKind = payloadKind(classification);
  if (!databaseKind) {
    const found = classification.sqlite.length + classification.postgres.length;
    return {
      path: archivePath,
      valid: false,
      entries,
      databaseKind,
      sizeBytes,
      error: found === 0 ? "no database payload" : `${found} database payloads`,
    };
  }

  return { path: archivePath, valid: true, entries, databaseKind, sizeBytes };
}
