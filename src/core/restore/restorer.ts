/**
 * Restore state machine: select, validate, extract, classify, apply, done
 */

import { chmod, chown, copyFile, readdir, readFile } from "node:fs/promises";
import * as path from "node:path";
import { readEnvFile } from "../../config/env-file";
import { listComposeServices, type ServiceController } from "../../docker/compose";
import type {
  DatabaseKind,
  PostgresCredentials,
  RemoteStore,
  RestoreRequest,
  RestoreResult,
  RestoreStep,
  RunContext,
} from "../../types";
import { CONFIG_DIR, CREDENTIALS_DIR, METADATA_FILE, PAYLOAD_FILES } from "../../types";
import {
  cleanupOrphanTempDirs,
  copyToBackupFile,
  ensureDir,
  isFile,
  makeRunTempDir,
  pathExists,
  removePath,
} from "../../utils/fs";
import { withLock } from "../../utils/lock";
import { logger } from "../../utils/logger";
import { DEFAULT_ARCHIVE_PREFIX, parseArchiveName } from "../../utils/naming";
import { resolveFrom } from "../../utils/path";
import type { Sleep } from "../../utils/polling";
import { ArchiveToolError, type Archiver } from "../backup/archive-creator";
import { ENCRYPTION_KEY_FILE } from "../backup/snapshot";
import { createDatabaseBackend } from "../database";
import {
  AmbiguousBackupError,
  BackupToolError,
  errorMessage,
  ExtractionError,
  InvalidArchiveError,
  RestoreError,
} from "../errors";
import { type ChooseArchive, selectArchive } from "./selector";

export interface RestoreDeps {
  archiver: Archiver;
  services: ServiceController;
  remoteFor: (remoteName: string, folder: string) => RemoteStore;
  choose?: ChooseArchive;
  sleep?: Sleep;
  onStep?: (step: RestoreStep) => void;
  tmpRoot?: string;
}

export interface ClassifiedBackup {
  contentDir: string;
  databaseKind: DatabaseKind;
  payloadFile: string;
  /** database_kind from backup_metadata.json, when present */
  manifestKind: DatabaseKind | null;
}

async function listDirs(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.filter((e) => e.isDirectory()).map((e) => e.name);
}

/**
 * The directory holding credentials/ and config/: the extraction root
 * itself, or its single backup-named top-level directory
 */
export async function findContentDir(extractDir: string, prefix: string = DEFAULT_ARCHIVE_PREFIX): Promise<string> {
  if (await pathExists(path.join(extractDir, CREDENTIALS_DIR))) {
    return extractDir;
  }

  const dirs = await listDirs(extractDir);
  const named = dirs.filter(
    (d) => parseArchiveName(d, prefix) !== null || d.startsWith(`${DEFAULT_ARCHIVE_PREFIX}_`),
  );
  const candidates = named.length > 0 ? named : dirs;

  if (candidates.length !== 1 || candidates[0] === undefined) {
    throw new AmbiguousBackupError(
      candidates.length === 0
        ? "Archive has no backup directory"
        : `Archive has ${candidates.length} candidate backup directories: ${candidates.join(", ")}`,
    );
  }

  return path.join(extractDir, candidates[0]);
}

async function readManifestKind(contentDir: string): Promise<DatabaseKind | null> {
  const metadataPath = path.join(contentDir, METADATA_FILE);
  if (!(await isFile(metadataPath))) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(metadataPath, "utf8"));
  } catch (error) {
    logger.warn(`Ignoring unreadable ${METADATA_FILE}: ${errorMessage(error)}`);
    return null;
  }

  if (typeof parsed === "object" && parsed !== null && "database_kind" in parsed) {
    const kind = parsed.database_kind;
    if (kind === "sqlite" || kind === "postgres") return kind;
  }
  return null;
}

/**
 * Exactly one database payload must be present, and agree with the manifest
 */
export async function classifyBackup(extractDir: string, prefix?: string): Promise<ClassifiedBackup> {
  const contentDir = await findContentDir(extractDir, prefix);
  const credentialsDir = path.join(contentDir, CREDENTIALS_DIR);

  const sqlitePayload = path.join(credentialsDir, PAYLOAD_FILES.sqlite);
  const postgresPayload = path.join(credentialsDir, PAYLOAD_FILES.postgres);
  const hasSqlite = await isFile(sqlitePayload);
  const hasPostgres = await isFile(postgresPayload);

  if (hasSqlite && hasPostgres) {
    throw new AmbiguousBackupError(
      `Archive contains both ${PAYLOAD_FILES.sqlite} and ${PAYLOAD_FILES.postgres}`,
    );
  }
  if (!hasSqlite && !hasPostgres) {
    throw new AmbiguousBackupError(
      `Archive contains neither ${PAYLOAD_FILES.sqlite} nor ${PAYLOAD_FILES.postgres}`,
    );
  }

  const databaseKind: DatabaseKind = hasSqlite ? "sqlite" : "postgres";
  const manifestKind = await readManifestKind(contentDir);
  if (manifestKind && manifestKind !== databaseKind) {
    throw new AmbiguousBackupError(
      `${METADATA_FILE} says ${manifestKind} but the archive carries a ${databaseKind} payload`,
    );
  }

  return {
    contentDir,
    databaseKind,
    payloadFile: hasSqlite ? sqlitePayload : postgresPayload,
    manifestKind,
  };
}

/**
 * Copy src over dest, keeping the previous dest as a .bak copy. Returns the
 * .bak path when one was written.
 */
async function replaceWithBackup(src: string, dest: string): Promise<string | null> {
  await ensureDir(path.dirname(dest));
  let bak: string | null = null;
  if (await isFile(dest)) {
    bak = await copyToBackupFile(dest);
  }
  await copyFile(src, dest);
  return bak;
}

/**
 * PostgreSQL credentials for the replay: the restored .env wins over the
 * ones the run started with
 */
export async function restoredPostgresCredentials(ctx: RunContext): Promise<PostgresCredentials> {
  const env = await readEnvFile(path.join(ctx.paths.installDir, ".env"));
  const base = ctx.credentials.kind === "postgres" ? ctx.credentials : null;
  const pg = ctx.config.database.postgres;

  const user = env.POSTGRES_USER || base?.user || pg.user;
  const database = env.POSTGRES_DB || base?.database || pg.database;
  if (!user || !database) {
    throw new RestoreError(
      "apply",
      "PostgreSQL credentials unavailable: the restored .env has no POSTGRES_USER/POSTGRES_DB",
    );
  }

  return {
    kind: "postgres",
    service: pg.service,
    user,
    password: env.POSTGRES_PASSWORD ?? base?.password ?? pg.password ?? "",
    database,
    host: pg.host,
    port: pg.port,
  };
}

class RestoreRun {
  private step: RestoreStep = "select";
  private readonly tempDirs: string[] = [];
  private readonly warnings: string[] = [];
  private readonly restoredConfigFiles: string[] = [];
  private readonly backedUpFiles: string[] = [];

  constructor(
    private readonly ctx: RunContext,
    private readonly request: RestoreRequest,
    private readonly deps: RestoreDeps,
  ) {}

  private enter(step: RestoreStep): void {
    this.step = step;
    logger.debug(`Restore step: ${step}`);
    this.deps.onStep?.(step);
  }

  private warn(message: string): void {
    logger.warn(message);
    this.warnings.push(message);
  }

  private async tempDir(purpose: string): Promise<string> {
    const dir = await makeRunTempDir(this.ctx.paths.installDir, purpose);
    this.tempDirs.push(dir);
    return dir;
  }

  async execute(): Promise<RestoreResult> {
    const startTime = Date.now();

    try {
      this.enter("select");
      const { archivePath } = await selectArchive(this.request.source, this.request.select, {
        remoteFor: this.deps.remoteFor,
        choose: this.deps.choose,
        downloadDir: () => this.tempDir("download"),
      });
      const archiveName = path.basename(archivePath);
      logger.info(`Restoring from ${archivePath}`);

      this.enter("validate");
      await this.validate(archivePath);

      this.enter("extract");
      const extractDir = await this.tempDir("extract");
      try {
        await this.deps.archiver.extract(archivePath, extractDir);
      } catch (error) {
        throw new ExtractionError(
          `Failed to extract ${archiveName}`,
          error instanceof ArchiveToolError ? error.diagnostics : errorMessage(error),
        );
      }

      this.enter("classify");
      const backup = await classifyBackup(extractDir, this.ctx.config.backup.prefix);
      if (backup.databaseKind !== this.ctx.databaseKind) {
        this.warn(
          `Archive holds a ${backup.databaseKind} database but this install is configured for ${this.ctx.databaseKind}; restoring as ${backup.databaseKind}`,
        );
      }

      this.enter("apply");
      await this.apply(backup);

      this.enter("done");
      return {
        archiveName,
        databaseKind: backup.databaseKind,
        restoredConfigFiles: this.restoredConfigFiles,
        backedUpFiles: this.backedUpFiles,
        durationMs: Date.now() - startTime,
        warnings: this.warnings,
      };
    } catch (error) {
      if (error instanceof BackupToolError) {
        throw error;
      }
      throw new RestoreError(this.step, `Restore failed during ${this.step}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      for (const dir of this.tempDirs) {
        await removePath(dir);
      }
    }
  }

  private async validate(archivePath: string): Promise<void> {
    let entries: string[];
    try {
      entries = await this.deps.archiver.list(archivePath);
    } catch (error) {
      throw new InvalidArchiveError(`Archive cannot be read: ${archivePath}: ${errorMessage(error)}`);
    }
    if (entries.length === 0) {
      throw new InvalidArchiveError(`Archive is empty: ${archivePath}`);
    }
  }

  private async apply(backup: ClassifiedBackup): Promise<void> {
    const { ctx, deps } = this;
    const { appService } = ctx.config.install;

    const paused = await deps.services.stop([appService]);
    if (!paused.success) {
      this.warn(`Could not stop "${appService}" before restoring: ${paused.stderr}`);
    }

    await this.restoreConfigFiles(path.join(backup.contentDir, CONFIG_DIR));

    const keySource = path.join(backup.contentDir, CREDENTIALS_DIR, ENCRYPTION_KEY_FILE);
    if (await isFile(keySource)) {
      const keyTarget = resolveFrom(ctx.paths.dataDir, ctx.config.database.sqlite.encryptionKeyFile);
      const bak = await replaceWithBackup(keySource, keyTarget);
      if (bak) this.backedUpFiles.push(bak);
      await this.fixOwnership(keyTarget, 0o600);
      logger.info("Restored encryption key");
    } else {
      this.warn("Archive has no encryption key; stored credentials may not decrypt");
    }

    let postgres: PostgresCredentials | undefined;
    if (backup.databaseKind === "postgres") {
      postgres = await restoredPostgresCredentials(ctx);
      const services = await listComposeServices(ctx.paths.composeFile);
      if (services && !services.includes(postgres.service)) {
        throw new RestoreError(
          "apply",
          `Compose file ${ctx.paths.composeFile} does not define the "${postgres.service}" service`,
        );
      }
    }

    const backend = createDatabaseBackend(ctx, backup.databaseKind, { services: deps.services, sleep: deps.sleep }, postgres);
    const outcome = await backend.restore(backup.payloadFile);
    this.backedUpFiles.push(...outcome.backedUpFiles);
    for (const warning of outcome.warnings) {
      this.warnings.push(warning);
    }
    logger.info(`Restored ${backup.databaseKind} database`);

    if (this.request.startServices !== false) {
      const up = await deps.services.up();
      if (!up.success) {
        this.warn(`Failed to start services after restore: ${up.stderr}`);
      }
    }
  }

  private async restoreConfigFiles(configDir: string): Promise<void> {
    if (!(await pathExists(configDir))) {
      this.warn("Archive has no config directory; install configuration left unchanged");
      return;
    }

    const entries = await readdir(configDir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const target = path.join(this.ctx.paths.installDir, entry.name);
      const bak = await replaceWithBackup(path.join(configDir, entry.name), target);
      if (bak) this.backedUpFiles.push(bak);
      this.restoredConfigFiles.push(entry.name);
      logger.debug(`Restored ${entry.name}`);
    }
  }

  private async fixOwnership(file: string, mode: number): Promise<void> {
    await chmod(file, mode);
    const { uid, gid } = this.ctx.config.install.owner;
    try {
      await chown(file, uid, gid);
    } catch (error) {
      this.warn(`Could not change owner of ${file} to ${uid}:${gid}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Restore an archive into the install described by ctx. Nothing in the
 * install is modified before the archive has been listed successfully.
 */
export async function runRestore(
  ctx: RunContext,
  request: RestoreRequest,
  deps: RestoreDeps,
): Promise<RestoreResult> {
  if (path.resolve(request.targetInstallDir) !== ctx.paths.installDir) {
    throw new RestoreError(
      "select",
      `Restore target ${request.targetInstallDir} does not match the loaded install ${ctx.paths.installDir}`,
    );
  }

  return withLock(ctx.paths.lockFile, async () => {
    await cleanupOrphanTempDirs(ctx.paths.installDir, deps.tmpRoot);
    const result = await new RestoreRun(ctx, request, deps).execute();
    logger.info(`Restore complete: ${result.archiveName} (${result.databaseKind})`);
    return result;
  });
}
