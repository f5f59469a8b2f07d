/**
 * Snapshot producer: stages a consistent copy of the install for archiving
 */

import { copyFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { BackupMetadata, RunContext, Snapshot } from "../../types";
import { CONFIG_DIR, CREDENTIALS_DIR, METADATA_FILE } from "../../types";
import type { ServiceController } from "../../docker/compose";
import { ensureDir, isFile, makeRunTempDir, removePath } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { generateArchiveName } from "../../utils/naming";
import { resolveFrom } from "../../utils/path";
import { VERSION } from "../../version";
import type { DatabaseBackend } from "../database";

export const ENCRYPTION_KEY_FILE = "encryptionKey";

export interface SnapshotDeps {
  backend: DatabaseBackend;
  /** Used for the best-effort n8n version lookup */
  services?: ServiceController;
  now?: () => Date;
}

/**
 * n8n version reported by the running app container, "unknown" otherwise
 */
export async function detectN8nVersion(
  services: ServiceController | undefined,
  appService: string,
): Promise<string> {
  if (!services) return "unknown";

  const result = await services.exec(appService, ["n8n", "--version"]);
  const version = result.stdout.split("\n")[0]?.trim();
  if (!result.success || !version) {
    logger.debug(`Could not read n8n version from service "${appService}": ${result.stderr}`);
    return "unknown";
  }
  return version;
}

export async function createSnapshot(ctx: RunContext, deps: SnapshotDeps): Promise<Snapshot> {
  const createdAt = (deps.now ?? (() => new Date()))();
  const name = generateArchiveName(createdAt, ctx.config.backup.prefix);

  const stagingRoot = await makeRunTempDir(ctx.paths.installDir, `staging-${name}`);
  const contentDir = path.join(stagingRoot, name);
  const credentialsDir = path.join(contentDir, CREDENTIALS_DIR);
  const configDir = path.join(contentDir, CONFIG_DIR);

  logger.info(`Creating snapshot ${name} (${deps.backend.kind})`);

  try {
    await ensureDir(credentialsDir);
    await ensureDir(configDir);

    const payloadFile = await deps.backend.capture(credentialsDir);
    let filesIncluded = 1;

    const keyFile = resolveFrom(ctx.paths.dataDir, ctx.config.database.sqlite.encryptionKeyFile);
    if (await isFile(keyFile)) {
      await copyFile(keyFile, path.join(credentialsDir, ENCRYPTION_KEY_FILE));
      filesIncluded++;
    } else {
      logger.warn(`Encryption key not found at ${keyFile}; credentials in this backup cannot be decrypted on a new host`);
    }

    for (const configFile of ctx.config.backup.configFiles) {
      const source = resolveFrom(ctx.paths.installDir, configFile);
      if (!(await isFile(source))) {
        logger.debug(`Config file not present, skipping: ${source}`);
        continue;
      }
      await copyFile(source, path.join(configDir, path.basename(configFile)));
      filesIncluded++;
    }

    const metadata: BackupMetadata = {
      backup_date: createdAt.toISOString(),
      backup_name: name,
      database_kind: deps.backend.kind,
      n8n_version: await detectN8nVersion(deps.services, ctx.config.install.appService),
      backup_type: "full",
      files_included: filesIncluded,
      tool_version: VERSION,
    };
    await writeFile(path.join(contentDir, METADATA_FILE), `${JSON.stringify(metadata, null, 2)}\n`);

    logger.debug(`Snapshot staged at ${contentDir} (${filesIncluded} files)`);

    return {
      name,
      stagingRoot,
      contentDir,
      databaseKind: deps.backend.kind,
      payloadFile,
      createdAt,
    };
  } catch (error) {
    await removePath(stagingRoot);
    throw error;
  }
}
