/**
 * Cleanup orchestration: local count retention and remote age retention
 */

import * as path from "node:path";
import { LocalArchiveStore } from "../../storage/local";
import type { RemoteStore, RetentionResult, RunContext, RunIssue } from "../../types";
import { logger } from "../../utils/logger";
import { archiveGlob, DEFAULT_ARCHIVE_PREFIX } from "../../utils/naming";
import { errorMessage, RetentionError } from "../errors";
import { selectLocalRetention } from "./retention";
import { validateDeletionCandidate } from "./validator";

export interface CleanupOptions {
  dryRun?: boolean;
  prefix?: string;
}

export interface LocalRetentionResult {
  kept: string[];
  deleted: string[];
  /** Would-be deletions under dryRun */
  candidates: string[];
  issues: RunIssue[];
}

function retentionIssue(error: RetentionError): RunIssue {
  logger.warn(error.message);
  return { kind: "retention", message: error.message };
}

export async function runLocalRetention(
  dir: string,
  maxCount: number,
  options: CleanupOptions = {},
): Promise<LocalRetentionResult> {
  const prefix = options.prefix ?? DEFAULT_ARCHIVE_PREFIX;
  const store = new LocalArchiveStore(dir, prefix);
  const result: LocalRetentionResult = { kept: [], deleted: [], candidates: [], issues: [] };

  let names: string[];
  try {
    names = (await store.list()).map((entry) => entry.fileName);
  } catch (error) {
    result.issues.push(
      retentionIssue(new RetentionError(`Could not list backup directory ${dir}: ${errorMessage(error)}`, { cause: error })),
    );
    return result;
  }

  const { keep, remove } = selectLocalRetention(names, maxCount, prefix);
  result.kept = keep;
  result.candidates = remove;

  logger.info(`Local retention: keeping ${keep.length}, ${remove.length} eligible for deletion`);

  if (options.dryRun) {
    for (const name of remove) {
      logger.info(`[DRY RUN] Would delete: ${name}`);
    }
    return result;
  }

  for (const name of remove) {
    const filePath = path.join(dir, name);
    const validation = validateDeletionCandidate(filePath, dir, prefix);
    if (!validation.valid) {
      result.issues.push(retentionIssue(new RetentionError(validation.errors.join("; "))));
      continue;
    }

    try {
      await store.delete(filePath);
      result.deleted.push(name);
      logger.debug(`Deleted old backup: ${name}`);
    } catch (error) {
      result.issues.push(
        retentionIssue(new RetentionError(`Failed to delete ${name}: ${errorMessage(error)}`, { cause: error })),
      );
    }
  }

  return result;
}

export interface RemoteRetentionResult {
  pruned: boolean;
  issues: RunIssue[];
}

export async function runRemoteRetention(
  store: RemoteStore,
  maxAgeDays: number,
  options: CleanupOptions = {},
): Promise<RemoteRetentionResult> {
  const include = archiveGlob(options.prefix ?? DEFAULT_ARCHIVE_PREFIX);

  if (options.dryRun) {
    logger.info(`[DRY RUN] Would delete ${include} older than ${maxAgeDays}d from ${store.location}`);
    return { pruned: false, issues: [] };
  }

  try {
    await store.deleteOlderThan(maxAgeDays, include);
    logger.info(`Remote retention: removed ${include} older than ${maxAgeDays}d from ${store.location}`);
    return { pruned: true, issues: [] };
  } catch (error) {
    return {
      pruned: false,
      issues: [
        retentionIssue(
          new RetentionError(`Remote cleanup on ${store.location} failed: ${errorMessage(error)}`, { cause: error }),
        ),
      ],
    };
  }
}

export interface RetentionDeps {
  remote: RemoteStore | null;
}

export interface RetentionRunResult extends RetentionResult {
  candidates: string[];
  issues: RunIssue[];
}

/**
 * Apply both policies. Running it twice in a row deletes nothing the second time.
 */
export async function runRetention(
  ctx: RunContext,
  deps: RetentionDeps,
  options: { dryRun?: boolean } = {},
): Promise<RetentionRunResult> {
  const prefix = ctx.config.backup.prefix;
  const local = await runLocalRetention(ctx.paths.backupDir, ctx.config.retention.maxCount, {
    dryRun: options.dryRun,
    prefix,
  });

  const remote = deps.remote
    ? await runRemoteRetention(deps.remote, ctx.config.retention.remoteMaxAgeDays, {
        dryRun: options.dryRun,
        prefix,
      })
    : { pruned: false, issues: [] };

  return {
    localKept: local.kept,
    localDeleted: local.deleted,
    remotePruned: remote.pruned,
    candidates: local.candidates,
    issues: [...local.issues, ...remote.issues],
  };
}
