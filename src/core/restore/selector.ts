/**
 * Restore source parsing and archive selection
 */

import * as path from "node:path";
import type { RemoteConfig, RemoteStore, RestoreSource } from "../../types";
import { isFile } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { sortNewestFirst } from "../../utils/naming";
import { InvalidArchiveError, RestoreError } from "../errors";

/** --source value meaning "the configured remote" */
export const CONFIGURED_REMOTE = "remote";

/**
 * Turn a --source argument into a restore source. Accepts a file path,
 * "remoteName:folder", or "remote" for the configured remote.
 */
export function parseRestoreSource(value: string, remote: RemoteConfig): RestoreSource {
  if (value === CONFIGURED_REMOTE) {
    return { kind: "remote_name", remoteName: remote.remoteName, folder: remote.folder };
  }

  const looksLikePath = value.startsWith("/") || value.startsWith(".") || value.startsWith("~");
  const colon = value.indexOf(":");
  if (!looksLikePath && colon > 0) {
    return {
      kind: "remote_name",
      remoteName: value.slice(0, colon),
      folder: value.slice(colon + 1).replace(/^\/+|\/+$/g, ""),
    };
  }

  return { kind: "local_path", path: path.resolve(value) };
}

export type ChooseArchive = (names: string[]) => Promise<string | null>;

export interface SelectDeps {
  remoteFor: (remoteName: string, folder: string) => RemoteStore;
  /** Interactive picker used when no index was given */
  choose?: ChooseArchive;
  /** Where a remote archive is downloaded to */
  downloadDir: () => Promise<string>;
}

export interface SelectedArchive {
  archivePath: string;
  /** Set when the archive was downloaded into a temp dir */
  downloadDir?: string;
}

/**
 * Pick a name from a remote listing, newest first, 1-based index
 */
export function pickRemoteArchive(names: string[], select: number, location: string): string {
  const sorted = sortNewestFirst(names);
  const picked = sorted[select - 1];
  if (!Number.isInteger(select) || select < 1 || picked === undefined) {
    throw new RestoreError(
      "select",
      `Selection ${select} is out of range: ${location} has ${sorted.length} backup(s)`,
    );
  }
  return picked;
}

export async function selectArchive(
  source: RestoreSource,
  select: number | undefined,
  deps: SelectDeps,
): Promise<SelectedArchive> {
  if (source.kind === "local_path") {
    if (!(await isFile(source.path))) {
      throw new InvalidArchiveError(`Backup file not found: ${source.path}`);
    }
    return { archivePath: source.path };
  }

  const store = deps.remoteFor(source.remoteName, source.folder);
  const names = (await store.list()).map((entry) => entry.name);
  if (names.length === 0) {
    throw new RestoreError("select", `No backups found on ${store.location}`);
  }

  let name: string;
  if (select !== undefined) {
    name = pickRemoteArchive(names, select, store.location);
  } else if (deps.choose) {
    const chosen = await deps.choose(sortNewestFirst(names));
    if (chosen === null) {
      throw new RestoreError("select", "Restore cancelled");
    }
    name = chosen;
  } else {
    throw new RestoreError("select", "No backup selected: pass --select <n> when not running interactively");
  }

  const downloadDir = await deps.downloadDir();
  logger.info(`Downloading ${name} from ${store.location}`);
  const archivePath = await store.download(name, downloadDir);
  return { archivePath, downloadDir };
}
