/**
 * Storage module exports
 */

import type { RunContext, RemoteStore } from "../types";
import type { CommandRunner } from "../utils/exec";
import { LocalArchiveStore } from "./local";
import { RcloneRemoteStore } from "./rclone";

export { LocalArchiveStore } from "./local";
export { parseRemoteLocation, RcloneError, RcloneRemoteStore } from "./rclone";

/**
 * The remote store configured for this install, or null when disabled
 */
export function createRemoteStore(ctx: RunContext, runner?: CommandRunner): RemoteStore | null {
  const { remote } = ctx.config;
  if (!remote.enabled) {
    return null;
  }
  return new RcloneRemoteStore(remote.remoteName, remote.folder, runner);
}

export function createLocalStore(ctx: RunContext): LocalArchiveStore {
  return new LocalArchiveStore(ctx.paths.backupDir, ctx.config.backup.prefix);
}
