/**
 * Remote archive store backed by rclone
 */

import * as path from "node:path";
import type { RemoteEntry, RemoteStore } from "../types";
import { type CommandRunner, runCommand } from "../utils/exec";
import { ensureDir } from "../utils/fs";
import { logger } from "../utils/logger";
import { ARCHIVE_EXTENSION } from "../utils/naming";

export class RcloneError extends Error {
  constructor(
    readonly operation: string,
    readonly stderr: string,
  ) {
    super(`rclone ${operation} failed: ${stderr || "unknown error"}`);
    this.name = "RcloneError";
  }
}

/**
 * Parse "remote:folder" / "remote:" / "remote". The folder may be empty.
 */
export function parseRemoteLocation(value: string): { remoteName: string; folder: string } {
  const idx = value.indexOf(":");
  if (idx < 0) {
    return { remoteName: value, folder: "" };
  }
  return { remoteName: value.slice(0, idx), folder: value.slice(idx + 1).replace(/^\/+|\/+$/g, "") };
}

export class RcloneRemoteStore implements RemoteStore {
  readonly location: string;

  constructor(
    readonly remoteName: string,
    readonly folder: string,
    private readonly runner: CommandRunner = runCommand,
  ) {
    this.location = `${remoteName}:${folder}`;
  }

  private objectPath(name: string): string {
    return this.folder ? `${this.location}/${name}` : `${this.location}${name}`;
  }

  private async rclone(operation: string, args: string[]): Promise<string> {
    const result = await this.runner("rclone", [operation, ...args]);
    if (!result.success) {
      throw new RcloneError(operation, result.stderr);
    }
    return result.stdout;
  }

  async list(): Promise<RemoteEntry[]> {
    const stdout = await this.rclone("lsf", [this.location, "--files-only", "--include", `*${ARCHIVE_EXTENSION}`]);
    return stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((name) => ({ name }));
  }

  async download(name: string, destDir: string): Promise<string> {
    if (name.includes("/") || name.includes("\\") || name === ".." || name === ".") {
      throw new Error(`Invalid remote object name: ${name}`);
    }
    await ensureDir(destDir);
    const localPath = path.join(destDir, name);
    logger.debug(`Downloading ${this.objectPath(name)} -> ${localPath}`);
    await this.rclone("copyto", [this.objectPath(name), localPath]);
    return localPath;
  }

  async upload(localPath: string): Promise<void> {
    logger.debug(`Uploading ${localPath} -> ${this.location}`);
    await this.rclone("copy", [localPath, this.location]);
  }

  async deleteOlderThan(maxAgeDays: number, include: string): Promise<void> {
    await this.rclone("delete", [this.location, "--min-age", `${maxAgeDays}d`, "--include", include]);
  }
}
