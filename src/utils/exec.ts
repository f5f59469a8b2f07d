/**
 * Child process wrapper used for every external tool (tar, docker, rclone)
 */

import { spawn } from "node:child_process";
import { createReadStream, createWriteStream } from "node:fs";
import type { Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { logger } from "./logger";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Stream this file into the process stdin */
  stdinFile?: string;
  /** Stream stdout into this file instead of capturing it */
  stdoutFile?: string;
  /** Applied to stdout on its way to stdoutFile (e.g. gzip) */
  stdoutTransform?: Transform;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

/**
 * Spawn a process and collect its result. Never rejects: spawn failures
 * (missing binary) come back as exit code 127 with the reason on stderr.
 */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
  logger.debug(`Running: ${command} ${args.join(" ")}`);

  const child = spawn(command, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: [options.stdinFile ? "pipe" : "ignore", "pipe", "pipe"],
  });

  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  const streams: Promise<void>[] = [];

  if (child.stdout) {
    if (options.stdoutFile) {
      const target = createWriteStream(options.stdoutFile);
      streams.push(
        options.stdoutTransform
          ? pipeline(child.stdout, options.stdoutTransform, target)
          : pipeline(child.stdout, target),
      );
    } else {
      child.stdout.on("data", (d: Buffer) => stdout.push(d));
    }
  }

  child.stderr?.on("data", (d: Buffer) => stderr.push(d));

  if (options.stdinFile && child.stdin) {
    streams.push(pipeline(createReadStream(options.stdinFile), child.stdin));
  }

  const spawnFailure: { error?: Error } = {};
  const exitCode = await new Promise<number>((resolve) => {
    child.on("error", (err) => {
      spawnFailure.error = err;
      resolve(127);
    });
    child.on("close", (code) => resolve(code ?? 1));
  });

  const streamFailures = (await Promise.allSettled(streams))
    .filter((r): r is PromiseRejectedResult => r.status === "rejected")
    .map((r) => (r.reason instanceof Error ? r.reason.message : String(r.reason)));

  const stderrText = [
    Buffer.concat(stderr).toString().trim(),
    spawnFailure.error ? `${command}: ${spawnFailure.error.message}` : "",
    ...streamFailures,
  ]
    .filter(Boolean)
    .join("\n");

  return {
    success: exitCode === 0 && streamFailures.length === 0,
    stdout: Buffer.concat(stdout).toString().trim(),
    stderr: stderrText,
    exitCode,
  };
};
