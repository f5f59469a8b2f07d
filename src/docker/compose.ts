/**
 * Docker Compose project control and compose file inspection
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { isPlainObject } from "../config/defaults";
import { type CommandResult, type CommandRunner, runCommand } from "../utils/exec";
import { logger } from "../utils/logger";

export interface ExecOptions {
  /** Extra environment passed into the container (values stay off the command line) */
  env?: Record<string, string>;
  stdinFile?: string;
  stdoutFile?: string;
}

/**
 * Start, stop and exec into compose services
 */
export interface ServiceController {
  up(services?: string[]): Promise<CommandResult>;
  stop(services: string[]): Promise<CommandResult>;
  exec(service: string, command: string[], options?: ExecOptions): Promise<CommandResult>;
}

/**
 * Prefer the v2 plugin, fall back to the standalone v1 binary
 */
export async function detectComposeCommand(runner: CommandRunner = runCommand): Promise<string[]> {
  const v2 = await runner("docker", ["compose", "version"]);
  if (v2.success) {
    return ["docker", "compose"];
  }

  const v1 = await runner("docker-compose", ["version"]);
  if (v1.success) {
    logger.warn("Using docker-compose v1; docker compose v2 is recommended");
    return ["docker-compose"];
  }

  throw new Error("Neither 'docker compose' nor 'docker-compose' is available");
}

export class ComposeProject implements ServiceController {
  private command: string[] | null = null;

  constructor(
    readonly composeFile: string,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  up(services: string[] = []): Promise<CommandResult> {
    return this.run(["up", "-d", ...services]);
  }

  stop(services: string[]): Promise<CommandResult> {
    return this.run(["stop", ...services]);
  }

  exec(service: string, command: string[], options: ExecOptions = {}): Promise<CommandResult> {
    const env = options.env ?? {};
    const envArgs = Object.keys(env).flatMap((key) => ["-e", key]);

    return this.run(["exec", "-T", ...envArgs, service, ...command], {
      env,
      stdinFile: options.stdinFile,
      stdoutFile: options.stdoutFile,
    });
  }

  private async run(
    args: string[],
    options: { env?: Record<string, string>; stdinFile?: string; stdoutFile?: string } = {},
  ): Promise<CommandResult> {
    if (!this.command) {
      this.command = await detectComposeCommand(this.runner);
    }

    const [bin = "docker", ...prefix] = this.command;
    return this.runner(bin, [...prefix, "-f", this.composeFile, ...args], {
      ...options,
      cwd: path.dirname(this.composeFile),
    });
  }
}

/**
 * Service names declared in a docker-compose.yml, or null when the file
 * cannot be read or has no services section
 */
export async function listComposeServices(composePath: string): Promise<string[] | null> {
  let parsed: unknown;
  try {
    parsed = yaml.load(await readFile(composePath, "utf8"));
  } catch (error) {
    logger.debug(`Failed to parse compose file: ${composePath}`, error);
    return null;
  }

  if (!isPlainObject(parsed) || !isPlainObject(parsed.services)) {
    logger.debug(`No services found in compose file: ${composePath}`);
    return null;
  }

  return Object.keys(parsed.services);
}
