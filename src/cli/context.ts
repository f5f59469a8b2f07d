/**
 * Context loading and dependency wiring shared by the commands
 */

import { ConfigError, loadRunContext } from "../config";
import type { BackupDeps } from "../core/backup";
import { TarArchiver } from "../core/backup/archive-creator";
import { createDatabaseBackend } from "../core/database";
import { BackupToolError, errorMessage, exitCodeFor, RestoreError } from "../core/errors";
import { createTelegramNotifier } from "../core/transport";
import { ComposeProject } from "../docker/compose";
import { createRemoteStore } from "../storage";
import type { RunContext } from "../types";
import { logger, setConsoleQuiet, setLogFile, setLogLevel } from "../utils/logger";
import { ui } from "./ui";

/**
 * Options every command accepts
 */
export const COMMON_OPTIONS = {
  config: { type: "string", short: "c" },
  "install-dir": { type: "string", short: "d" },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export interface CommonValues {
  config?: string;
  "install-dir"?: string;
  verbose?: boolean;
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export interface CliContextOptions {
  retentionCount?: number;
  /** Keep log lines off the console while clack renders the command (ignored with --verbose) */
  quietConsole?: boolean;
}

/**
 * Load the run context and open the log file
 */
export async function loadCliContext(values: CommonValues, overrides: CliContextOptions = {}): Promise<RunContext> {
  if (values.verbose) {
    setLogLevel("debug");
  }
  setConsoleQuiet(Boolean(overrides.quietConsole) && !values.verbose);

  const ctx = await loadRunContext({
    configPath: values.config,
    installDir: values["install-dir"],
    retentionCount: overrides.retentionCount,
  });

  setLogFile(ctx.paths.logFile, { maxBytes: ctx.config.log.maxBytes, maxFiles: ctx.config.log.maxFiles });
  logger.debug(`Loaded context for ${ctx.paths.installDir} (${ctx.databaseKind})`);
  return ctx;
}

export function createServices(ctx: RunContext): ComposeProject {
  return new ComposeProject(ctx.paths.composeFile);
}

export function createBackupDeps(ctx: RunContext): BackupDeps {
  const services = createServices(ctx);
  return {
    backend: createDatabaseBackend(ctx, ctx.databaseKind, { services }),
    archiver: new TarArchiver(),
    services,
    remote: createRemoteStore(ctx),
    telegram: createTelegramNotifier(ctx),
  };
}

/**
 * Print and log a fatal error, returning the exit code for it
 */
export function reportFailure(action: string, error: unknown, verbose?: boolean): number {
  const stepInfo = error instanceof RestoreError ? ` (step: ${error.step})` : "";
  const kind = error instanceof BackupToolError ? `${error.name}: ` : "";
  const text = `${action} failed${stepInfo}: ${kind}${errorMessage(error)}`;

  ui.error(text);
  logger.error(text);
  if (verbose) {
    console.error(error);
  }
  return exitCodeFor(error);
}
