/**
 * Error taxonomy for backup and restore runs
 */

import type { RestoreStep } from "../types";

export type ErrorCode =
  | "CONFIG"
  | "LOCKED"
  | "MISSING_DATABASE"
  | "CORRUPT_ARCHIVE"
  | "ARCHIVE_EXISTS"
  | "INVALID_ARCHIVE"
  | "EXTRACTION"
  | "AMBIGUOUS_BACKUP"
  | "DATABASE_NOT_READY"
  | "CREDENTIAL_MISMATCH"
  | "RESTORE"
  | "TRANSPORT"
  | "RETENTION";

const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG: 2,
  LOCKED: 3,
  MISSING_DATABASE: 10,
  CORRUPT_ARCHIVE: 11,
  INVALID_ARCHIVE: 12,
  EXTRACTION: 13,
  AMBIGUOUS_BACKUP: 14,
  DATABASE_NOT_READY: 15,
  CREDENTIAL_MISMATCH: 16,
  RESTORE: 17,
  ARCHIVE_EXISTS: 18,
  // Non-fatal kinds never decide the exit code on their own
  TRANSPORT: 0,
  RETENTION: 0,
};

export class BackupToolError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  get fatal(): boolean {
    return this.exitCode !== 0;
  }
}

export class LockError extends BackupToolError {
  constructor(message: string) {
    super("LOCKED", message);
  }
}

export class MissingDatabaseError extends BackupToolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MISSING_DATABASE", message, options);
  }
}

export class CorruptArchiveError extends BackupToolError {
  constructor(
    readonly archivePath: string,
    detail: string,
  ) {
    super("CORRUPT_ARCHIVE", `Archive failed verification: ${archivePath} (${detail})`);
  }
}

export class ArchiveExistsError extends BackupToolError {
  constructor(readonly archivePath: string) {
    super("ARCHIVE_EXISTS", `Archive already exists, refusing to overwrite: ${archivePath}`);
  }
}

/**
 * Base for failures raised while a restore is in progress
 */
export class RestoreError extends BackupToolError {
  constructor(
    readonly step: RestoreStep,
    message: string,
    options?: { cause?: unknown; code?: ErrorCode },
  ) {
    super(options?.code ?? "RESTORE", message, options);
  }
}

export class InvalidArchiveError extends RestoreError {
  constructor(message: string) {
    super("validate", message, { code: "INVALID_ARCHIVE" });
  }
}

export class ExtractionError extends RestoreError {
  constructor(
    message: string,
    readonly diagnostics: string,
  ) {
    super("extract", diagnostics ? `${message}\n${diagnostics}` : message, {
      code: "EXTRACTION",
    });
  }
}

export class AmbiguousBackupError extends RestoreError {
  constructor(message: string) {
    super("classify", message, { code: "AMBIGUOUS_BACKUP" });
  }
}

export class DatabaseNotReadyError extends RestoreError {
  constructor(
    readonly service: string,
    readonly attempts: number,
  ) {
    super("apply", `Database service "${service}" not ready after ${attempts} attempt(s)`, {
      code: "DATABASE_NOT_READY",
    });
  }
}

export class CredentialMismatchError extends RestoreError {
  constructor(message: string) {
    super("apply", message, { code: "CREDENTIAL_MISMATCH" });
  }
}

export class TransportError extends BackupToolError {
  constructor(
    readonly sink: "telegram" | "remote",
    message: string,
    options?: { cause?: unknown },
  ) {
    super("TRANSPORT", message, options);
  }
}

export class RetentionError extends BackupToolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RETENTION", message, options);
  }
}

/**
 * Map any thrown value to a process exit code
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof BackupToolError && error.fatal) {
    return error.exitCode;
  }
  return 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
