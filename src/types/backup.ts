/**
 * Backup and restore type definitions
 */

import type { DatabaseKind } from "./config";

export const PAYLOAD_FILES = {
  sqlite: "database.sqlite",
  postgres: "database.sql",
} as const satisfies Record<DatabaseKind, string>;

export const CREDENTIALS_DIR = "credentials";
export const CONFIG_DIR = "config";
export const METADATA_FILE = "backup_metadata.json";

export interface BackupArchive {
  /** Archive identifier, e.g. n8n_backup_20260101_020000 */
  name: string;
  fileName: string;
  path: string;
  createdAt: Date;
  databaseKind: DatabaseKind;
  sizeBytes: number;
  checksum: string;
  /** Relative paths present in the archive */
  contentsManifest: string[];
}

export interface BackupMetadata {
  backup_date: string;
  backup_name: string;
  database_kind: DatabaseKind;
  n8n_version: string;
  backup_type: "full";
  files_included: number;
  tool_version: string;
}

export interface Snapshot {
  name: string;
  /** Temp directory that holds the content directory */
  stagingRoot: string;
  /** stagingRoot/<name> */
  contentDir: string;
  databaseKind: DatabaseKind;
  payloadFile: string;
  createdAt: Date;
}

export type IssueKind = "transport" | "retention";

/**
 * Non-fatal problem collected during a run
 */
export interface RunIssue {
  kind: IssueKind;
  message: string;
}

export type SinkOutcome = "sent" | "skipped" | "failed" | "disabled";

export interface TransportResult {
  remoteUpload: SinkOutcome;
  telegramFile: SinkOutcome;
  telegramStatus: SinkOutcome;
}

export interface RetentionResult {
  localKept: string[];
  localDeleted: string[];
  remotePruned: boolean;
}

export interface BackupRunResult {
  archive: BackupArchive;
  durationMs: number;
  retention: RetentionResult;
  transport: TransportResult;
  issues: RunIssue[];
}

export type RestoreSource =
  | { kind: "local_path"; path: string }
  | { kind: "remote_name"; remoteName: string; folder: string };

export interface RestoreRequest {
  source: RestoreSource;
  /** 1-based index into the newest-first remote listing */
  select?: number;
  targetInstallDir: string;
  /** Bring the compose stack up once the restore is applied */
  startServices?: boolean;
}

export type RestoreStep = "select" | "validate" | "extract" | "classify" | "apply" | "done";

export interface RestoreResult {
  archiveName: string;
  databaseKind: DatabaseKind;
  restoredConfigFiles: string[];
  backedUpFiles: string[];
  durationMs: number;
  warnings: string[];
}
