/**
 * Centralized type exports for n8n-backup
 */

// Backup types
export {
  type BackupArchive,
  type BackupMetadata,
  type BackupRunResult,
  CONFIG_DIR,
  CREDENTIALS_DIR,
  type IssueKind,
  METADATA_FILE,
  PAYLOAD_FILES,
  type RestoreRequest,
  type RestoreResult,
  type RestoreSource,
  type RestoreStep,
  type RetentionResult,
  type RunIssue,
  type SinkOutcome,
  type Snapshot,
  type TransportResult,
} from "./backup";
// Config types
export type {
  BackupConfig,
  DatabaseConfig,
  DatabaseCredentials,
  DatabaseKind,
  InstallConfig,
  LogConfig,
  N8nBackupConfig,
  OwnerConfig,
  PollingPolicy,
  PostgresConfig,
  PostgresCredentials,
  RemoteConfig,
  RestoreConfig,
  RetentionConfig,
  RunContext,
  SqliteConfig,
  SqliteCredentials,
  TelegramConfig,
} from "./config";
// Storage types
export type { LocalArchiveEntry, RemoteEntry, RemoteStore } from "./storage";
