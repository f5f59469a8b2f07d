/**
 * Configuration type definitions for n8n-backup
 */

export type DatabaseKind = "sqlite" | "postgres";

export interface OwnerConfig {
  uid: number;
  gid: number;
}

export interface InstallConfig {
  /** Root of the n8n install (compose project directory) */
  dir: string;
  /** n8n data directory, holds database.sqlite and encryptionKey */
  dataDir: string;
  composeFile: string;
  /** Compose service running n8n itself */
  appService: string;
  /** Owner the n8n container expects on restored data files */
  owner: OwnerConfig;
}

export interface SqliteConfig {
  file: string;
  encryptionKeyFile: string;
}

export interface PostgresConfig {
  service: string;
  user?: string;
  password?: string;
  database?: string;
  host: string;
  port: number;
}

export interface DatabaseConfig {
  /** Resolved once at load time when not set explicitly */
  kind?: DatabaseKind;
  sqlite: SqliteConfig;
  postgres: PostgresConfig;
}

export interface BackupConfig {
  dir: string;
  prefix: string;
  compression: number;
  /** Install-relative files captured under config/ when present */
  configFiles: string[];
  /** Cron expression used by the scheduler */
  schedule: string;
}

export interface RetentionConfig {
  /** Local retention: keep the newest N archives */
  maxCount: number;
  /** Remote retention: delete archives older than N days */
  remoteMaxAgeDays: number;
}

export interface TelegramConfig {
  enabled: boolean;
  botToken?: string;
  chatId?: string;
  apiBaseUrl: string;
}

export interface RemoteConfig {
  enabled: boolean;
  /** rclone remote (profile) name */
  remoteName: string;
  folder: string;
}

export interface PollingPolicy {
  maxAttempts: number;
  intervalMs: number;
}

export interface RestoreConfig {
  readiness: PollingPolicy;
}

export interface LogConfig {
  file: string;
  maxBytes: number;
  maxFiles: number;
}

export interface N8nBackupConfig {
  version: string;
  install: InstallConfig;
  database: DatabaseConfig;
  backup: BackupConfig;
  retention: RetentionConfig;
  telegram: TelegramConfig;
  remote: RemoteConfig;
  restore: RestoreConfig;
  log: LogConfig;
}

export type PostgresCredentials = {
  kind: "postgres";
  service: string;
  user: string;
  password: string;
  database: string;
  host: string;
  port: number;
};

export type SqliteCredentials = {
  kind: "sqlite";
  /** Absolute path of the live database file */
  file: string;
};

export type DatabaseCredentials = SqliteCredentials | PostgresCredentials;

/**
 * Immutable per-run context. Built once by the config loader.
 */
export interface RunContext {
  readonly config: Readonly<N8nBackupConfig>;
  readonly databaseKind: DatabaseKind;
  readonly credentials: Readonly<DatabaseCredentials>;
  readonly paths: Readonly<{
    installDir: string;
    dataDir: string;
    backupDir: string;
    composeFile: string;
    logFile: string;
    lockFile: string;
  }>;
}
