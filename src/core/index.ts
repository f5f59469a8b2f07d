/**
 * Core module exports
 */

// Backup
export {
  type ArchiveInspection,
  type Archiver,
  type BackupDeps,
  createArchive,
  createSnapshot,
  inspectArchive,
  runBackup,
  TarArchiver,
} from "./backup";

// Cleanup
export { runLocalRetention, runRemoteRetention, runRetention, selectLocalRetention } from "./cleanup";

// Database
export { createDatabaseBackend, type DatabaseBackend, PostgresBackend, SqliteBackend } from "./database";

// Errors
export * from "./errors";

// Restore
export { type ChooseArchive, classifyBackup, parseRestoreSource, type RestoreDeps, runRestore } from "./restore";

// Scheduler
export { matchesCron, parseCron, Scheduler } from "./scheduler";

// Transport
export { createTelegramNotifier, distributeArchive, notifyFailure, TelegramNotifier } from "./transport";
