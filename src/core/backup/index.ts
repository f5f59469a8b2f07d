/**
 * Backup module exports
 */

export {
  type ArchiveInspection,
  type Archiver,
  ArchiveToolError,
  classifyPayloadEntries,
  createArchive,
  inspectArchive,
  type PayloadClassification,
  payloadKind,
  TarArchiver,
} from "./archive-creator";
export { type BackupDeps, runBackup } from "./orchestrator";
export { createSnapshot, detectN8nVersion, ENCRYPTION_KEY_FILE, type SnapshotDeps } from "./snapshot";
