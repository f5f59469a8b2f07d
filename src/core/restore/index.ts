/**
 * Restore module exports
 */

export {
  type ClassifiedBackup,
  classifyBackup,
  findContentDir,
  type RestoreDeps,
  restoredPostgresCredentials,
  runRestore,
} from "./restorer";
export {
  type ChooseArchive,
  CONFIGURED_REMOTE,
  parseRestoreSource,
  pickRemoteArchive,
  type SelectDeps,
  type SelectedArchive,
  selectArchive,
} from "./selector";
