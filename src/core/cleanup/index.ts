/**
 * Cleanup module exports
 */

export {
  type CleanupOptions,
  type LocalRetentionResult,
  type RemoteRetentionResult,
  type RetentionDeps,
  type RetentionRunResult,
  runLocalRetention,
  runRemoteRetention,
  runRetention,
} from "./orchestrator";
export { type RetentionSelection, selectLocalRetention } from "./retention";
export { type ValidationResult, validateDeletionCandidate } from "./validator";
