// Types
export {
  createRepository,
  type Repository,
  type RepositoryState,
  type Action,
  type StartDecision,
  type FetchedDecision,
  type PolicyOptions,
  type PulledState,
  type StashState,
  type SyncStatus,
  type SyncStatusKind,
  type SyncOutcome,
  type IRepositoryScanner,
  type IRepositoryOrchestrator,
  type ProgressListener,
  type RunResult,
} from "./types.js";

// Status helpers
export {
  describeStatus,
  statusLabel,
  statusCategory,
  isFailure,
  pulledStateOf,
  type StatusCategory,
} from "./status.js";

// Policy
export {
  decide,
  decideStart,
  decideAfterFetch,
  pullFailureStatus,
} from "./sync-policy.js";

// Components
export { RepositoryScanner } from "./repository-scanner.js";
export { RepositorySyncOrchestrator } from "./repository-orchestrator.js";
export {
  RunCoordinator,
  assertRootDirectory,
  type RunCoordinatorDeps,
} from "./run-coordinator.js";
