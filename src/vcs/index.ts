// Types
export {
  DETACHED_LABEL,
  isDetachedLabel,
  type WorkingTreeStatus,
  type FetchOptions,
  type FetchResult,
  type AheadBehind,
  type PullOptions,
  type PullFailureReason,
  type PullResult,
  type StashRecord,
  type StashPushResult,
  type StashPopResult,
  type IVcsGateway,
} from "./types.js";

// Git implementation
export {
  GitGateway,
  GIT_ENV,
  STASH_MESSAGE_PREFIX,
  type GitGatewayOptions,
} from "./git-gateway.js";

// Output classification
export {
  findMarkers,
  firstDiagnosticLine,
  fetchFailure,
  classifyPullOutput,
  hasConflictMarker,
  type DiagnosticMarker,
} from "./output-markers.js";
