// =============================================================================
// Working tree
// =============================================================================

/** Branch label used when HEAD cannot be resolved at all. */
export const DETACHED_LABEL = "(detached)";

export interface WorkingTreeStatus {
  /** Symbolic branch name, or "(detached at <rev>)" / "(detached)" */
  branch: string;
  detached: boolean;
  /** Any tracked or untracked change; null when git status could not tell */
  dirty: boolean | null;
}

export function isDetachedLabel(branch: string): boolean {
  return branch.startsWith("(detached");
}

// =============================================================================
// Network operations
// =============================================================================

export interface FetchOptions {
  /** Fetch every configured remote instead of just `remote` */
  allRemotes: boolean;
  remote: string;
}

export interface FetchResult {
  ok: boolean;
  /** First diagnostic line when the fetch failed */
  note: string;
}

export interface AheadBehind {
  ahead: number;
  behind: number;
  /** Whether refs/remotes/<remote>/<branch> exists */
  remoteBranchExists: boolean;
  /** Set when the counts could not be computed; the other fields are then 0/false */
  error?: string;
}

export interface PullOptions {
  rebase: boolean;
  remote: string;
}

export type PullFailureReason =
  | "no-remote-branch"
  | "conflict"
  | "diverged"
  | "error";

export type PullResult =
  | { ok: true; note: string }
  | { ok: false; reason: PullFailureReason; note: string };

// =============================================================================
// Stash
// =============================================================================

export interface StashRecord {
  /** Stash reference, e.g. stash@{0} */
  ref: string;
  message: string;
}

export type StashPushResult =
  | { kind: "stashed"; record: StashRecord }
  /** git had no local changes to save */
  | { kind: "empty" }
  | { kind: "failed"; note: string };

export type StashPopResult =
  | { kind: "restored" }
  /** Applied with conflicts; git keeps the stash entry */
  | { kind: "conflicts" }
  /** Not applied at all; the stash entry is still there */
  | { kind: "failed"; note: string };

// =============================================================================
// Gateway
// =============================================================================

/**
 * Typed wrapper around the version-control command line.
 *
 * Operations never reject: subprocess and parse failures degrade to a safe
 * result after a warning is logged. Where a default would read as success
 * (an unknown dirty state, a failed stash, uncountable commits) the result
 * says so explicitly.
 */
export interface IVcsGateway {
  isRepository(path: string): boolean;
  getStatus(path: string): Promise<WorkingTreeStatus>;
  hasRemote(path: string, name: string): Promise<boolean>;
  fetch(path: string, options: FetchOptions): Promise<FetchResult>;
  aheadBehind(path: string, branch: string, remote: string): Promise<AheadBehind>;
  pull(path: string, branch: string, options: PullOptions): Promise<PullResult>;
  stashPush(path: string): Promise<StashPushResult>;
  stashPop(path: string): Promise<StashPopResult>;
}
