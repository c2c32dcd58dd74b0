import { basename } from "node:path";
import type { RunOptions } from "../config/types.js";

// =============================================================================
// Repository
// =============================================================================

/**
 * A discovered checkout. Created once per scan and refined in place as the
 * orchestrator learns its branch, dirty and ahead/behind state.
 */
export interface Repository {
  /** Absolute path; the repository's identity */
  readonly path: string;
  /** Last path segment */
  readonly name: string;
  currentBranch: string;
  isDetached: boolean;
  hasUpstreamRemote: boolean;
  isDirty: boolean;
  aheadCount: number;
  behindCount: number;
}

export function createRepository(path: string): Repository {
  return {
    path,
    name: basename(path),
    currentBranch: "",
    isDetached: false,
    hasUpstreamRemote: false,
    isDirty: false,
    aheadCount: 0,
    behindCount: 0,
  };
}

// =============================================================================
// Policy
// =============================================================================

/**
 * What the policy sees of a repository.
 */
export interface RepositoryState {
  /** null when the working tree could not be read */
  dirty: boolean | null;
  aheadCount: number;
  behindCount: number;
  hasRemote: boolean;
  branchDetached: boolean;
  /** Unknown until after the fetch; treat as present before that */
  remoteBranchExists: boolean;
}

export type Action =
  | "NoRemoteAbort"
  | "DirtyUnknownAbort"
  | "DirtySkip"
  | "DirtyStash"
  | "DetachedHead"
  | "FetchOnly"
  | "NoRemoteBranch"
  | "AlreadyUpToDate"
  | "FastForward"
  | "Rebase";

/** Decision taken before anything touches the network. */
export type StartDecision =
  | "no-remote-abort"
  | "dirty-unknown-abort"
  | "dirty-skip"
  | "dirty-stash"
  | "proceed";

/** Decision taken once the fetch has refreshed ahead/behind. */
export type FetchedDecision =
  | "detached-head"
  | "fetch-only"
  | "no-remote-branch"
  | "already-up-to-date"
  | "fast-forward"
  | "rebase";

export type PolicyOptions = Pick<
  RunOptions,
  "noPull" | "skipDirty" | "stashDirty" | "useRebase"
>;

// =============================================================================
// Outcome
// =============================================================================

export type PulledState = "Yes" | "No" | "Skipped" | "NoOrigin";

/**
 * none: no stash attempted; empty: push attempted but nothing was stashed;
 * kept: the pop failed outright and the entry is still in the stash list.
 */
export type StashState = "none" | "empty" | "restored" | "conflicts" | "kept";

/**
 * Terminal status of one repository.
 */
export type SyncStatus =
  | { kind: "no-remote"; remote: string }
  | { kind: "dirty-skipped" }
  | { kind: "dirty-unknown" }
  | { kind: "stash-failed"; detail: string }
  | { kind: "fetch-failed"; detail: string }
  | { kind: "fetch-only" }
  | { kind: "detached-head" }
  | { kind: "up-to-date" }
  | { kind: "fast-forwarded"; commits: number }
  | { kind: "rebased"; commits: number }
  | { kind: "no-remote-branch"; remoteBranch: string }
  | { kind: "pull-failed"; detail: string }
  | { kind: "pull-error"; detail: string };

export type SyncStatusKind = SyncStatus["kind"];

/**
 * Exactly one per scanned repository per run.
 */
export interface SyncOutcome {
  repoName: string;
  repoPath: string;
  /** Final branch label */
  branch: string;
  dirtyBefore: boolean;
  dirty: boolean;
  pulled: PulledState;
  status: SyncStatus;
  stash: StashState;
  hasRemote: boolean;
  ahead: number;
  behind: number;
  /** Stash notices and diagnostics, in the order they happened */
  messages: string[];
}

// =============================================================================
// Components
// =============================================================================

export interface IRepositoryScanner {
  scan(root: string, prefix: string): Repository[];
}

export interface IRepositoryOrchestrator {
  process(repo: Repository, options: RunOptions): Promise<SyncOutcome>;
}

export type ProgressListener = (
  outcome: SyncOutcome,
  index: number,
  total: number
) => void;

export interface RunResult {
  /** In scan order */
  outcomes: SyncOutcome[];
  elapsedMs: number;
  /** Outcomes in the failure category */
  failures: number;
}
