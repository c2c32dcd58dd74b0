import type { PullResult } from "../vcs/types.js";
import type {
  Action,
  FetchedDecision,
  PolicyOptions,
  RepositoryState,
  StartDecision,
  SyncStatus,
} from "./types.js";

/**
 * Decide what to do before anything touches the network.
 *
 * An unknown dirty state only stops the run when a dirty option is set;
 * otherwise the pull itself refuses to overwrite local changes.
 *
 * When both skipDirty and stashDirty are set, skip wins. The command line
 * rejects that combination; library callers get this precedence.
 */
export function decideStart(
  state: RepositoryState,
  options: PolicyOptions
): StartDecision {
  if (!state.hasRemote) return "no-remote-abort";
  // Neither skipping nor stashing is safe on a tree that could not be read
  if (state.dirty === null && (options.skipDirty || options.stashDirty)) {
    return "dirty-unknown-abort";
  }
  if (state.dirty && options.skipDirty) return "dirty-skip";
  if (state.dirty && options.stashDirty) return "dirty-stash";
  return "proceed";
}

/**
 * Decide what to do once a successful fetch has refreshed ahead/behind.
 * A detached HEAD never reaches a pull.
 */
export function decideAfterFetch(
  state: RepositoryState,
  options: PolicyOptions
): FetchedDecision {
  if (state.branchDetached) return "detached-head";
  if (options.noPull) return "fetch-only";
  if (!state.remoteBranchExists) return "no-remote-branch";
  if (state.behindCount === 0) return "already-up-to-date";
  return options.useRebase ? "rebase" : "fast-forward";
}

const START_ACTIONS: Record<Exclude<StartDecision, "proceed">, Action> = {
  "no-remote-abort": "NoRemoteAbort",
  "dirty-unknown-abort": "DirtyUnknownAbort",
  "dirty-skip": "DirtySkip",
  "dirty-stash": "DirtyStash",
};

const FETCHED_ACTIONS: Record<FetchedDecision, Action> = {
  "detached-head": "DetachedHead",
  "fetch-only": "FetchOnly",
  "no-remote-branch": "NoRemoteBranch",
  "already-up-to-date": "AlreadyUpToDate",
  "fast-forward": "FastForward",
  rebase: "Rebase",
};

/**
 * The next action for a repository in the given state.
 *
 * DirtyStash is a side effect, not a terminal action: once the stash is
 * pushed the caller asks again with a clean state.
 */
export function decide(state: RepositoryState, options: PolicyOptions): Action {
  const start = decideStart(state, options);
  if (start !== "proceed") {
    return START_ACTIONS[start];
  }
  return FETCHED_ACTIONS[decideAfterFetch(state, options)];
}

/**
 * Terminal status for a pull that did not succeed.
 */
export function pullFailureStatus(
  result: Extract<PullResult, { ok: false }>,
  branch: string,
  remote: string
): SyncStatus {
  switch (result.reason) {
    case "no-remote-branch":
      return { kind: "no-remote-branch", remoteBranch: `${remote}/${branch}` };
    case "conflict":
    case "diverged":
      return { kind: "pull-failed", detail: result.note };
    case "error":
      return { kind: "pull-error", detail: result.note };
    default: {
      const _exhaustive: never = result.reason;
      throw new Error(`Unknown pull failure: ${String(_exhaustive)}`);
    }
  }
}
