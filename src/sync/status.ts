import type { PulledState, SyncOutcome, SyncStatus } from "./types.js";

/**
 * Rendering family of an outcome. Icons and colors are derived from this,
 * never from label text.
 */
export type StatusCategory = "current" | "changed" | "attention" | "failure";

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/**
 * Human-readable label for a status, without stash annotations.
 */
export function describeStatus(status: SyncStatus): string {
  switch (status.kind) {
    case "no-remote":
      return `No ${status.remote} remote`;
    case "dirty-skipped":
      return "Skipped (dirty)";
    case "dirty-unknown":
      return "Skipped (dirty state unknown)";
    case "stash-failed":
      return `Stash failed: ${status.detail}`;
    case "fetch-failed":
      return `Fetch failed: ${status.detail}`;
    case "fetch-only":
      return "Fetched (pull disabled)";
    case "detached-head":
      return "Detached HEAD (pull skipped)";
    case "up-to-date":
      return "Already up to date";
    case "fast-forwarded":
      return `Fast-forwarded ${plural(status.commits, "commit")}`;
    case "rebased":
      return `Rebased onto ${plural(status.commits, "new commit")}`;
    case "no-remote-branch":
      return `No remote branch ${status.remoteBranch}`;
    case "pull-failed":
      return `Pull failed: ${status.detail}`;
    case "pull-error":
      return `Pull error: ${status.detail}`;
    default: {
      const _exhaustive: never = status;
      throw new Error(`Unknown status: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Full status label of an outcome, including the stash annotation.
 */
export function statusLabel(outcome: Pick<SyncOutcome, "status" | "stash">): string {
  const label = describeStatus(outcome.status);
  if (outcome.stash === "restored") return `${label} (Stash restored)`;
  if (outcome.stash === "conflicts") return `${label} (Stash conflicts)`;
  if (outcome.stash === "kept") return `${label} (Stash kept)`;
  return label;
}

export function statusCategory(
  outcome: Pick<SyncOutcome, "status" | "stash">
): StatusCategory {
  switch (outcome.status.kind) {
    case "dirty-unknown":
    case "stash-failed":
    case "fetch-failed":
    case "no-remote-branch":
    case "pull-failed":
    case "pull-error":
      return "failure";
    case "no-remote":
    case "dirty-skipped":
    case "detached-head":
      return "attention";
    default:
      break;
  }
  // A stash left behind is work for the operator whatever the pull did
  if (outcome.stash === "conflicts" || outcome.stash === "kept") return "attention";
  if (outcome.status.kind === "up-to-date") return "current";
  return "changed";
}

export function isFailure(outcome: Pick<SyncOutcome, "status" | "stash">): boolean {
  return statusCategory(outcome) === "failure";
}

export function pulledStateOf(status: SyncStatus): PulledState {
  switch (status.kind) {
    case "no-remote":
      return "NoOrigin";
    case "dirty-skipped":
    case "dirty-unknown":
    case "stash-failed":
    case "fetch-only":
    case "detached-head":
      return "Skipped";
    case "fast-forwarded":
    case "rebased":
      return "Yes";
    default:
      return "No";
  }
}
