import type { RunOptions } from "../config/types.js";
import type { ILogger } from "../shared/logger.js";
import type {
  AheadBehind,
  IVcsGateway,
  StashPopResult,
  StashRecord,
} from "../vcs/types.js";
import { firstDiagnosticLine } from "../vcs/output-markers.js";
import { decideAfterFetch, decideStart, pullFailureStatus } from "./sync-policy.js";
import { pulledStateOf } from "./status.js";
import type {
  IRepositoryOrchestrator,
  Repository,
  RepositoryState,
  StashState,
  SyncOutcome,
  SyncStatus,
} from "./types.js";

/**
 * Mutable bookkeeping for one repository's run.
 */
interface OrchestrationContext {
  messages: string[];
  stash: StashRecord | null;
  stashState: StashState;
  dirtyBefore: boolean;
}

/**
 * Drives one repository through status, stash, fetch, pull and restore.
 *
 * Steps run strictly in sequence. A pushed stash is always popped before
 * the outcome is returned, including when a step throws.
 */
export class RepositorySyncOrchestrator implements IRepositoryOrchestrator {
  constructor(
    private readonly gateway: IVcsGateway,
    private readonly log: ILogger
  ) {}

  async process(repo: Repository, options: RunOptions): Promise<SyncOutcome> {
    const ctx: OrchestrationContext = {
      messages: [],
      stash: null,
      stashState: "none",
      dirtyBefore: false,
    };

    let status: SyncStatus;
    try {
      status = await this.synchronize(repo, options, ctx);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn(`${repo.name}: ${message}`);
      ctx.messages.push(`Error: ${message}`);
      status = { kind: "pull-error", detail: firstDiagnosticLine(message) };
    } finally {
      if (ctx.stash) {
        await this.restoreStash(repo, ctx.stash, ctx);
      }
    }

    return {
      repoName: repo.name,
      repoPath: repo.path,
      branch: repo.currentBranch,
      dirtyBefore: ctx.dirtyBefore,
      dirty: repo.isDirty,
      pulled: pulledStateOf(status),
      status,
      stash: ctx.stashState,
      hasRemote: repo.hasUpstreamRemote,
      ahead: repo.aheadCount,
      behind: repo.behindCount,
      messages: ctx.messages,
    };
  }

  private stateOf(repo: Repository, remoteBranchExists = true): RepositoryState {
    return {
      dirty: repo.isDirty,
      aheadCount: repo.aheadCount,
      behindCount: repo.behindCount,
      hasRemote: repo.hasUpstreamRemote,
      branchDetached: repo.isDetached,
      remoteBranchExists,
    };
  }

  private async synchronize(
    repo: Repository,
    options: RunOptions,
    ctx: OrchestrationContext
  ): Promise<SyncStatus> {
    // Step 1: Working tree state
    const tree = await this.gateway.getStatus(repo.path);
    repo.currentBranch = tree.branch;
    repo.isDetached = tree.detached;
    repo.isDirty = tree.dirty ?? false;
    ctx.dirtyBefore = repo.isDirty;
    repo.hasUpstreamRemote = await this.gateway.hasRemote(
      repo.path,
      options.remote
    );

    // Step 2: Abort, skip or stash
    const start = decideStart({ ...this.stateOf(repo), dirty: tree.dirty }, options);
    if (start === "no-remote-abort") {
      return { kind: "no-remote", remote: options.remote };
    }
    if (tree.dirty === null) {
      ctx.messages.push("Could not tell whether the working tree has local changes");
    }
    if (start === "dirty-unknown-abort") {
      return { kind: "dirty-unknown" };
    }
    if (start === "dirty-skip") {
      return { kind: "dirty-skipped" };
    }
    if (start === "dirty-stash") {
      const pushed = await this.gateway.stashPush(repo.path);
      switch (pushed.kind) {
        case "stashed":
          ctx.stash = pushed.record;
          ctx.messages.push(`Stashed local changes as ${pushed.record.ref}`);
          repo.isDirty = false;
          break;
        case "empty":
          ctx.stashState = "empty";
          ctx.messages.push("Nothing was stashed; local changes left in place");
          break;
        case "failed":
          ctx.messages.push(`Stash failed: ${pushed.note}; local changes left in place`);
          return { kind: "stash-failed", detail: pushed.note };
        default: {
          const _exhaustive: never = pushed;
          throw new Error(`Unknown stash result: ${JSON.stringify(_exhaustive)}`);
        }
      }
    }

    // Step 3: Fetch
    const fetched = await this.gateway.fetch(repo.path, {
      allRemotes: options.fetchAllRemotes,
      remote: options.remote,
    });
    if (!fetched.ok) {
      ctx.messages.push(`Fetch failed: ${fetched.note}`);
      return { kind: "fetch-failed", detail: fetched.note };
    }

    // Step 4: Decide on a pull
    const counts = await this.refreshAheadBehind(repo, options);
    if (counts.error !== undefined) {
      ctx.messages.push(`Could not count commits: ${counts.error}`);
      return { kind: "pull-error", detail: counts.error };
    }
    const decision = decideAfterFetch(
      this.stateOf(repo, counts.remoteBranchExists),
      options
    );

    switch (decision) {
      case "detached-head":
        return { kind: "detached-head" };
      case "fetch-only":
        return { kind: "fetch-only" };
      case "no-remote-branch":
        return {
          kind: "no-remote-branch",
          remoteBranch: `${options.remote}/${repo.currentBranch}`,
        };
      case "already-up-to-date":
        return { kind: "up-to-date" };
      case "fast-forward":
      case "rebase":
        return this.pull(repo, options, decision === "rebase", ctx);
      default: {
        const _exhaustive: never = decision;
        throw new Error(`Unknown decision: ${String(_exhaustive)}`);
      }
    }
  }

  private async pull(
    repo: Repository,
    options: RunOptions,
    rebase: boolean,
    ctx: OrchestrationContext
  ): Promise<SyncStatus> {
    const incoming = repo.behindCount;
    const result = await this.gateway.pull(repo.path, repo.currentBranch, {
      rebase,
      remote: options.remote,
    });

    if (!result.ok) {
      ctx.messages.push(`Pull failed: ${result.note}`);
      return pullFailureStatus(result, repo.currentBranch, options.remote);
    }

    if (result.note) {
      this.log.debug(`${repo.name}: ${result.note}`);
    }
    const counts = await this.refreshAheadBehind(repo, options);
    if (counts.error !== undefined) {
      ctx.messages.push(`Could not recount commits after the pull: ${counts.error}`);
    }
    return rebase
      ? { kind: "rebased", commits: incoming }
      : { kind: "fast-forwarded", commits: incoming };
  }

  /**
   * Recompute ahead/behind. Detached repositories are always 0/0.
   * Counts that could not be computed leave the previous values in place.
   */
  private async refreshAheadBehind(
    repo: Repository,
    options: RunOptions
  ): Promise<AheadBehind> {
    if (repo.isDetached) {
      repo.aheadCount = 0;
      repo.behindCount = 0;
      return { ahead: 0, behind: 0, remoteBranchExists: false };
    }

    const counts = await this.gateway.aheadBehind(
      repo.path,
      repo.currentBranch,
      options.remote
    );
    if (counts.error === undefined) {
      repo.aheadCount = counts.ahead;
      repo.behindCount = counts.behind;
    }
    return counts;
  }

  private async restoreStash(
    repo: Repository,
    stash: StashRecord,
    ctx: OrchestrationContext
  ): Promise<void> {
    let popped: StashPopResult;
    try {
      popped = await this.gateway.stashPop(repo.path);
    } catch (error) {
      const note = error instanceof Error ? error.message : String(error);
      popped = { kind: "failed", note: firstDiagnosticLine(note) };
    }
    switch (popped.kind) {
      case "restored":
        ctx.stashState = "restored";
        ctx.messages.push(`Restored ${stash.ref}`);
        repo.isDirty = false;
        return;
      case "conflicts":
        ctx.stashState = "conflicts";
        ctx.messages.push(
          `${stash.ref} (${stash.message}) did not apply cleanly; resolve the conflicts manually`
        );
        break;
      case "failed":
        ctx.stashState = "kept";
        ctx.messages.push(
          `${stash.ref} (${stash.message}) was not applied (${popped.note}); it is still in the stash list`
        );
        break;
      default: {
        const _exhaustive: never = popped;
        throw new Error(`Unknown stash pop result: ${JSON.stringify(_exhaustive)}`);
      }
    }

    // Ask git rather than assume; an unreadable tree after a conflict is dirty
    const tree = await this.gateway.getStatus(repo.path);
    repo.isDirty = tree.dirty ?? popped.kind === "conflicts";
  }
}
