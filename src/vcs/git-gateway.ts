import { existsSync } from "node:fs";
import { basename, join } from "node:path";
import {
  defaultExecutor,
  type CommandResult,
  type ICommandExecutor,
} from "../shared/command-executor.js";
import type { ILogger } from "../shared/logger.js";
import { AbortError, isTransientError, withRetry } from "../shared/retry-utils.js";
import { escapeShellArg } from "../shared/shell-utils.js";
import {
  classifyPullOutput,
  fetchFailure,
  firstDiagnosticLine,
  hasConflictMarker,
} from "./output-markers.js";
import {
  DETACHED_LABEL,
  isDetachedLabel,
  type AheadBehind,
  type FetchOptions,
  type FetchResult,
  type IVcsGateway,
  type PullOptions,
  type PullResult,
  type StashPopResult,
  type StashPushResult,
  type WorkingTreeStatus,
} from "./types.js";

/**
 * Environment every git invocation runs with: never prompt for
 * credentials, and keep messages in English so markers can be matched.
 */
export const GIT_ENV: Readonly<Record<string, string>> = Object.freeze({
  GIT_TERMINAL_PROMPT: "0",
  LC_ALL: "C",
});

export const STASH_MESSAGE_PREFIX = "update-repos";

type HeadState = Pick<WorkingTreeStatus, "branch" | "detached">;

export interface GitGatewayOptions {
  /** Per-command timeout */
  timeoutMs?: number;
  /** Fetch retries for transient network errors */
  retries?: number;
  /** Delay before the first fetch retry */
  retryMinTimeout?: number;
  /** Clock for stash messages */
  now?: () => Date;
}

/**
 * IVcsGateway implementation that shells out to git.
 */
export class GitGateway implements IVcsGateway {
  private readonly timeoutMs?: number;
  private readonly retries: number;
  private readonly retryMinTimeout?: number;
  private readonly now: () => Date;

  constructor(
    private readonly log: ILogger,
    private readonly executor: ICommandExecutor = defaultExecutor,
    options: GitGatewayOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs;
    this.retries = options.retries ?? 2;
    this.retryMinTimeout = options.retryMinTimeout;
    this.now = options.now ?? (() => new Date());
  }

  private git(args: string, cwd: string): Promise<CommandResult> {
    return this.executor.run(`git ${args}`, cwd, {
      env: { ...GIT_ENV },
      timeoutMs: this.timeoutMs,
    });
  }

  /**
   * Run an operation, turning any rejection into a fallback plus a warning.
   * `fallback` receives the first diagnostic line of the failure.
   */
  private async guarded<T>(
    path: string,
    operation: string,
    fallback: (note: string) => T,
    fn: () => Promise<T>,
    assumption?: string
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const note = firstDiagnosticLine(
        error instanceof Error ? error.message : String(error)
      );
      const value = fallback(note);
      this.log.warn(
        `${basename(path)}: ${operation} failed (${note}); ${assumption ?? `assuming ${JSON.stringify(value)}`}`
      );
      return value;
    }
  }

  isRepository(path: string): boolean {
    return existsSync(join(path, ".git"));
  }

  async getStatus(path: string): Promise<WorkingTreeStatus> {
    const head = await this.resolveHead(path);
    const dirty = await this.guarded<boolean | null>(
      path,
      "git status",
      () => null,
      async () => {
        const result = await this.git("status --porcelain", path);
        // One listed entry is enough, even from output cut short
        if (result.stdout.length > 0) {
          return true;
        }
        if (result.exitCode !== 0) {
          throw new Error(result.stderr || `exit code ${result.exitCode ?? "null"}`);
        }
        return false;
      },
      "dirty state unknown"
    );
    return { ...head, dirty };
  }

  private async resolveHead(path: string): Promise<HeadState> {
    const unresolved: HeadState = { branch: DETACHED_LABEL, detached: true };
    return this.guarded<HeadState>(path, "resolving HEAD", () => unresolved, async () => {
      const symbolic = await this.git("symbolic-ref --short -q HEAD", path);
      if (symbolic.exitCode === 0 && symbolic.stdout) {
        return { branch: symbolic.stdout, detached: false };
      }

      const rev = await this.git("rev-parse --short HEAD", path);
      if (rev.exitCode === 0 && rev.stdout) {
        return { branch: `(detached at ${rev.stdout})`, detached: true };
      }
      throw new Error(rev.stderr || "HEAD does not name a commit");
    });
  }

  async hasRemote(path: string, name: string): Promise<boolean> {
    return this.guarded(path, "git remote", () => false, async () => {
      const result = await this.git("remote", path);
      if (result.exitCode !== 0) {
        throw new Error(result.stderr || `exit code ${result.exitCode ?? "null"}`);
      }
      return result.stdout.split(/\r?\n/).some((line) => line.trim() === name);
    });
  }

  async fetch(path: string, options: FetchOptions): Promise<FetchResult> {
    const args = options.allRemotes
      ? "fetch --all --prune"
      : `fetch --prune ${escapeShellArg(options.remote)}`;

    try {
      await withRetry(
        async () => {
          const failure = fetchFailure(await this.git(args, path));
          if (failure === null) return;
          if (!isTransientError(failure)) {
            throw new AbortError(failure);
          }
          throw new Error(failure);
        },
        {
          retries: this.retries,
          minTimeout: this.retryMinTimeout,
          log: this.log,
        }
      );
      return { ok: true, note: "" };
    } catch (error) {
      const note = firstDiagnosticLine(
        error instanceof Error ? error.message : String(error)
      );
      this.log.warn(`${basename(path)}: fetch failed: ${note}`);
      return { ok: false, note };
    }
  }

  private async remoteBranchExists(
    path: string,
    branch: string,
    remote: string
  ): Promise<boolean> {
    const ref = escapeShellArg(`refs/remotes/${remote}/${branch}`);
    const result = await this.git(`rev-parse --verify --quiet ${ref}`, path);
    return result.exitCode === 0;
  }

  async aheadBehind(
    path: string,
    branch: string,
    remote: string
  ): Promise<AheadBehind> {
    const none: AheadBehind = { ahead: 0, behind: 0, remoteBranchExists: false };
    if (isDetachedLabel(branch)) {
      return none;
    }

    return this.guarded<AheadBehind>(
      path,
      "counting ahead/behind",
      (note) => ({ ...none, error: note }),
      async () => {
        if (!(await this.remoteBranchExists(path, branch, remote))) {
          return none;
        }

        const range = escapeShellArg(
          `refs/heads/${branch}...refs/remotes/${remote}/${branch}`
        );
        const result = await this.git(`rev-list --left-right --count ${range}`, path);
        const match = /^(\d+)\s+(\d+)$/.exec(result.stdout);
        if (result.exitCode !== 0 || !match) {
          throw new Error(
            result.stderr || `unexpected rev-list output '${result.stdout}'`
          );
        }
        return {
          ahead: Number.parseInt(match[1], 10),
          behind: Number.parseInt(match[2], 10),
          remoteBranchExists: true,
        };
      },
      "counts unknown"
    );
  }

  async pull(
    path: string,
    branch: string,
    options: PullOptions
  ): Promise<PullResult> {
    if (isDetachedLabel(branch)) {
      return { ok: false, reason: "error", note: "HEAD is detached" };
    }

    const failed = (note: string): PullResult => ({ ok: false, reason: "error", note });
    return this.guarded<PullResult>(path, "git pull", failed, async () => {
      // The branch can disappear between the ahead/behind check and now
      if (!(await this.remoteBranchExists(path, branch, options.remote))) {
        return {
          ok: false,
          reason: "no-remote-branch",
          note: `No remote branch ${options.remote}/${branch}`,
        };
      }

      const mode = options.rebase ? "--rebase" : "--ff-only";
      const result = await this.git(
        `pull ${mode} ${escapeShellArg(options.remote)} ${escapeShellArg(branch)}`,
        path
      );
      return classifyPullOutput(result);
    });
  }

  async stashPush(path: string): Promise<StashPushResult> {
    const message = `${STASH_MESSAGE_PREFIX} ${this.now().toISOString()}`;

    return this.guarded<StashPushResult>(
      path,
      "git stash push",
      (note) => ({ kind: "failed", note }),
      async () => {
        const result = await this.git(
          `stash push --include-untracked -m ${escapeShellArg(message)}`,
          path
        );
        if (result.exitCode !== 0) {
          throw new Error(result.stderr || `exit code ${result.exitCode ?? "null"}`);
        }
        if (/no local changes to save/i.test(result.stdout)) {
          this.log.debug(`${basename(path)}: nothing to stash`);
          return { kind: "empty" };
        }

        const list = await this.git('stash list -n 1 --format="%gd"', path);
        const ref = list.exitCode === 0 && list.stdout ? list.stdout : "stash@{0}";
        return { kind: "stashed", record: { ref, message } };
      },
      "local changes left in place"
    );
  }

  async stashPop(path: string): Promise<StashPopResult> {
    return this.guarded<StashPopResult>(
      path,
      "git stash pop",
      (note) => ({ kind: "failed", note }),
      async () => {
        const result = await this.git("stash pop", path);
        const output = [result.stdout, result.stderr].join("\n");
        if (hasConflictMarker(output)) {
          this.log.warn(`${basename(path)}: stash pop reported conflicts`);
          return { kind: "conflicts" };
        }
        if (result.exitCode !== 0) {
          throw new Error(result.stderr || `exit code ${result.exitCode ?? "null"}`);
        }
        return { kind: "restored" };
      },
      "stash kept"
    );
  }
}
