import { statSync } from "node:fs";
import type { RunOptions } from "../config/types.js";
import { InvalidRootError } from "../shared/errors.js";
import type { ILogger } from "../shared/logger.js";
import { firstDiagnosticLine } from "../vcs/output-markers.js";
import { isFailure, pulledStateOf } from "./status.js";
import type {
  IRepositoryOrchestrator,
  IRepositoryScanner,
  ProgressListener,
  Repository,
  RunResult,
  SyncOutcome,
  SyncStatus,
} from "./types.js";

export interface RunCoordinatorDeps {
  scanner: IRepositoryScanner;
  orchestrator: IRepositoryOrchestrator;
  log: ILogger;
  /** Millisecond clock, injectable for tests */
  clock?: () => number;
}

/**
 * Throws InvalidRootError unless `root` is an existing directory.
 */
export function assertRootDirectory(root: string): void {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(root).isDirectory();
  } catch {
    throw new InvalidRootError(root, "no such directory");
  }
  if (!isDirectory) {
    throw new InvalidRootError(root, "not a directory");
  }
}

/**
 * Outcome for a repository whose processing threw past the orchestrator.
 */
function errorOutcome(repo: Repository, error: unknown): SyncOutcome {
  const message = error instanceof Error ? error.message : String(error);
  const status: SyncStatus = {
    kind: "pull-error",
    detail: firstDiagnosticLine(message),
  };
  return {
    repoName: repo.name,
    repoPath: repo.path,
    branch: repo.currentBranch,
    dirtyBefore: repo.isDirty,
    dirty: repo.isDirty,
    pulled: pulledStateOf(status),
    status,
    stash: "none",
    hasRemote: repo.hasUpstreamRemote,
    ahead: repo.aheadCount,
    behind: repo.behindCount,
    messages: [`Error: ${message}`],
  };
}

/**
 * Runs the whole batch: scan, then one repository at a time in scan order.
 * A failing repository never stops the ones after it.
 */
export class RunCoordinator {
  private readonly scanner: IRepositoryScanner;
  private readonly orchestrator: IRepositoryOrchestrator;
  private readonly log: ILogger;
  private readonly clock: () => number;

  constructor(deps: RunCoordinatorDeps) {
    this.scanner = deps.scanner;
    this.orchestrator = deps.orchestrator;
    this.log = deps.log;
    this.clock = deps.clock ?? (() => performance.now());
  }

  async run(
    options: RunOptions,
    onProgress?: ProgressListener
  ): Promise<RunResult> {
    assertRootDirectory(options.root);

    const startedAt = this.clock();
    const repositories = this.scanner.scan(options.root, options.prefix);
    this.log.debug(
      `Found ${repositories.length} repositories in ${options.root}`
    );

    const outcomes: SyncOutcome[] = [];
    for (const [index, repo] of repositories.entries()) {
      let outcome: SyncOutcome;
      try {
        outcome = await this.orchestrator.process(repo, options);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.log.warn(`${repo.name}: ${message}`);
        outcome = errorOutcome(repo, error);
      }
      outcomes.push(outcome);
      onProgress?.(outcome, index + 1, repositories.length);
    }

    return {
      outcomes,
      elapsedMs: this.clock() - startedAt,
      failures: outcomes.filter((outcome) => isFailure(outcome)).length,
    };
  }
}
