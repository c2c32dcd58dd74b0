import { resolve } from "node:path";
import {
  buildRunOptions,
  findConfigFile,
  loadRawConfig,
  validateRunOptions,
  type RunOptionOverrides,
  type RunOptions,
} from "../config/index.js";
import {
  formatFooter,
  formatOutcomeMessages,
  formatProgressLine,
  formatSummaryTable,
} from "../output/sync-report.js";
import {
  ShellCommandExecutor,
  type ICommandExecutor,
} from "../shared/command-executor.js";
import { ConfigError, ExitCode, InvalidRootError } from "../shared/errors.js";
import { Logger, logger as defaultLogger, type ILogger } from "../shared/logger.js";
import {
  RepositoryScanner,
  RepositorySyncOrchestrator,
  RunCoordinator,
  type RunResult,
} from "../sync/index.js";
import { GitGateway, type IVcsGateway } from "../vcs/index.js";

/**
 * What the command line asked for, before config-file merging.
 */
export interface UpdateRequest {
  /** Positional root argument */
  root?: string;
  /** --root option */
  rootOption?: string;
  configPath?: string;
  overrides: RunOptionOverrides;
}

/**
 * Injection points for tests.
 */
export interface UpdateDeps {
  /** Logger; built from the resolved options when omitted */
  log?: ILogger;
  executor?: ICommandExecutor;
  gateway?: IVcsGateway;
  clock?: () => number;
}

function resolveRoot(request: UpdateRequest): string {
  const { root, rootOption } = request;
  if (root && rootOption && resolve(root) !== resolve(rootOption)) {
    throw new ConfigError(
      `Root given twice with different values: '${root}' and '${rootOption}'`
    );
  }
  return resolve(root ?? rootOption ?? process.cwd());
}

/**
 * Resolve and validate RunOptions from the request and config file.
 * @throws ConfigError
 */
export function resolveRunOptions(request: UpdateRequest): RunOptions {
  const root = resolveRoot(request);
  const configFile = findConfigFile(root, request.configPath);
  const fileConfig = configFile ? loadRawConfig(configFile) : {};
  const options = buildRunOptions(root, fileConfig, request.overrides);
  validateRunOptions(options);
  return options;
}

function describeModes(options: RunOptions): string {
  const modes: string[] = [];
  if (options.noPull) modes.push("fetch only");
  else modes.push(options.useRebase ? "pull --rebase" : "pull --ff-only");
  if (options.skipDirty) modes.push("skip dirty");
  if (options.stashDirty) modes.push("stash dirty");
  if (options.fetchAllRemotes) modes.push("all remotes");
  return modes.join(", ");
}

/**
 * Run the update command. Returns the process exit code.
 */
export async function runUpdate(
  request: UpdateRequest,
  deps: UpdateDeps = {}
): Promise<ExitCode> {
  let options: RunOptions;
  try {
    options = resolveRunOptions(request);
  } catch (error) {
    if (error instanceof ConfigError) {
      (deps.log ?? defaultLogger).error(error.message);
      return error.exitCode;
    }
    throw error;
  }

  const log = deps.log ?? new Logger({ verbose: options.verbose });
  const gateway =
    deps.gateway ??
    new GitGateway(
      log,
      deps.executor ?? new ShellCommandExecutor(options.timeoutMs),
      { timeoutMs: options.timeoutMs, retries: options.retries }
    );

  const coordinator = new RunCoordinator({
    scanner: new RepositoryScanner(gateway, log),
    orchestrator: new RepositorySyncOrchestrator(gateway, log),
    log,
    clock: deps.clock,
  });

  const filter = options.prefix ? ` (prefix '${options.prefix}')` : "";
  log.info(`Updating repositories in ${options.root}${filter}: ${describeModes(options)}`);

  let result: RunResult;
  try {
    result = await coordinator.run(options, (outcome, index, total) => {
      log.info(formatProgressLine(index, total, outcome));
      if (options.verbose) {
        for (const line of formatOutcomeMessages(outcome)) {
          log.info(line);
        }
      }
    });
  } catch (error) {
    if (error instanceof InvalidRootError) {
      log.error(error.message);
      return error.exitCode;
    }
    throw error;
  }

  log.info("");
  if (options.verbose && result.outcomes.length > 0) {
    for (const line of formatSummaryTable(result.outcomes)) {
      log.info(line);
    }
    log.info("");
  }
  log.info(formatFooter(result));

  return result.failures > 0 ? ExitCode.RepositoryFailures : ExitCode.Success;
}
