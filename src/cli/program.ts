import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  Command,
  CommanderError,
  InvalidArgumentError,
  Option,
} from "commander";
import { ExitCode } from "../shared/errors.js";
import { logger as defaultLogger } from "../shared/logger.js";
import { runUpdate, type UpdateDeps, type UpdateRequest } from "./update-command.js";

/**
 * Read the version from the nearest package.json above this module. The
 * walk covers both the source tree and the compiled dist/ layout.
 */
function readPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      const packageJson = JSON.parse(readFileSync(candidate, "utf-8")) as {
        version?: string;
      };
      return packageJson.version ?? "0.0.0";
    }
    const parent = dirname(dir);
    if (parent === dir) return "0.0.0";
    dir = parent;
  }
}

// Parsed flags as commander reports them. `--no-pull` yields `pull: false`.
type CliFlags = {
  root?: string;
  prefix?: string;
  remote?: string;
  pull: boolean;
  skipDirty?: boolean;
  stashDirty?: boolean;
  useRebase?: boolean;
  fetchAll?: boolean;
  fetchAllRemotes?: boolean;
  verbose?: boolean;
  verboseBranches?: boolean;
  config?: string;
  timeout?: number;
  retries?: number;
};

export function parsePositiveSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Must be a positive number of seconds.");
  }
  return seconds;
}

export function parseRetryCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(count)) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return count;
}

/**
 * Map parsed flags to an UpdateRequest. Flags that were not given stay
 * undefined so config-file values can apply.
 */
export function toUpdateRequest(
  root: string | undefined,
  flags: CliFlags
): UpdateRequest {
  const anyOf = (...values: Array<boolean | undefined>): boolean | undefined =>
    values.some((value) => value === true) ? true : undefined;

  return {
    root,
    rootOption: flags.root,
    configPath: flags.config,
    overrides: {
      prefix: flags.prefix,
      remote: flags.remote,
      noPull: flags.pull === false ? true : undefined,
      skipDirty: flags.skipDirty,
      stashDirty: flags.stashDirty,
      useRebase: flags.useRebase,
      fetchAllRemotes: anyOf(flags.fetchAll, flags.fetchAllRemotes),
      verbose: anyOf(flags.verbose, flags.verboseBranches),
      timeoutMs: flags.timeout !== undefined ? flags.timeout * 1000 : undefined,
      retries: flags.retries,
    },
  };
}

export interface CliOutput {
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

/**
 * Build the commander program. `onRun` receives the parsed request.
 */
export function createProgram(
  onRun: (request: UpdateRequest) => Promise<void>,
  output: CliOutput = {}
): Command {
  const program = new Command();

  program
    .name("update-repos")
    .description(
      "Fetch and fast-forward (or rebase) every git repository under a directory"
    )
    .version(readPackageVersion())
    .argument("[root]", "directory holding the repositories (default: current directory)")
    .option("-r, --root <path>", "directory holding the repositories")
    .option("-p, --prefix <prefix>", "only repositories whose directory name starts with <prefix>")
    .option("--remote <name>", "upstream remote to fetch and pull from (default: origin)")
    .option("-n, --no-pull", "fetch only, never pull")
    .option("--skip-dirty", "skip repositories with uncommitted changes")
    .option("--stash-dirty", "stash uncommitted changes around the pull")
    .option("--use-rebase", "pull with --rebase instead of --ff-only")
    .option("-a, --fetch-all", "fetch every remote, not only the upstream one")
    .addOption(new Option("--fetch-all-remotes").hideHelp())
    .option("-v, --verbose", "print per-repository messages and a summary table")
    .addOption(new Option("--verbose-branches").hideHelp())
    .option("-c, --config <path>", "YAML config file (default: <root>/.update-repos.yaml)")
    .option("-t, --timeout <seconds>", "timeout for each git command (default: 120)", parsePositiveSeconds)
    .option("--retries <count>", "retries for transient fetch failures, 0 to disable (default: 2)", parseRetryCount)
    .allowExcessArguments(false)
    .exitOverride()
    .action(async (root: string | undefined) => {
      await onRun(toUpdateRequest(root, program.opts<CliFlags>()));
    });

  if (output.writeOut || output.writeErr) {
    program.configureOutput({
      writeOut: output.writeOut ?? ((text) => process.stdout.write(text)),
      writeErr: output.writeErr ?? ((text) => process.stderr.write(text)),
    });
  }

  return program;
}

/**
 * Parse `argv` (node-style, including the executable and script) and run
 * the update. Resolves to the process exit code; never rejects.
 */
export async function runCli(
  argv: string[],
  deps: UpdateDeps & CliOutput = {}
): Promise<ExitCode> {
  let exitCode: ExitCode = ExitCode.Success;
  const program = createProgram(async (request) => {
    exitCode = await runUpdate(request, deps);
  }, deps);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === "commander.helpDisplayed" ||
        error.code === "commander.version"
        ? ExitCode.Success
        : ExitCode.InvalidArguments;
    }
    const message = error instanceof Error ? error.message : String(error);
    (deps.log ?? defaultLogger).error(`Unexpected failure: ${message}`);
    return ExitCode.Unexpected;
  }
  return exitCode;
}
