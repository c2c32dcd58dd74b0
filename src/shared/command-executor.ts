import { spawnSync } from "node:child_process";
import { sanitizeCredentials } from "./sanitize-utils.js";

/** Default upper bound for a single external command. */
export const DEFAULT_COMMAND_TIMEOUT_MS = 120_000;

/** Output cap per stream; porcelain listings of large trees run to megabytes. */
export const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

/**
 * Options for command execution.
 */
export interface ExecOptions {
  /** Additional environment variables to set for the command */
  env?: Record<string, string>;
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Captured result of a command, whatever its exit status.
 */
export interface CommandResult {
  /** Exit code, or null when the process was killed (timeout, signal) */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Interface for executing shell commands.
 * Enables dependency injection for testing and alternative implementations.
 */
export interface ICommandExecutor {
  /**
   * Execute a shell command and capture stdout, stderr and exit code.
   * Never rejects because of a non-zero exit.
   */
  run(command: string, cwd: string, options?: ExecOptions): Promise<CommandResult>;
}

/**
 * Default implementation on top of child_process.spawnSync.
 *
 * The environment is snapshotted once at construction and every command
 * receives a copy of that snapshot merged with its own overrides, so
 * nothing a command does to the parent environment leaks into the next.
 * Commands are escaped with escapeShellArg before being passed here.
 */
export class ShellCommandExecutor implements ICommandExecutor {
  private readonly baseEnv: Readonly<NodeJS.ProcessEnv>;

  constructor(
    private readonly defaultTimeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS,
    env: NodeJS.ProcessEnv = process.env
  ) {
    this.baseEnv = Object.freeze({ ...env });
  }

  async run(
    command: string,
    cwd: string,
    options?: ExecOptions
  ): Promise<CommandResult> {
    const result = spawnSync(command, {
      cwd,
      shell: true,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
      timeout: options?.timeoutMs ?? this.defaultTimeoutMs,
      maxBuffer: MAX_OUTPUT_BYTES,
      env: { ...this.baseEnv, ...options?.env },
    });

    const timedOut =
      result.error !== undefined &&
      "code" in result.error &&
      result.error.code === "ETIMEDOUT";

    // Spawn failures (missing cwd, missing shell) and output overflow
    // surface as result.error; stdout then holds what was read so far
    let stderr = result.stderr ?? "";
    if (result.error && !timedOut) {
      stderr = stderr ? `${stderr}\n${result.error.message}` : result.error.message;
    }

    return {
      exitCode: result.error ? null : result.status,
      stdout: (result.stdout ?? "").trim(),
      // Sanitize credentials from stderr before it reaches any log line
      stderr: sanitizeCredentials(stderr.trim()),
      timedOut,
    };
  }
}

/**
 * Default executor instance for production use.
 */
export const defaultExecutor: ICommandExecutor = new ShellCommandExecutor();
