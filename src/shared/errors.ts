/**
 * Process exit codes.
 */
export const ExitCode = {
  Success: 0,
  InvalidRoot: 1,
  InvalidArguments: 2,
  RepositoryFailures: 3,
  /** Anything not covered above; a bug or an environment problem */
  Unexpected: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Invalid flags, option values or config file. Fatal before any repository
 * is touched.
 */
export class ConfigError extends Error {
  readonly exitCode: ExitCode = ExitCode.InvalidArguments;

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The root directory does not exist or is not a directory.
 */
export class InvalidRootError extends Error {
  readonly exitCode: ExitCode = ExitCode.InvalidRoot;

  constructor(
    readonly root: string,
    reason: string
  ) {
    super(`Invalid root path '${root}': ${reason}`);
    this.name = "InvalidRootError";
  }
}
