/**
 * Immutable per-invocation options, passed by parameter to every component.
 */
export interface RunOptions {
  /** Absolute path of the directory whose children are scanned */
  readonly root: string;
  /** Only child directories whose name starts with this are considered */
  readonly prefix: string;
  /** Upstream remote to fetch from and pull against */
  readonly remote: string;
  /** Fetch only, never pull */
  readonly noPull: boolean;
  /** Leave repositories with local changes untouched */
  readonly skipDirty: boolean;
  /** Stash local changes before fetching, restore them afterwards */
  readonly stashDirty: boolean;
  /** Pull with --rebase instead of --ff-only */
  readonly useRebase: boolean;
  /** Fetch every remote instead of only `remote` */
  readonly fetchAllRemotes: boolean;
  /** Print the summary table and per-repository messages */
  readonly verbose: boolean;
  /** Upper bound for each git invocation */
  readonly timeoutMs: number;
  /** Retries for transient fetch failures */
  readonly retries: number;
}

export const DEFAULT_RUN_OPTIONS: Omit<RunOptions, "root"> = Object.freeze({
  prefix: "",
  remote: "origin",
  noPull: false,
  skipDirty: false,
  stashDirty: false,
  useRebase: false,
  fetchAllRemotes: false,
  verbose: false,
  timeoutMs: 120_000,
  retries: 2,
});

/**
 * Shape of the optional YAML config file. Every key is optional; command
 * line flags win over file values.
 */
export interface RawConfig {
  prefix?: string;
  remote?: string;
  noPull?: boolean;
  skipDirty?: boolean;
  stashDirty?: boolean;
  useRebase?: boolean;
  fetchAllRemotes?: boolean;
  verbose?: boolean;
  /** Seconds */
  timeout?: number;
  retries?: number;
}

/** File looked up in the root directory when --config is not given. */
export const DEFAULT_CONFIG_FILE_NAME = ".update-repos.yaml";
