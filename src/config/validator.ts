import { ConfigError } from "../shared/errors.js";
import type { RawConfig, RunOptions } from "./types.js";

const BOOLEAN_KEYS = [
  "noPull",
  "skipDirty",
  "stashDirty",
  "useRebase",
  "fetchAllRemotes",
  "verbose",
] as const;

const STRING_KEYS = ["prefix", "remote"] as const;

const KNOWN_KEYS = new Set<string>([
  ...BOOLEAN_KEYS,
  ...STRING_KEYS,
  "timeout",
  "retries",
]);

// Remote names: no whitespace, no leading dash, no shell metacharacters
const REMOTE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._/-]*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed config file. An empty file is an empty config.
 * @throws ConfigError on unknown keys or wrongly typed values
 */
export function validateRawConfig(value: unknown, source = "config"): RawConfig {
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${source}: expected a mapping of option names to values`);
  }

  for (const key of Object.keys(value)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`${source}: unknown option '${key}'`);
    }
  }

  const config: RawConfig = {};

  for (const key of BOOLEAN_KEYS) {
    const entry = value[key];
    if (entry === undefined) continue;
    if (typeof entry !== "boolean") {
      throw new ConfigError(`${source}: '${key}' must be true or false`);
    }
    config[key] = entry;
  }

  for (const key of STRING_KEYS) {
    const entry = value[key];
    if (entry === undefined) continue;
    if (typeof entry !== "string") {
      throw new ConfigError(`${source}: '${key}' must be a string`);
    }
    config[key] = entry;
  }

  if (value.timeout !== undefined) {
    if (typeof value.timeout !== "number" || !(value.timeout > 0)) {
      throw new ConfigError(`${source}: 'timeout' must be a positive number of seconds`);
    }
    config.timeout = value.timeout;
  }

  if (value.retries !== undefined) {
    if (
      typeof value.retries !== "number" ||
      !Number.isInteger(value.retries) ||
      value.retries < 0
    ) {
      throw new ConfigError(`${source}: 'retries' must be a non-negative integer`);
    }
    config.retries = value.retries;
  }

  return config;
}

/**
 * Validate the merged options before anything is touched.
 * @throws ConfigError
 */
export function validateRunOptions(options: RunOptions): void {
  if (options.skipDirty && options.stashDirty) {
    throw new ConfigError(
      "--skip-dirty and --stash-dirty cannot be combined; choose one way to handle local changes"
    );
  }
  if (!REMOTE_NAME_PATTERN.test(options.remote)) {
    throw new ConfigError(`Invalid remote name: '${options.remote}'`);
  }
  if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
    throw new ConfigError("Timeout must be a positive number of seconds");
  }
  if (!Number.isInteger(options.retries) || options.retries < 0) {
    throw new ConfigError("Retries must be a non-negative integer");
  }
}
