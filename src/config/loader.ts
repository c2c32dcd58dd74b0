import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { parse } from "yaml";
import { ConfigError } from "../shared/errors.js";
import { validateRawConfig } from "./validator.js";
import {
  DEFAULT_CONFIG_FILE_NAME,
  DEFAULT_RUN_OPTIONS,
  type RawConfig,
  type RunOptions,
} from "./types.js";

/** Values given on the command line; undefined means "not given". */
export type RunOptionOverrides = Partial<Omit<RunOptions, "root">>;

/**
 * Locate the config file: the explicit path when given (which must exist),
 * else `.update-repos.yaml` in the root directory when present.
 */
export function findConfigFile(root: string, explicitPath?: string): string | null {
  if (explicitPath) {
    const path = resolve(explicitPath);
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return path;
  }
  const candidate = join(root, DEFAULT_CONFIG_FILE_NAME);
  return existsSync(candidate) ? candidate : null;
}

/**
 * Read, parse and validate a YAML config file.
 */
export function loadRawConfig(filePath: string): RawConfig {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${filePath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse YAML config at ${filePath}: ${message}`);
  }

  return validateRawConfig(parsed, filePath);
}

function definedOnly(overrides: RunOptionOverrides): RunOptionOverrides {
  const result: RunOptionOverrides = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Merge defaults, config file and command line (in increasing priority)
 * into a frozen RunOptions.
 */
export function buildRunOptions(
  root: string,
  fileConfig: RawConfig,
  overrides: RunOptionOverrides = {}
): RunOptions {
  const { timeout, ...fileValues } = fileConfig;
  const fromFile: RunOptionOverrides = {
    ...fileValues,
    ...(timeout !== undefined ? { timeoutMs: timeout * 1000 } : {}),
  };

  return Object.freeze({
    ...DEFAULT_RUN_OPTIONS,
    ...definedOnly(fromFile),
    ...definedOnly(overrides),
    root: resolve(root),
  });
}
