export {
  DEFAULT_RUN_OPTIONS,
  DEFAULT_CONFIG_FILE_NAME,
  type RunOptions,
  type RawConfig,
} from "./types.js";

export {
  findConfigFile,
  loadRawConfig,
  buildRunOptions,
  type RunOptionOverrides,
} from "./loader.js";

export { validateRawConfig, validateRunOptions } from "./validator.js";
