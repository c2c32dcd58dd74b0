// Logging
export {
  Logger,
  logger,
  type ILogger,
  type LoggerOptions,
  type LineWriter,
} from "./logger.js";

// Retry utilities
export {
  withRetry,
  isPermanentError,
  isTransientError,
  DEFAULT_PERMANENT_ERROR_PATTERNS,
  DEFAULT_TRANSIENT_ERROR_PATTERNS,
  AbortError,
  type RetryOptions,
} from "./retry-utils.js";

// Command execution
export {
  ShellCommandExecutor,
  defaultExecutor,
  DEFAULT_COMMAND_TIMEOUT_MS,
  MAX_OUTPUT_BYTES,
  type ICommandExecutor,
  type CommandResult,
  type ExecOptions,
} from "./command-executor.js";

// Shell utilities
export { escapeShellArg } from "./shell-utils.js";

// Sanitization
export { sanitizeCredentials } from "./sanitize-utils.js";

// Errors and exit codes
export { ExitCode, ConfigError, InvalidRootError } from "./errors.js";
