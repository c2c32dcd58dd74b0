import chalk from "chalk";

export type LineWriter = (line: string) => void;

export interface LoggerOptions {
  /** Emit debug lines */
  verbose?: boolean;
  /** Destination for info/debug lines (default: console.log) */
  out?: LineWriter;
  /** Destination for warnings and errors (default: console.error) */
  err?: LineWriter;
}

/**
 * Logging seam shared by every component.
 * Inject a mock in tests instead of patching console.
 */
export interface ILogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export class Logger implements ILogger {
  private readonly verbose: boolean;
  private readonly out: LineWriter;
  private readonly err: LineWriter;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  info(message: string): void {
    this.out(message);
  }

  warn(message: string): void {
    this.err(chalk.yellow(`Warning: ${message}`));
  }

  error(message: string): void {
    this.err(chalk.red(`Error: ${message}`));
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.out(chalk.gray(message));
  }
}

/**
 * Default logger for code paths that run before options are known.
 */
export const logger = new Logger();
