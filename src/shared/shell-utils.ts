/**
 * Quote a value for safe interpolation into a POSIX shell command.
 * Wraps in single quotes; embedded single quotes become '\''.
 */
export function escapeShellArg(arg: string): string {
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
