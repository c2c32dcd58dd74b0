/**
 * Sanitizes credentials from error messages and logs.
 * Replaces sensitive tokens/passwords with '***' to prevent leakage.
 *
 * Fetch and pull diagnostics echo the remote URL back, so anything read
 * from git output goes through here before it is logged or reported.
 *
 * @param message The message that may contain credentials
 * @returns The sanitized message with credentials replaced by '***'
 */
export function sanitizeCredentials(
  message: string | undefined | null
): string {
  if (!message) {
    return "";
  }

  let result = message;

  // Replace password portion in http(s)://user:password@host patterns
  result = result.replace(/(https?:\/\/[^:/\s]+:)([^@\s]+)(@)/g, "$1***$3");

  // Bare token as user name: https://token@host
  result = result.replace(
    /(https?:\/\/)(gh[pousr]_[A-Za-z0-9]+|glpat-[A-Za-z0-9_-]+)(@)/g,
    "$1***$3"
  );

  // Handle Authorization headers
  result = result.replace(/(Authorization:\s*Bearer\s+)(\S+)/gi, "$1***");
  result = result.replace(/(Authorization:\s*Basic\s+)(\S+)/gi, "$1***");

  return result;
}
