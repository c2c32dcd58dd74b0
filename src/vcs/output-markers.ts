import type { CommandResult } from "../shared/command-executor.js";
import type { PullResult } from "./types.js";

export type DiagnosticMarker =
  | "missing-ref"
  | "conflict"
  | "diverged"
  | "fatal"
  | "error";

// Order matters: the most specific marker wins when classifying
const MARKER_PATTERNS: ReadonlyArray<[DiagnosticMarker, RegExp]> = [
  ["missing-ref", /couldn't find remote ref/i],
  ["conflict", /\bCONFLICT\b|merge conflict/],
  ["diverged", /divergent branches|not possible to fast-forward/i],
  ["fatal", /^\s*fatal:/i],
  ["error", /^\s*error:/i],
];

function lines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Markers present anywhere in the output, in classification order.
 */
export function findMarkers(output: string): DiagnosticMarker[] {
  const outputLines = lines(output);
  return MARKER_PATTERNS.filter(([, pattern]) =>
    outputLines.some((line) => pattern.test(line))
  ).map(([marker]) => marker);
}

/**
 * First line carrying any diagnostic marker, else the first non-empty line.
 */
export function firstDiagnosticLine(output: string): string {
  const outputLines = lines(output);
  const marked = outputLines.find((line) =>
    MARKER_PATTERNS.some(([, pattern]) => pattern.test(line))
  );
  return marked ?? outputLines[0] ?? "";
}

function combined(result: CommandResult): string {
  return [result.stdout, result.stderr].filter(Boolean).join("\n");
}

/**
 * Classify a fetch. Returns the diagnostic line, or null on success.
 * Error lines override a zero exit code.
 */
export function fetchFailure(result: CommandResult, what = "git fetch"): string | null {
  if (result.timedOut) {
    return `${what} timed out`;
  }
  const output = combined(result);
  const markers = findMarkers(output);
  if (markers.includes("fatal") || markers.includes("error")) {
    return firstDiagnosticLine(output);
  }
  if (result.exitCode !== 0) {
    return firstDiagnosticLine(output) || `${what} exited with code ${result.exitCode ?? "null"}`;
  }
  return null;
}

/**
 * Classify a pull from its output, not only its exit code.
 */
export function classifyPullOutput(result: CommandResult): PullResult {
  const output = combined(result);
  if (result.timedOut) {
    return { ok: false, reason: "error", note: "git pull timed out" };
  }

  const markers = findMarkers(output);
  const note = firstDiagnosticLine(output);

  if (markers.includes("missing-ref")) {
    return { ok: false, reason: "no-remote-branch", note };
  }
  if (markers.includes("conflict")) {
    return { ok: false, reason: "conflict", note };
  }
  if (markers.includes("diverged")) {
    return { ok: false, reason: "diverged", note };
  }
  if (
    markers.includes("fatal") ||
    markers.includes("error") ||
    result.exitCode !== 0
  ) {
    return {
      ok: false,
      reason: "error",
      note: note || `git pull exited with code ${result.exitCode ?? "null"}`,
    };
  }

  return { ok: true, note: lines(result.stdout)[0] ?? "" };
}

/**
 * Whether a stash pop left conflicts behind.
 */
export function hasConflictMarker(output: string): boolean {
  return findMarkers(output).includes("conflict");
}
