// src/output/sync-report.ts
import chalk, { type ChalkInstance } from "chalk";
import { statusCategory, statusLabel, type StatusCategory } from "../sync/status.js";
import type { RunResult, SyncOutcome } from "../sync/types.js";

interface CategoryStyle {
  icon: string;
  color: ChalkInstance;
}

const CATEGORY_STYLES: Record<StatusCategory, CategoryStyle> = {
  current: { icon: "✓", color: chalk.green },
  changed: { icon: "↻", color: chalk.cyan },
  attention: { icon: "⚠", color: chalk.yellow },
  failure: { icon: "✗", color: chalk.red },
};

export function styleFor(outcome: SyncOutcome): CategoryStyle {
  return CATEGORY_STYLES[statusCategory(outcome)];
}

function branchLabel(outcome: SyncOutcome): string {
  return outcome.branch || "unknown";
}

function yesNo(value: boolean): string {
  return value ? "Yes" : "No";
}

/**
 * One live progress line, e.g. `[2/5] ✓ api (main) Already up to date`.
 */
export function formatProgressLine(
  index: number,
  total: number,
  outcome: SyncOutcome
): string {
  const { icon, color } = styleFor(outcome);
  return [
    chalk.dim(`[${index}/${total}]`),
    color(icon),
    outcome.repoName,
    chalk.dim(`(${branchLabel(outcome)})`),
    color(statusLabel(outcome)),
  ].join(" ");
}

/**
 * Indented per-repository messages for verbose output.
 */
export function formatOutcomeMessages(outcome: SyncOutcome): string[] {
  return outcome.messages.map((message) => chalk.gray(`      ${message}`));
}

function compareNames(a: SyncOutcome, b: SyncOutcome): number {
  if (a.repoName < b.repoName) return -1;
  if (a.repoName > b.repoName) return 1;
  return 0;
}

/**
 * End-of-run table sorted by repository name. The Status column is left
 * out when every repository is already up to date.
 */
export function formatSummaryTable(outcomes: readonly SyncOutcome[]): string[] {
  if (outcomes.length === 0) {
    return [];
  }

  const sorted = [...outcomes].sort(compareNames);
  const showStatus = sorted.some(
    (outcome) => statusCategory(outcome) !== "current"
  );

  const header = ["Repository", "Branch", "Dirty", "Pulled", "Ahead/Behind"];
  if (showStatus) header.push("Status");

  const rows = sorted.map((outcome) => {
    const cells = [
      outcome.repoName,
      branchLabel(outcome),
      yesNo(outcome.dirty),
      outcome.pulled,
      `${outcome.ahead}/${outcome.behind}`,
    ];
    if (showStatus) cells.push(statusLabel(outcome));
    return cells;
  });

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((cells) => cells[column].length))
  );
  const render = (cells: string[]): string =>
    cells.map((cell, column) => cell.padEnd(widths[column])).join("  ").trimEnd();

  const lines = [
    chalk.bold(render(header)),
    render(widths.map((width) => "-".repeat(width))),
  ];
  sorted.forEach((outcome, row) => {
    lines.push(styleFor(outcome).color(render(rows[row])));
  });
  return lines;
}

/**
 * One-line run summary, e.g. `Updated 3 repositories in 4.2s`.
 */
export function formatFooter(result: RunResult): string {
  const count = result.outcomes.length;
  const noun = count === 1 ? "repository" : "repositories";
  const seconds = (result.elapsedMs / 1000).toFixed(1);
  const footer = `Updated ${count} ${noun} in ${seconds}s`;
  if (result.failures === 0) {
    return footer;
  }
  return `${footer}, ${chalk.red(`${result.failures} failed`)}`;
}
