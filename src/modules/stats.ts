/**
 * Stats Module
 * Displays run counters and failures once the walk has ended
 */

import chalk from "chalk";
import type { FailureIssue, RunCounters, RunState, RunStats } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

/**
 * One-line summary of the run
 *
 * @example
 * formatSummary({ total: 2, downloaded: 1, skipped: 1, duplicateErrors: 0, failed: 0 })
 * // "Downloaded 1 files (Processed 2, Skipped 1, Exists 0, Failed 0)"
 */
export function formatSummary(counters: RunCounters): string {
  return `Downloaded ${counters.downloaded} files (Processed ${counters.total}, Skipped ${counters.skipped}, Exists ${counters.duplicateErrors}, Failed ${counters.failed})`;
}

export function describeEnd(state: RunState): string {
  if (state.status === "exhausted") return "Feed exhausted";
  if (state.stopReason === "target-reached") return "Download target reached";
  if (state.stopReason === "update-complete") return "Update complete";
  return "Interrupted";
}

// ============================================================================
// Main Stats Display
// ============================================================================

export function stats(state: RunState, verbose?: boolean): void {
  const runStats = state.tracker.getStats();

  console.log(formatSummary(runStats));
  if (state.cursor) {
    console.log(`Last item: ${state.cursor} (resume with --last ${state.cursor})`);
  }

  console.log("");

  const statusIcon =
    state.status === "paging"
      ? chalk.red("✖")
      : runStats.failed > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold(describeEnd(state))} ${chalk.dim("·")} ${chalk.dim(formatDuration(runStats.duration))}`,
  );

  displayCountersSection(runStats);
  displayIssuesSection(runStats.issues, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayCountersSection(runStats: RunStats): void {
  console.log(sectionHeader("Items"));

  console.log(statRow(chalk.white("◉"), "Processed", runStats.total));
  console.log(
    statRow(chalk.green("◉"), "Downloaded", runStats.downloaded, chalk.green),
  );

  if (runStats.skipped > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped", runStats.skipped, chalk.yellow),
    );
  }

  if (runStats.duplicateErrors > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Exists", runStats.duplicateErrors, chalk.cyan),
    );
  }
}

function displayIssuesSection(issues: FailureIssue[], verbose?: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));
  console.log(statRow(chalk.red("✖"), "Failed", issues.length, chalk.red));

  const shown = verbose ? issues : issues.slice(0, 5);
  for (const issue of shown) {
    console.log(
      `      ${chalk.dim("·")} ${issue.url} ${chalk.dim(`(item ${issue.itemId}, ${issue.reason})`)}`,
    );
    if (verbose) {
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }
  if (shown.length < issues.length) {
    console.log(`      ${chalk.dim(`  +${issues.length - shown.length} more`)}`);
  }
}
