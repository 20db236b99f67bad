/**
 * Run summary
 * Displays run report totals and failures
 */

import chalk from "chalk";
import { formatError, type ItemFailure } from "../errors";
import type { RunReport } from "../modules/report";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
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

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
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

// ============================================================================
// Main Summary Display
// ============================================================================

export interface SummaryOptions {
  title: string;
  duration: number;
  failures: ItemFailure[];
  verbose?: boolean;
  reportPath?: string;
}

const MAX_LISTED_ERRORS = 5;

export function displaySummary(report: RunReport, options: SummaryOptions): void {
  const summary = report.summary();
  const unhandled = options.failures.length;
  const handled = summary.failed - unhandled;

  const statusIcon =
    unhandled > 0 ? chalk.red("✖") : handled > 0 ? chalk.yellow("◆") : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold(options.title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(options.duration))}`,
  );

  console.log(sectionHeader("Items"));
  console.log(`   ${progressBar(summary.processed + summary.skipped, summary.total)}`);
  console.log(statRow(chalk.green("◉"), "Processed", summary.processed, chalk.green));

  if (summary.skipped > 0) {
    console.log(statRow(chalk.yellow("◉"), "Skipped", summary.skipped, chalk.yellow));
  }
  if (handled > 0) {
    console.log(statRow(chalk.yellow("◉"), "Failed", handled, chalk.yellow));
  }
  if (unhandled > 0) {
    console.log(statRow(chalk.red("◉"), "Unhandled", unhandled, chalk.red));
  }
  if (options.reportPath) {
    console.log(statRow(chalk.cyan("◉"), "Report", options.reportPath, chalk.cyan));
  }

  displayErrorsSection(report, options);
  console.log("");
}

function displayErrorsSection(report: RunReport, options: SummaryOptions): void {
  const errored = report.rows().filter((row) => row.error !== null);
  if (errored.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  const shown = options.verbose ? errored : errored.slice(0, MAX_LISTED_ERRORS);
  for (const row of shown) {
    console.log(`      ${chalk.dim("·")} ${row.inpath}`);
    console.log(`        ${chalk.dim(String(row.error))}`);
  }
  if (shown.length < errored.length) {
    console.log(`      ${chalk.dim(`  +${errored.length - shown.length} more`)}`);
  }

  if (options.verbose) {
    for (const failure of options.failures) {
      console.log(`      ${chalk.red("✖")} ${failure.inpath}: ${formatError(failure.error)}`);
    }
  }
}
