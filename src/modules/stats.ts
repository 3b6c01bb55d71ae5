/**
 * Stats Module
 * Displays batch statistics and failures
 */

import chalk from "chalk";
import type { ProcessingStats, Tracker } from "../types";

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

/**
 * Create a progress bar with percentage
 */
function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
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
// Main Stats Display
// ============================================================================

interface StatsOptions {
  verbose?: boolean;
  // Also write the stats as JSON to this path
  reportPath?: string;
}

/**
 * Export stats to JSON (when asked) and display them on the console
 */
export async function stats(tracker: Tracker, options: StatsOptions = {}): Promise<void> {
  if (options.reportPath) {
    await tracker.exportStats(options.reportPath);
  }

  const current = tracker.getStats();
  const hasErrors = current.failedJobs > 0 || current.issues.length > 0;
  const statusIcon = hasErrors ? chalk.red("✖") : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold("Batch Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(current.duration))}`,
  );

  displayJobsSection(current);
  displayIssuesSection(tracker, options.verbose);

  if (options.reportPath) {
    console.log(`\n  ${chalk.dim("Report:")} ${options.reportPath}`);
  }
  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayJobsSection(current: ProcessingStats): void {
  console.log(sectionHeader("Jobs"));
  console.log(`   ${progressBar(current.successfulJobs, current.totalJobs)}`);

  console.log(statRow(chalk.green("◉"), "Converted", current.successfulJobs, chalk.green));

  if (current.failedJobs > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", current.failedJobs, chalk.red));
  }

  console.log(statRow(chalk.cyan("◉"), "Files written", current.writtenFiles, chalk.cyan));
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const jobIssues = tracker.getIssues("job");
  const resourceIssues = tracker.getIssues("resource");

  if (jobIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (jobIssues.length > 0) {
    console.log(statRow(chalk.red("✖"), "Jobs failed", jobIssues.length, chalk.red));
    // Failed jobs are always listed; details only when verbose
    for (const issue of jobIssues) {
      console.log(
        `      ${chalk.dim("·")} ${issue.input} ${chalk.dim("→")} ${issue.output} ${chalk.yellow(issue.reason)}`,
      );
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Configs failed", resourceIssues.length, chalk.yellow),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.yellow(issue.reason)}`);
      if (verbose && issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
