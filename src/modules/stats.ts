/**
 * Stats Module
 * Displays processing statistics and issues
 */

import chalk from "chalk";
import type { Issue, IssueType, PipelineContext, ProcessingStats } from "../types";

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
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
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
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display processing statistics to console
 */
export async function stats(ctx: PipelineContext, verbose?: boolean): Promise<void> {
  const { config, tracker } = ctx;
  await tracker.exportStats(config.output);

  const stats = tracker.getStats();
  const hasErrors = stats.failedGroups > 0;
  const hasWarnings = stats.issues.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Processing Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayDocumentsSection(stats);
  displayDeliverySection(stats);
  displayIssuesSection(stats.issues, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayDocumentsSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Documents"));

  console.log(`   ${progressBar(stats.generated, stats.groups)}`);
  console.log(statRow(chalk.cyan("◉"), "Documents", stats.documents, chalk.cyan));
  console.log(statRow(chalk.green("◉"), "Generated", stats.generated, chalk.green));

  if (stats.failedGroups > 0) {
    console.log(statRow(chalk.red("◉"), "Failed groups", stats.failedGroups, chalk.red));
  }

  if (stats.passedThrough > 0) {
    console.log(statRow(chalk.white("◉"), "Passed through", stats.passedThrough));
  }

  if (stats.skippedDirectories > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped folders", stats.skippedDirectories, chalk.yellow),
    );
  }

  if (stats.categorized > 0) {
    console.log(statRow(chalk.cyan("◉"), "Categorized", stats.categorized, chalk.cyan));
  }
}

function displayDeliverySection(stats: ProcessingStats): void {
  if (stats.delivered === 0) {
    return;
  }

  console.log(sectionHeader("Delivery"));
  console.log(statRow(chalk.green("◉"), "Delivered", stats.delivered, chalk.green));
}

const ISSUE_LABELS: Array<[IssueType, string]> = [
  ["config", "Config ignored"],
  ["directory", "Folders skipped"],
  ["group", "Groups failed"],
  ["categorization", "Uncategorized"],
];

function displayIssuesSection(issues: Issue[], verbose?: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  for (const [type, label] of ISSUE_LABELS) {
    const ofType = issues.filter((issue) => issue.type === type);
    if (ofType.length === 0) continue;

    console.log(statRow(chalk.yellow("✖"), label, ofType.length, chalk.yellow));
    if (verbose) {
      for (const issue of ofType) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
