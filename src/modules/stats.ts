/**
 * Stats Module
 * Displays the run summary with failed items enumerated
 */

import { resolve as resolvePath } from "node:path";
import chalk from "chalk";
import type { RunContext, RunStats, Tracker } from "../types";

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

/**
 * Format a byte count with binary units
 *
 * @example
 * formatBytes(1536) // "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${units[unit]}`;
}

/**
 * Create a modern progress bar with percentage
 */
function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
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

/**
 * Display run statistics to console
 */
export function stats(ctx: RunContext): void {
  const { config, tracker } = ctx;
  const stats = tracker.getStats();

  const statusIcon =
    stats.failed > 0
      ? chalk.red("✖")
      : tracker.getIssues("resource").length > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold("Download Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayMediaSection(stats);
  displayIssuesSection(tracker);

  console.log(
    `\n   ${chalk.dim("Output")} ${chalk.blue(resolvePath(config.output.directory))}`,
  );
  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayMediaSection(stats: RunStats): void {
  console.log(sectionHeader("Media"));

  if (stats.totalItems === 0) {
    console.log(`   ${chalk.yellow("No media found in album.")}`);
    return;
  }

  const bar = progressBar(stats.downloaded + stats.skipped, stats.totalItems);
  console.log(`   ${bar}`);

  console.log(statRow(chalk.white("◉"), "Total", stats.totalItems));
  console.log(
    statRow(
      chalk.green("◉"),
      "Downloaded",
      `${stats.downloaded} (${formatBytes(stats.bytes)})`,
      chalk.green,
    ),
  );
  console.log(statRow(chalk.cyan("◉"), "Skipped", stats.skipped, chalk.cyan));

  if (stats.failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", stats.failed, chalk.red));
  }
}

function displayIssuesSection(tracker: Tracker): void {
  const downloadIssues = tracker.getIssues("download");
  const resourceIssues = tracker.getIssues("resource");

  if (downloadIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (downloadIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Items failed", downloadIssues.length, chalk.red),
    );
    for (const issue of downloadIssues) {
      console.log(
        `      ${chalk.dim("·")} ${issue.id} ${chalk.dim(`(${issue.reason})`)}`,
      );
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config ignored",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }
}
