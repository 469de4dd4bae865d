/**
 * Stats Module
 * Displays the end-of-run summary
 */

import chalk from "chalk";
import type { HarvestContext, RunState } from "../types";

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
 * Format a byte count using binary units
 */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  let unit = 0;

  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }

  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

function statRow(
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Print the run summary, including the total photo count
 */
export function stats(
  ctx: HarvestContext,
  state: RunState,
  durationMs: number,
): void {
  const { config, logger } = ctx;

  console.log("");
  console.log(
    `  ${chalk.green("✔")} ${chalk.bold("Download Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(durationMs))}`,
  );
  console.log("");
  console.log(statRow("Query", config.search.query, chalk.cyan));
  console.log(statRow("Destination", config.output.directory));
  console.log(statRow("Pages", state.pages));
  console.log(statRow("Results reported", state.totalResults));
  console.log(statRow("Photos saved", state.photos, chalk.green));
  console.log(statRow("Downloaded", formatBytes(state.bytes)));
  console.log("");

  logger.info(`done, total count is ${state.photos}`);
}
