/**
 * Stats Module
 * Displays a summary of the run
 */

import chalk from "chalk";
import path from "node:path";
import type { Invocation, OrderingContext, Phase } from "../types";

const PHASE_TITLES: Record<Phase, string> = {
  verify: "Verify inputs",
  "convert-to-binary": "Text to binary",
  "compute-ordering": "Node ordering",
  "convert-to-text": "Binary to text",
};

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

function invocationRow(invocation: Invocation): string {
  const [command = "", mode, ...rest] = invocation.argv;
  const target = rest[rest.length - 1] ?? mode ?? "";
  const ok = invocation.code === 0;
  const icon = ok ? chalk.green("◉") : chalk.red("◉");
  const status = ok
    ? chalk.dim(formatDuration(invocation.duration))
    : chalk.red(`exit ${invocation.code ?? invocation.signal ?? "?"}`);

  return `   ${icon} ${chalk.dim(path.basename(command).padEnd(18))} ${path.basename(target)} ${status}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

export function stats(ctx: OrderingContext): void {
  const stats = ctx.tracker.getStats();
  const hasWarnings = stats.failedInvocations > 0;
  const title = ctx.dryRun ? "Dry Run Complete" : "Ordering Complete";

  console.log("");
  console.log(
    `  ${hasWarnings ? chalk.yellow("◆") : chalk.green("✔")} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  console.log(sectionHeader("Phases"));
  for (const phase of stats.completedPhases) {
    console.log(statRow(chalk.green("◉"), PHASE_TITLES[phase], "done", chalk.green));
  }

  console.log(sectionHeader("Invocations"));
  for (const invocation of stats.invocations) {
    console.log(invocationRow(invocation));
  }

  console.log(sectionHeader("Output"));
  console.log(statRow(chalk.cyan("◉"), "Order", ctx.layout.textOrderPath, chalk.cyan));
  if (ctx.ordering) {
    console.log(statRow(chalk.cyan("◉"), "Nodes", ctx.ordering.length, chalk.cyan));
  }
  if (stats.createdDirectories.length > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Created", stats.createdDirectories.join(", "), chalk.cyan),
    );
  }

  console.log("");
}
