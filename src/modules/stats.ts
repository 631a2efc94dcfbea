/**
 * Stats Module
 * Batch summary for the terminal and for --json output
 */

import chalk from "chalk";
import type { BatchResult } from "../types";
import type { BatchStats, FailureReason } from "../utils/tracker";

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

const REASON_LABELS: Record<FailureReason, string> = {
  validation: "Invalid input",
  precondition: "Precondition",
  "tool-missing": "Tool missing",
  "tool-failure": "Tool failed",
  "output-empty": "Empty output",
  probe: "Probe failed",
  io: "I/O error",
  unknown: "Other",
};

// ============================================================================
// Summary
// ============================================================================

/**
 * One-line summary, also used when stdout is not a terminal
 */
export function summaryLine(stats: Pick<BatchStats, "total" | "succeeded" | "failed">): string {
  return `Batch summary: total ${stats.total}, succeeded ${stats.succeeded}, failed ${stats.failed}`;
}

export function renderSummary(stats: BatchStats, verbose?: boolean): string[] {
  const lines: string[] = [""];
  const statusIcon = stats.failed > 0 ? chalk.red("✖") : chalk.green("✔");

  lines.push(
    `  ${statusIcon} ${chalk.bold(summaryLine(stats))} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  lines.push(sectionHeader("Files"));
  lines.push(`   ${progressBar(stats.succeeded, stats.total)}`);
  lines.push(statRow(chalk.green("◉"), "Succeeded", stats.succeeded, chalk.green));
  if (stats.failed > 0) {
    lines.push(statRow(chalk.red("◉"), "Failed", stats.failed, chalk.red));
  }

  if (stats.issues.length > 0) {
    lines.push(sectionHeader(chalk.red("Errors")));

    const counts = new Map<FailureReason, number>();
    for (const issue of stats.issues) {
      counts.set(issue.reason, (counts.get(issue.reason) ?? 0) + 1);
    }
    for (const [reason, count] of counts) {
      lines.push(statRow(chalk.red("✖"), REASON_LABELS[reason], count, chalk.red));
    }

    for (const issue of stats.issues) {
      lines.push(`      ${chalk.dim("·")} Fail: ${issue.source} -> ${issue.details}`);
      if (verbose && issue.step) {
        lines.push(`        ${chalk.dim(`step: ${issue.step}`)}`);
      }
    }
  }

  lines.push("");
  return lines;
}

export function displaySummary(stats: BatchStats, verbose?: boolean): void {
  for (const line of renderSummary(stats, verbose)) {
    console.log(line);
  }
}

export interface BatchSummaryJson {
  total: number;
  succeeded: number;
  failed: number;
  results: Array<{ source: string; destination: string; ok: boolean; error?: string }>;
}

export function summaryJson(result: BatchResult): BatchSummaryJson {
  return {
    total: result.total,
    succeeded: result.succeeded,
    failed: result.failed,
    results: result.entries.map((entry) => ({
      source: entry.source,
      destination: entry.destination,
      ok: entry.ok,
      ...(entry.error !== undefined ? { error: entry.error } : {}),
    })),
  };
}
