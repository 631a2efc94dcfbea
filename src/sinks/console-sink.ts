/**
 * Console Sink
 * One in-place updating line per plan, persisted as a success or failure line
 */

import path from "node:path";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { ProgressSink } from "../types";

export function formatPercent(percent: number, eta?: number): string {
  const base = `${percent.toFixed(0)}%`;
  return eta === undefined ? base : `${base} eta ${eta.toFixed(1)}s`;
}

export class ConsoleSink implements ProgressSink {
  constructor(private readonly line: Ora = ora({ indent: 2 })) {}

  get text(): string {
    return this.line.text;
  }

  started(label: string): void {
    this.line.start(`${path.basename(label)} ${chalk.dim("starting")}`);
  }

  spinner(label: string, elapsed: number, message: string): void {
    this.line.text = `${path.basename(label)} ${chalk.dim(`${message} ... ${elapsed.toFixed(1)}s`)}`;
  }

  progress(label: string, percent: number, eta?: number): void {
    this.line.text = `${path.basename(label)} ${chalk.cyan(formatPercent(percent, eta))}`;
  }

  finished(label: string, ok: boolean, message: string): void {
    if (ok) {
      this.line.succeed(path.basename(label));
    } else {
      this.line.fail(`${path.basename(label)} ${chalk.red(message)}`);
    }
  }
}
