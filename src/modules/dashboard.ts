/**
 * Dashboard
 * Live view of a running batch, fed by the worker's event channel
 */

import path from "node:path";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { BatchItem, ProgressEvent } from "../types";
import type { EventChannel } from "../utils/event-channel";
import { formatPercent } from "../sinks";

export type TaskStatus = "pending" | "running" | "ok" | "failed";

export interface TaskState {
  label: string;
  name: string;
  destination: string;
  status: TaskStatus;
  percent?: number;
  eta?: number;
  elapsed?: number;
  message: string;
}

export interface TaskCounts {
  pending: number;
  running: number;
  ok: number;
  failed: number;
}

export const MAX_LOG_LINES = 200;

export class TaskBoard {
  private readonly tasks: TaskState[] = [];
  private readonly index = new Map<string, number>();
  private readonly logLines: string[] = [];
  private active = 0;

  constructor(items: BatchItem[]) {
    for (const item of items) {
      this.index.set(item.source, this.tasks.length);
      this.tasks.push({
        label: item.source,
        name: path.basename(item.source) || item.source,
        destination: item.destination,
        status: "pending",
        message: "",
      });
    }
  }

  get logs(): readonly string[] {
    return this.logLines;
  }

  get activeTask(): TaskState | undefined {
    return this.tasks[this.active];
  }

  task(label: string): TaskState | undefined {
    const position = this.index.get(label);
    return position === undefined ? undefined : this.tasks[position];
  }

  all(): readonly TaskState[] {
    return this.tasks;
  }

  counts(): TaskCounts {
    const counts: TaskCounts = { pending: 0, running: 0, ok: 0, failed: 0 };
    for (const task of this.tasks) counts[task.status]++;
    return counts;
  }

  /**
   * Apply one event; events for unknown labels are ignored
   */
  handleEvent(event: ProgressEvent): void {
    const position = this.index.get(event.label);
    if (position === undefined) return;
    this.active = position;
    const task = this.tasks[position];

    switch (event.type) {
      case "started":
        task.status = "running";
        task.message = "starting";
        this.log(`Started: ${task.name}`);
        break;
      case "spinner":
        if (task.status === "pending") task.status = "running";
        task.elapsed = event.elapsed;
        task.message = event.message;
        break;
      case "progress":
        if (task.status === "pending") task.status = "running";
        task.percent = event.percent;
        task.eta = event.eta;
        task.message = "processing";
        break;
      case "finished":
        task.status = event.ok ? "ok" : "failed";
        task.percent = 100;
        task.message = event.message;
        this.log(event.ok ? `Done: ${task.name}` : `Failed: ${task.name} (${event.message})`);
        break;
    }
  }

  private log(line: string): void {
    if (this.logLines.length === MAX_LOG_LINES) this.logLines.shift();
    this.logLines.push(line);
  }
}

// ============================================================================
// Rendering
// ============================================================================

const STATUS_ICONS: Record<TaskStatus, string> = {
  pending: chalk.dim("·"),
  running: chalk.cyan("▸"),
  ok: chalk.green("✔"),
  failed: chalk.red("✖"),
};

function taskDetail(task: TaskState): string {
  if (task.status === "running") {
    if (task.percent !== undefined) return chalk.cyan(formatPercent(task.percent, task.eta));
    if (task.elapsed !== undefined) return chalk.dim(`${task.message} ... ${task.elapsed.toFixed(1)}s`);
    return chalk.dim(task.message);
  }
  if (task.status === "failed") return chalk.red(task.message);
  return "";
}

export function renderBoard(board: TaskBoard, logTail: number = 5): string {
  const { pending, running, ok, failed } = board.counts();
  const lines = [
    `${chalk.bold("Tasks")} ${chalk.dim("·")} pending ${pending} ${chalk.dim("·")} running ${running} ${chalk.dim("·")} ${chalk.green(`ok ${ok}`)} ${chalk.dim("·")} ${chalk.red(`failed ${failed}`)}`,
  ];

  for (const task of board.all()) {
    const detail = taskDetail(task);
    lines.push(
      `  ${STATUS_ICONS[task.status]} ${task.name} ${chalk.dim("->")} ${chalk.dim(task.destination)}${detail ? ` ${detail}` : ""}`,
    );
  }

  const tail = board.logs.slice(-logTail);
  if (tail.length > 0) {
    lines.push("");
    for (const line of tail) lines.push(chalk.dim(`  ${line}`));
  }
  return lines.join("\n");
}

export interface ObserveOptions {
  tickInterval: number;
  line?: Ora;
}

/**
 * Drain the channel every tick and redraw until the worker closes it
 */
export function observeBatch(
  channel: EventChannel<ProgressEvent>,
  board: TaskBoard,
  options: ObserveOptions,
): Promise<void> {
  const line = options.line ?? ora();
  line.start(renderBoard(board));

  return new Promise((resolve) => {
    const timer = setInterval(() => {
      for (const event of channel.drain()) board.handleEvent(event);
      const done = channel.isClosed && channel.size === 0;

      if (!done) {
        line.text = renderBoard(board);
        return;
      }

      clearInterval(timer);
      const { failed } = board.counts();
      if (failed > 0) {
        line.fail(renderBoard(board));
      } else {
        line.succeed(renderBoard(board));
      }
      resolve();
    }, options.tickInterval);
  });
}
