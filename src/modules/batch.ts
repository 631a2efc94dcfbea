/**
 * Batch Worker
 * Builds and executes plans strictly one after another, isolating failures
 */

import { stat } from "fs/promises";
import type { Stats } from "fs";
import path from "node:path";
import glob from "fast-glob";
import type {
  BatchEntry,
  BatchItem,
  BatchResult,
  ConversionOptions,
  Plan,
  ProgressEvent,
} from "../types";
import { ChannelSink, SilentSink } from "../sinks";
import { errorMessage, isErrnoException } from "../utils/errors";
import type { EventChannel } from "../utils/event-channel";
import { Tracker } from "../utils/tracker";
import { executePlan, type ExecuteOptions } from "./executor";
import { buildPlan } from "./planner";

export interface BatchOptions {
  moveSource: boolean;
  backup: boolean;
  options: ConversionOptions;
  execute: ExecuteOptions;
  // `file` executable for type detection, or null to skip it
  fileCommand?: string | null;
  // Dry run: receives each plan instead of executing it
  onPlan?: (plan: Plan) => void;
  tracker?: Tracker;
}

/**
 * Destination for one batch source: same name, or same stem with a new extension
 *
 * @example
 * destForSource("/tmp/out", "music/clip.wav", "mp3") // "/tmp/out/clip.mp3"
 * destForSource("/tmp/out", "music/clip.wav") // "/tmp/out/clip.wav"
 */
export function destForSource(destDir: string, source: string, toExt?: string): string {
  const parsed = path.parse(source);
  if (!parsed.base) {
    throw new Error(`source must have a file name: ${source}`);
  }
  if (toExt !== undefined) {
    const ext = toExt.replace(/^\.+/, "");
    return path.join(destDir, `${parsed.name}.${ext}`);
  }
  return path.join(destDir, parsed.base);
}

function looksLikeGlob(input: string): boolean {
  return /[*?[]/.test(input);
}

async function statOrNull(input: string): Promise<Stats | null> {
  try {
    return await stat(input);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return null;
    }
    throw error;
  }
}

async function addPath(sources: Set<string>, input: string, recursive: boolean): Promise<void> {
  const info = await statOrNull(input);

  if (info?.isDirectory()) {
    const found = await glob(recursive ? "**/*" : "*", {
      cwd: input,
      onlyFiles: true,
      dot: true,
    });
    for (const file of found) sources.add(path.join(input, file));
    return;
  }

  if (info) {
    sources.add(input);
    return;
  }

  // A glob match that vanished, or a literal name that only looks like a pattern
  if (looksLikeGlob(input)) return;

  throw new Error(`input not found: ${input}`);
}

/**
 * Expand paths, globs and directories into a sorted, de-duplicated list of files
 * Stdin lines are treated exactly like the other inputs
 *
 * @throws Error when a plain (non-glob) input does not exist
 */
export async function collectSources(
  inputs: string[],
  stdinSources: string[],
  recursive: boolean,
): Promise<string[]> {
  const sources = new Set<string>();

  for (const input of [...inputs, ...stdinSources]) {
    if (looksLikeGlob(input)) {
      const matches = await glob(input, { onlyFiles: false, dot: true });
      for (const match of matches) await addPath(sources, match, recursive);
      continue;
    }
    await addPath(sources, input, recursive);
  }

  return [...sources].sort();
}

/**
 * Process every item, whatever happens to the ones before it
 * Plans that cannot be built count as failures and still get started/finished events
 */
export async function runBatch(items: BatchItem[], options: BatchOptions): Promise<BatchResult> {
  const tracker = options.tracker ?? new Tracker();
  const sink = options.execute.sink ?? new SilentSink();
  const entries: BatchEntry[] = [];
  tracker.setTotal(items.length);

  for (const item of items) {
    let plan: Plan;
    try {
      plan = await buildPlan(
        {
          source: item.source,
          destination: item.destination,
          moveSource: options.moveSource,
          backup: options.backup,
          options: options.options,
        },
        options.fileCommand,
      );
    } catch (error) {
      sink.started(item.source);
      sink.finished(item.source, false, errorMessage(error));
      tracker.trackFailure(item.source, error, item.destination);
      entries.push({ ...item, ok: false, error: errorMessage(error) });
      continue;
    }

    if (options.onPlan) {
      options.onPlan(plan);
      tracker.incrementSucceeded();
      entries.push({ ...item, ok: true });
      continue;
    }

    try {
      await executePlan(plan, { ...options.execute, sink });
      tracker.incrementSucceeded();
      entries.push({ ...item, ok: true });
    } catch (error) {
      tracker.trackFailure(item.source, error, item.destination);
      entries.push({ ...item, ok: false, error: errorMessage(error) });
    }
  }

  const { total, succeeded, failed } = tracker.getStats();
  return { total, succeeded, failed, entries };
}

/**
 * Run the batch on its own, publishing every event on the channel
 * The channel is closed once the last plan has finished
 */
export async function startBatchWorker(
  items: BatchItem[],
  options: BatchOptions,
  channel: EventChannel<ProgressEvent>,
): Promise<BatchResult> {
  try {
    return await runBatch(items, {
      ...options,
      execute: { ...options.execute, sink: new ChannelSink(channel) },
    });
  } finally {
    channel.close();
  }
}
