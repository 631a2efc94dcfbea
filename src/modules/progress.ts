/**
 * Progress Bridge
 * Turns a backend's progress output (or just its liveness) into sink events
 */

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import type { ProgressSink } from "../types";

// Minimum change between two emitted updates
const PERCENT_STEP = 1;
const ELAPSED_STEP_SECONDS = 1;

/**
 * Line parser for ffmpeg's `-progress` key=value stream
 *
 * With a known duration it emits percent and ETA; without one it emits elapsed time
 * as spinner updates. out_time_ms is in microseconds despite its name.
 */
export class FfmpegProgressParser {
  private readonly duration?: number;
  private lastPercent?: number;
  private lastElapsed?: number;

  constructor(
    private readonly label: string,
    durationSeconds: number | undefined,
    private readonly sink: ProgressSink,
  ) {
    this.duration = durationSeconds !== undefined && durationSeconds > 0 ? durationSeconds : undefined;
  }

  handleLine(raw: string): void {
    const line = raw.trim();

    if (line === "progress=end") {
      this.end();
      return;
    }

    const separator = line.indexOf("=");
    if (separator === -1) return;
    const key = line.slice(0, separator);
    if (key !== "out_time_us" && key !== "out_time_ms") return;

    const value = line.slice(separator + 1).trim();
    if (!/^\d+$/.test(value)) return; // "N/A" before the first frame
    const elapsed = Number(value) / 1_000_000;

    if (this.duration !== undefined) {
      const percent = Math.min((elapsed / this.duration) * 100, 100);
      if (this.lastPercent === undefined || Math.abs(percent - this.lastPercent) >= PERCENT_STEP) {
        this.lastPercent = percent;
        this.sink.progress(this.label, percent, Math.max(this.duration - elapsed, 0));
      }
    } else if (
      this.lastElapsed === undefined ||
      Math.abs(elapsed - this.lastElapsed) >= ELAPSED_STEP_SECONDS
    ) {
      this.lastElapsed = elapsed;
      this.sink.spinner(this.label, elapsed, "ffmpeg");
    }
  }

  private end(): void {
    if (this.duration === undefined) return;
    if (this.lastPercent === undefined || this.lastPercent < 99.5) {
      this.lastPercent = 100;
      this.sink.progress(this.label, 100, 0);
    }
  }
}

/**
 * Read a progress stream to its end, feeding every line to the parser
 * The stream is always drained, whatever the sink does with the events
 */
export async function drainProgress(
  stream: Readable,
  parser: FfmpegProgressParser,
): Promise<void> {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  for await (const line of lines) {
    parser.handleLine(line);
  }
}

/**
 * Emit wall-clock elapsed time while a process without progress output runs
 *
 * @returns stop function; call it once the process has exited
 */
export function startLivenessPoll(
  sink: ProgressSink,
  label: string,
  message: string,
  intervalMs: number,
): () => void {
  const startedAt = Date.now();
  const timer = setInterval(() => {
    sink.spinner(label, (Date.now() - startedAt) / 1000, message);
  }, intervalMs);

  return () => clearInterval(timer);
}
