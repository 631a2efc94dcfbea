/**
 * Progress event contract shared by the executor, the batch worker and every sink
 */

export type ProgressEvent =
  | { type: "started"; label: string }
  | { type: "spinner"; label: string; elapsed: number; message: string }
  | { type: "progress"; label: string; percent: number; eta?: number }
  | { type: "finished"; label: string; ok: boolean; message: string };

/**
 * Observer of one or more plan executions
 * `label` identifies the plan (its source path)
 */
export interface ProgressSink {
  started(label: string): void;
  spinner(label: string, elapsed: number, message: string): void;
  progress(label: string, percent: number, eta?: number): void;
  finished(label: string, ok: boolean, message: string): void;
}
