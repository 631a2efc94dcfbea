import type { ProgressSink } from "../types";

/**
 * Discards every event (JSON output, tests)
 */
export class SilentSink implements ProgressSink {
  started(): void {}
  spinner(): void {}
  progress(): void {}
  finished(): void {}
}
