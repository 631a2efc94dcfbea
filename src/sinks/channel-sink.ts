import type { ProgressEvent, ProgressSink } from "../types";
import type { EventChannel } from "../utils/event-channel";

/**
 * Publishes structured events for a UI loop to consume
 */
export class ChannelSink implements ProgressSink {
  constructor(private readonly channel: EventChannel<ProgressEvent>) {}

  started(label: string): void {
    this.channel.send({ type: "started", label });
  }

  spinner(label: string, elapsed: number, message: string): void {
    this.channel.send({ type: "spinner", label, elapsed, message });
  }

  progress(label: string, percent: number, eta?: number): void {
    this.channel.send({ type: "progress", label, percent, eta });
  }

  finished(label: string, ok: boolean, message: string): void {
    this.channel.send({ type: "finished", label, ok, message });
  }
}
