import { describe, it, expect } from "vitest";
import ora from "ora";
import { MAX_LOG_LINES, TaskBoard, observeBatch } from "./dashboard";
import { EventChannel } from "../utils/event-channel";
import type { ProgressEvent } from "../types";

const items = [
  { source: "in/a.wav", destination: "out/a.mp3" },
  { source: "in/b.wav", destination: "out/b.mp3" },
];

describe("TaskBoard", () => {
  it("starts with every task pending", () => {
    const board = new TaskBoard(items);
    expect(board.counts()).toEqual({ pending: 2, running: 0, ok: 0, failed: 0 });
    expect(board.task("in/a.wav")?.name).toBe("a.wav");
  });

  it("follows a task through its events", () => {
    const board = new TaskBoard(items);
    board.handleEvent({ type: "started", label: "in/a.wav" });
    expect(board.task("in/a.wav")?.status).toBe("running");
    expect(board.task("in/a.wav")?.message).toBe("starting");

    board.handleEvent({ type: "progress", label: "in/a.wav", percent: 40, eta: 3 });
    expect(board.task("in/a.wav")).toMatchObject({ percent: 40, eta: 3, message: "processing" });

    board.handleEvent({ type: "finished", label: "in/a.wav", ok: true, message: "ok" });
    expect(board.task("in/a.wav")).toMatchObject({ status: "ok", percent: 100 });
    expect(board.logs).toEqual(["Started: a.wav", "Done: a.wav"]);
  });

  it("records failures with their message", () => {
    const board = new TaskBoard(items);
    board.handleEvent({ type: "started", label: "in/b.wav" });
    board.handleEvent({ type: "finished", label: "in/b.wav", ok: false, message: "boom" });
    expect(board.counts()).toEqual({ pending: 1, running: 0, ok: 0, failed: 1 });
    expect(board.logs[1]).toBe("Failed: b.wav (boom)");
    expect(board.activeTask?.label).toBe("in/b.wav");
  });

  it("marks a pending task running on spinner updates", () => {
    const board = new TaskBoard(items);
    board.handleEvent({ type: "spinner", label: "in/a.wav", elapsed: 1.5, message: "ffmpeg" });
    expect(board.task("in/a.wav")).toMatchObject({ status: "running", elapsed: 1.5 });
  });

  it("ignores events for unknown labels", () => {
    const board = new TaskBoard(items);
    board.handleEvent({ type: "started", label: "elsewhere.wav" });
    expect(board.counts().pending).toBe(2);
    expect(board.logs).toEqual([]);
  });

  it("keeps only the most recent log lines", () => {
    const board = new TaskBoard(items);
    for (let i = 0; i < MAX_LOG_LINES + 5; i++) {
      board.handleEvent({ type: "started", label: "in/a.wav" });
    }
    expect(board.logs).toHaveLength(MAX_LOG_LINES);
  });
});

describe("observeBatch", () => {
  it("applies every event and resolves once the channel closes", async () => {
    const channel = new EventChannel<ProgressEvent>();
    const board = new TaskBoard(items);
    const observing = observeBatch(channel, board, {
      tickInterval: 5,
      line: ora({ isSilent: true }),
    });

    channel.send({ type: "started", label: "in/a.wav" });
    channel.send({ type: "finished", label: "in/a.wav", ok: true, message: "ok" });
    channel.send({ type: "started", label: "in/b.wav" });
    channel.send({ type: "finished", label: "in/b.wav", ok: false, message: "nope" });
    channel.close();

    await observing;
    expect(board.counts()).toEqual({ pending: 0, running: 0, ok: 1, failed: 1 });
  });
});
