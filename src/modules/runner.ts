/**
 * Tool Runner
 * Spawns one external backend process and reports on it until it exits
 */

import { spawn, type ChildProcess } from "node:child_process";
import type { ProgressSink } from "../types";
import {
  ExecutionError,
  ToolFailureError,
  ToolMissingError,
  isErrnoException,
} from "../utils/errors";
import { FfmpegProgressParser, drainProgress, startLivenessPoll } from "./progress";

export interface ToolInvocation {
  name: string; // Display name, e.g. "ImageMagick"
  candidates: string[]; // Executables tried in order; next one only when missing
  args: string[];
  installHint: string;
}

export interface RunToolOptions {
  sink: ProgressSink;
  label: string;
  pollInterval: number;
  // Set for ffmpeg: stdout carries `-progress pipe:1` output
  progress?: { durationSeconds?: number };
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

function spawnChild(command: string, args: string[], stdout: "pipe" | "ignore"): Promise<ChildProcess> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", stdout, "inherit"] });
    child.once("spawn", () => resolve(child));
    child.once("error", reject);
  });
}

function waitForExit(child: ChildProcess): Promise<ExitStatus> {
  return new Promise((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ code, signal });
    });
  });
}

/**
 * Start the first candidate executable that exists
 *
 * @throws ToolMissingError when none of the candidates can be found
 */
async function spawnFirstAvailable(
  invocation: ToolInvocation,
  stdout: "pipe" | "ignore",
): Promise<ChildProcess> {
  for (const candidate of invocation.candidates) {
    try {
      return await spawnChild(candidate, invocation.args, stdout);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") continue;
      throw new ExecutionError("convert", `failed to execute ${invocation.name}`, error);
    }
  }
  throw new ToolMissingError(invocation.name, invocation.installHint);
}

export async function runTool(invocation: ToolInvocation, options: RunToolOptions): Promise<void> {
  const { sink, label } = options;
  const child = await spawnFirstAvailable(invocation, options.progress ? "pipe" : "ignore");
  const exit = waitForExit(child);

  let status: ExitStatus;
  if (options.progress && child.stdout) {
    const parser = new FfmpegProgressParser(label, options.progress.durationSeconds, sink);
    await drainProgress(child.stdout, parser);
    status = await exit;
  } else {
    const stop = startLivenessPoll(sink, label, invocation.name, options.pollInterval);
    try {
      status = await exit;
    } finally {
      stop();
    }
  }

  if (status.code !== 0) {
    const described = status.code !== null ? `${status.code}` : `signal ${status.signal}`;
    throw new ToolFailureError(invocation.name, described);
  }
}
