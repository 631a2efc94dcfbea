/**
 * Executor
 * Carries out a plan: staged output, backups, one backend process, atomic finalize
 */

import { randomUUID } from "node:crypto";
import { constants } from "node:fs";
import { copyFile, mkdir, mkdtemp, rename, rm, stat } from "fs/promises";
import path from "node:path";
import type { AppConfig, MediaInfo, Plan, ProgressSink, ToolsConfig } from "../types";
import {
  ConversionError,
  ExecutionError,
  OutputEmptyError,
  PreconditionError,
  errorMessage,
  isErrnoException,
  step,
} from "../utils/errors";
import { fileExists } from "../utils/file-exists";
import { Logger } from "../utils/logger";
import { ffmpegArgs, magickArgs, sofficeArgs } from "./commands";
import { decideFfmpegMode } from "./mode-decider";
import { probeMedia } from "./prober";
import { runTool } from "./runner";
import { SilentSink } from "../sinks";

// Hidden prefix for every staged file and directory
export const TEMP_PREFIX = ".morphmv.tmp-";

const MAX_BACKUP_ATTEMPTS = 1000;

export interface ExecuteOptions {
  overwrite: boolean;
  sink?: ProgressSink;
  // Backend commands, normally the merged `tools` config section
  tools: ToolsConfig;
  pollInterval?: number;
  logger?: Logger;
  // Replaces the ffprobe call; mainly for tests
  probe?: (source: string) => Promise<MediaInfo>;
}

interface ExecutionContext {
  plan: Plan;
  overwrite: boolean;
  sink: ProgressSink;
  tools: ToolsConfig;
  pollInterval: number;
  logger: Logger;
  probe: (source: string) => Promise<MediaInfo>;
  label: string;
}

/**
 * First free name among `<dest>.bak`, `<dest>.bak.1`, `<dest>.bak.2`, ...
 */
export async function nextBackupPath(destination: string): Promise<string> {
  const base = `${destination}.bak`;
  if (!(await fileExists(base))) return base;

  for (let index = 1; index <= MAX_BACKUP_ATTEMPTS; index++) {
    const candidate = `${base}.${index}`;
    if (!(await fileExists(candidate))) return candidate;
  }

  throw new PreconditionError("backup", "could not find available backup path");
}

async function prepareDestination(ctx: ExecutionContext): Promise<void> {
  const { plan } = ctx;

  try {
    await mkdir(path.dirname(plan.destination), { recursive: true });
  } catch (error) {
    throw new PreconditionError(
      "prepare",
      `failed to create destination directory: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (!(await fileExists(plan.destination))) return;

  if (plan.backup) {
    const backupPath = await nextBackupPath(plan.destination);
    await step("backup", "failed to backup destination", () =>
      rename(plan.destination, backupPath),
    );
    ctx.logger.debug(`Backed up ${plan.destination} to ${backupPath}`);
  } else if (!ctx.overwrite) {
    throw new PreconditionError("prepare", "destination exists; pass --overwrite or --backup");
  }
}

async function renameOnly(ctx: ExecutionContext): Promise<void> {
  const { source, destination } = ctx.plan;

  if (ctx.overwrite && (await fileExists(destination))) {
    await step("rename", "failed to remove existing destination", () =>
      rm(destination, { force: true }),
    );
  }
  await step("rename", "failed to rename source", () => rename(source, destination));
}

async function copyOnly(ctx: ExecutionContext): Promise<void> {
  const { source, destination } = ctx.plan;
  const tempPath = path.join(path.dirname(destination), `${TEMP_PREFIX}${randomUUID()}`);

  try {
    await step("copy", "failed to copy data", () =>
      copyFile(source, tempPath, constants.COPYFILE_EXCL),
    );
    await step("finalize", "failed to finalize destination", () =>
      rename(tempPath, destination),
    );
  } finally {
    await removeTemp(ctx, tempPath);
  }
}

async function removeTemp(ctx: ExecutionContext, tempPath: string): Promise<void> {
  try {
    await rm(tempPath, { recursive: true, force: true });
  } catch (error) {
    ctx.logger.warn(`Failed to remove temp path ${tempPath}: ${errorMessage(error)}`);
  }
}

function tempOutputPath(tempDir: string, destination: string): string {
  const ext = path.extname(destination);
  return path.join(tempDir, `output${ext.length > 1 ? ext : ".out"}`);
}

async function ensureNonEmpty(filePath: string): Promise<void> {
  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (error) {
    // A tool that exits cleanly without writing anything produced empty output too
    if (isErrnoException(error) && error.code === "ENOENT") throw new OutputEmptyError();
    throw new ExecutionError("verify", "failed to stat output", error);
  }
  if (size === 0) throw new OutputEmptyError();
}

async function runImageMagick(ctx: ExecutionContext, output: string): Promise<void> {
  await runTool(
    {
      name: "ImageMagick",
      candidates: ctx.tools.magick,
      args: magickArgs(ctx.plan, output),
      installHint: "install it (e.g., apt install imagemagick)",
    },
    { sink: ctx.sink, label: ctx.label, pollInterval: ctx.pollInterval },
  );
}

async function probeSource(ctx: ExecutionContext): Promise<MediaInfo | undefined> {
  try {
    return await ctx.probe(ctx.plan.source);
  } catch (error) {
    ctx.logger.warn(`${errorMessage(error)}; continuing without probe information`);
    return undefined;
  }
}

async function runFfmpeg(ctx: ExecutionContext, output: string): Promise<void> {
  const info = await probeSource(ctx);
  const mode = decideFfmpegMode(ctx.plan, info);
  ctx.logger.debug(`ffmpeg mode for ${ctx.plan.source}: ${mode}`);

  await runTool(
    {
      name: "ffmpeg",
      candidates: [ctx.tools.ffmpeg],
      args: ffmpegArgs(ctx.plan, mode, output),
      installHint: "install it (e.g., apt install ffmpeg)",
    },
    {
      sink: ctx.sink,
      label: ctx.label,
      pollInterval: ctx.pollInterval,
      progress: { durationSeconds: info?.durationSeconds },
    },
  );
}

async function runLibreOffice(
  ctx: ExecutionContext,
  tempDir: string,
  output: string,
): Promise<void> {
  if (ctx.plan.destExt !== "pdf") {
    throw new PreconditionError("convert", "LibreOffice conversions only support PDF output");
  }

  await runTool(
    {
      name: "LibreOffice",
      candidates: [ctx.tools.soffice],
      args: sofficeArgs(ctx.plan, tempDir),
      installHint: "install libreoffice (e.g., apt install libreoffice)",
    },
    { sink: ctx.sink, label: ctx.label, pollInterval: ctx.pollInterval },
  );

  // soffice names its output after the source stem
  const produced = path.join(tempDir, `${path.parse(ctx.plan.source).name}.pdf`);
  if (produced === output) return;
  if (!(await fileExists(produced))) throw new OutputEmptyError();
  await step("convert", "failed to collect LibreOffice output", () => rename(produced, output));
}

async function convert(ctx: ExecutionContext): Promise<void> {
  const { plan } = ctx;
  if (plan.backend === undefined) {
    throw new PreconditionError("convert", "no backend available for this conversion");
  }

  const parent = path.dirname(plan.destination);
  const tempDir = await step("convert", "failed to create temp directory", () =>
    mkdtemp(path.join(parent, TEMP_PREFIX)),
  );

  try {
    const output = tempOutputPath(tempDir, plan.destination);

    switch (plan.backend) {
      case "imagemagick":
        await runImageMagick(ctx, output);
        break;
      case "ffmpeg":
        await runFfmpeg(ctx, output);
        break;
      case "libreoffice":
        await runLibreOffice(ctx, tempDir, output);
        break;
    }

    await ensureNonEmpty(output);
    await step("finalize", "failed to finalize destination", () =>
      rename(output, plan.destination),
    );
  } finally {
    await removeTemp(ctx, tempDir);
  }

  // Last step: the source survives any earlier failure
  if (plan.moveSource) {
    await step("remove-source", "failed to remove source", () => rm(plan.source));
  }
}

function createContext(plan: Plan, options: ExecuteOptions): ExecutionContext {
  const { tools } = options;
  return {
    plan,
    overwrite: options.overwrite,
    sink: options.sink ?? new SilentSink(),
    tools,
    pollInterval: options.pollInterval ?? 150,
    logger: options.logger ?? new Logger("warn"),
    probe: options.probe ?? ((source) => probeMedia(source, tools.ffprobe)),
    label: plan.source,
  };
}

/**
 * Execute a plan
 * Emits exactly one `started` and one `finished` event, whatever happens in between
 *
 * @throws ConversionError naming the failing step
 */
export async function executePlan(plan: Plan, options: ExecuteOptions): Promise<void> {
  const ctx = createContext(plan, options);
  ctx.sink.started(ctx.label);

  try {
    await prepareDestination(ctx);
    switch (plan.strategy) {
      case "rename":
        await renameOnly(ctx);
        break;
      case "copy":
        await copyOnly(ctx);
        break;
      case "convert":
        await convert(ctx);
        break;
    }
  } catch (error) {
    ctx.sink.finished(ctx.label, false, errorMessage(error));
    if (error instanceof ConversionError) throw error;
    throw new ConversionError("io", "convert", errorMessage(error), { cause: error });
  }

  ctx.sink.finished(ctx.label, true, "ok");
}

export function executeOptionsFromConfig(
  config: AppConfig,
  overwrite: boolean,
  sink: ProgressSink,
  logger: Logger,
): ExecuteOptions {
  return {
    overwrite,
    sink,
    tools: config.tools,
    pollInterval: config.progress.pollInterval,
    logger,
  };
}
