/**
 * Convert command - Loads config, builds plans and runs them (single or batch)
 */

import { text } from "node:stream/consumers";
import { z } from "zod";
import * as modules from "../../modules";
import { ConsoleSink, SilentSink } from "../../sinks";
import type {
  AppConfig,
  BatchItem,
  BatchResult,
  ConversionOptions,
  Plan,
  Profile,
  ProgressEvent,
} from "../../types";
import {
  EventChannel,
  Logger,
  Tracker,
  errorMessage,
  loadConfig,
  resolveOptions,
} from "../../utils";

const ConvertOptionsSchema = z.object({
  plan: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  overwrite: z.boolean().optional(),
  backup: z.boolean().optional(),
  moveSource: z.boolean().optional(),
  json: z.boolean().optional(),
  batch: z.boolean().optional(),
  destDir: z.string().optional(),
  input: z.array(z.string()).optional(),
  stdin: z.boolean().optional(),
  recursive: z.boolean().optional(),
  toExt: z.string().optional(),
  interactive: z.boolean().optional(),
  config: z.string().optional(),
  profile: z.string().optional(),
  imageQuality: z.coerce.number().int().optional(),
  videoBitrate: z.string().optional(),
  audioBitrate: z.string().optional(),
  preset: z.string().optional(),
  videoCodec: z.string().optional(),
  audioCodec: z.string().optional(),
  streamCopy: z.boolean().optional(),
  transcode: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;

interface RunContext {
  options: ConvertOptions;
  config: AppConfig;
  conversion: ConversionOptions;
  logger: Logger;
  planOnly: boolean;
}

/**
 * Flag combinations that can never work together
 */
export function checkExclusiveFlags(options: ConvertOptions): void {
  if (options.streamCopy && options.transcode) {
    throw new Error("--stream-copy and --transcode are mutually exclusive");
  }
  if (options.overwrite && options.backup) {
    throw new Error("--overwrite and --backup are mutually exclusive");
  }
  if (options.destDir !== undefined && !options.batch) {
    throw new Error("--dest-dir requires --batch");
  }
  if (options.interactive && options.json) {
    throw new Error("--interactive cannot be combined with --json");
  }
}

/**
 * CLI flags that override config defaults and the selected profile
 */
export function cliOverrides(options: ConvertOptions): Profile {
  return {
    imageQuality: options.imageQuality,
    videoBitrate: options.videoBitrate,
    audioBitrate: options.audioBitrate,
    preset: options.preset,
    videoCodec: options.videoCodec,
    audioCodec: options.audioCodec,
    ffmpegPreference: options.streamCopy
      ? "stream-copy"
      : options.transcode
        ? "transcode"
        : undefined,
  };
}

async function readStdinLines(): Promise<string[]> {
  const input = await text(process.stdin);
  return input
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// ============================================================================
// Single Mode
// ============================================================================

async function runSingle(ctx: RunContext, source: string, destination: string): Promise<void> {
  const { options, config, logger } = ctx;

  const plan = await modules.buildPlan(
    {
      source,
      destination,
      moveSource: options.moveSource ?? false,
      backup: options.backup ?? false,
      options: ctx.conversion,
    },
    config.tools.file,
  );
  const overwrite = options.overwrite ?? false;

  if (ctx.planOnly) {
    console.log(
      options.json
        ? modules.renderPlanJson(plan, overwrite, config.tools)
        : modules.renderPlan(plan, overwrite, config.tools),
    );
    return;
  }

  logger.debug(`Executing ${plan.strategy} ${plan.source} -> ${plan.destination}`);
  if (options.json) {
    await modules.executePlan(
      plan,
      modules.executeOptionsFromConfig(config, overwrite, new SilentSink(), logger),
    );
    printJson({ status: "ok", source: plan.source, destination: plan.destination });
    return;
  }

  try {
    await modules.executePlan(
      plan,
      modules.executeOptionsFromConfig(config, overwrite, new ConsoleSink(), logger),
    );
  } catch (error) {
    // The console sink has already printed the failure line
    logger.debug(`Execution failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

// ============================================================================
// Batch Mode
// ============================================================================

async function batchItems(ctx: RunContext, source?: string): Promise<BatchItem[]> {
  const { options } = ctx;
  if (!options.destDir) {
    throw new Error("batch mode requires --dest-dir");
  }
  const destDir = options.destDir;

  const inputs = [...(source ? [source] : []), ...(options.input ?? [])];
  const stdinSources = options.stdin ? await readStdinLines() : [];
  const sources = await modules.collectSources(inputs, stdinSources, options.recursive ?? false);
  if (sources.length === 0) {
    throw new Error("no inputs provided for batch mode");
  }

  return sources.map((file) => ({
    source: file,
    destination: modules.destForSource(destDir, file, options.toExt),
  }));
}

async function runItems(ctx: RunContext, items: BatchItem[]): Promise<void> {
  const { options, config, logger } = ctx;
  const overwrite = options.overwrite ?? false;
  const tracker = new Tracker();
  const plans: modules.PlanReport[] = [];

  const onPlan = ctx.planOnly
    ? (plan: Plan): void => {
        if (options.json) {
          plans.push(modules.planReport(plan, overwrite, config.tools));
        } else {
          console.log("---");
          console.log(modules.renderPlan(plan, overwrite, config.tools));
        }
      }
    : undefined;

  const sink = options.json || ctx.planOnly ? new SilentSink() : new ConsoleSink();
  const batchOptions: modules.BatchOptions = {
    moveSource: options.moveSource ?? false,
    backup: options.backup ?? false,
    options: ctx.conversion,
    execute: modules.executeOptionsFromConfig(config, overwrite, sink, logger),
    fileCommand: config.tools.file,
    onPlan,
    tracker,
  };

  logger.debug(`Batch of ${items.length} item(s)`);

  let result: BatchResult;
  if (options.interactive && !ctx.planOnly) {
    const channel = new EventChannel<ProgressEvent>();
    const board = new modules.TaskBoard(items);
    const [, batchResult] = await Promise.all([
      modules.observeBatch(channel, board, { tickInterval: config.progress.tickInterval }),
      modules.startBatchWorker(items, batchOptions, channel),
    ]);
    result = batchResult;
  } else {
    result = await modules.runBatch(items, batchOptions);
  }

  if (options.json) {
    printJson({
      status: result.failed === 0 ? "ok" : "failed",
      ...modules.summaryJson(result),
      ...(ctx.planOnly ? { plans } : {}),
    });
  } else {
    modules.displaySummary(tracker.getStats(), options.verbose);
  }

  if (result.failed > 0) {
    process.exitCode = 1;
  }
}

// ============================================================================
// Entry
// ============================================================================

export async function convertCommand(
  source: string | undefined,
  destination: string | undefined,
  opts: unknown,
): Promise<void> {
  let logger = new Logger("info");

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);
    checkExclusiveFlags(options);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);
    logger = new Logger(options.verbose ? "debug" : config.logging.level);
    for (const err of errors) {
      logger.warn(`Ignoring config ${err.path}: ${errorMessage(err.error)}`);
    }

    const ctx: RunContext = {
      options,
      config,
      conversion: resolveOptions(config, options.profile, cliOverrides(options)),
      logger,
      planOnly: Boolean(options.plan || options.dryRun),
    };

    if (options.batch) {
      await runItems(ctx, await batchItems(ctx, source));
      return;
    }

    if (!source || !destination) {
      throw new Error("source and destination are required (or pass --batch)");
    }

    if (options.interactive && !ctx.planOnly) {
      await runItems(ctx, [{ source, destination }]);
      return;
    }

    await runSingle(ctx, source, destination);
  } catch (error) {
    logger.error(errorMessage(error), error instanceof Error ? error : undefined);
    process.exitCode = 1;
  }
}
