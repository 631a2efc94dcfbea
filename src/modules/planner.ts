/**
 * Planner
 * Turns a source/destination pair and options into an immutable Plan
 */

import path from "node:path";
import type {
  Backend,
  ConversionOptions,
  DetectedType,
  MediaKind,
  Plan,
  PlanInput,
  Strategy,
} from "../types";
import { ValidationError } from "../utils/errors";
import {
  classifyDestKind,
  isImageExt,
  isPdfImagePair,
  normalizeExtension,
  selectBackend,
} from "../utils/extensions";
import { detectPath } from "./detector";

export const PRESETS = [
  "ultrafast",
  "superfast",
  "veryfast",
  "faster",
  "fast",
  "medium",
  "slow",
  "slower",
  "veryslow",
] as const;

const BITRATE_PATTERN = /^\d+[kKmM]?$/;

export function isValidBitrate(bitrate: string): boolean {
  return BITRATE_PATTERN.test(bitrate);
}

/**
 * Reject options no backend could honour
 *
 * @throws ValidationError on the first violation
 */
export function validateOptions(options: ConversionOptions): void {
  const { imageQuality, videoBitrate, audioBitrate, preset, videoCodec, audioCodec } = options;

  if (
    imageQuality !== undefined &&
    (!Number.isInteger(imageQuality) || imageQuality < 1 || imageQuality > 100)
  ) {
    throw new ValidationError("image quality must be between 1 and 100");
  }
  if (videoBitrate !== undefined && !isValidBitrate(videoBitrate)) {
    throw new ValidationError(
      `invalid video bitrate "${videoBitrate}": must be numeric with optional k/m suffix`,
    );
  }
  if (audioBitrate !== undefined && !isValidBitrate(audioBitrate)) {
    throw new ValidationError(
      `invalid audio bitrate "${audioBitrate}": must be numeric with optional k/m suffix`,
    );
  }
  if (preset !== undefined && !(PRESETS as readonly string[]).includes(preset.toLowerCase())) {
    throw new ValidationError(`preset must be one of: ${PRESETS.join(", ")}`);
  }
  if (videoCodec !== undefined && videoCodec.trim() === "") {
    throw new ValidationError("video codec must be a non-empty string");
  }
  if (audioCodec !== undefined && audioCodec.trim() === "") {
    throw new ValidationError("audio codec must be a non-empty string");
  }
}

function hasMediaOptions(options: ConversionOptions): boolean {
  return (
    options.imageQuality !== undefined ||
    options.videoBitrate !== undefined ||
    options.audioBitrate !== undefined ||
    options.preset !== undefined ||
    options.videoCodec !== undefined ||
    options.audioCodec !== undefined
  );
}

/**
 * Notes for options that will have no effect on this destination
 */
export function optionNotes(
  options: ConversionOptions,
  destKind: MediaKind,
  backend: Backend | undefined,
  sourceExt: string | undefined,
  destExt: string | undefined,
): string[] {
  const notes: string[] = [];

  if (destKind !== "image" && options.imageQuality !== undefined) {
    notes.push("image quality ignored for non-image output");
  }
  if (
    destKind === "document" &&
    !isPdfImagePair(sourceExt, destExt) &&
    hasMediaOptions(options)
  ) {
    notes.push("media options ignored for document conversions");
  }
  if (destKind === "audio") {
    if (options.videoBitrate !== undefined) {
      notes.push("video bitrate ignored for audio-only output");
    }
    if (options.preset !== undefined) {
      notes.push("preset ignored for audio-only output");
    }
    if (options.videoCodec !== undefined) {
      notes.push("video codec ignored for audio-only output");
    }
  }
  if (destKind === "image") {
    if (options.videoBitrate !== undefined) {
      notes.push("video bitrate ignored for image output");
    }
    if (options.audioBitrate !== undefined) {
      notes.push("audio bitrate ignored for image output");
    }
    if (options.videoCodec !== undefined) {
      notes.push("video codec ignored for image output");
    }
    if (options.audioCodec !== undefined) {
      notes.push("audio codec ignored for image output");
    }
  }
  if (backend !== "ffmpeg" && options.ffmpegPreference !== "auto") {
    notes.push("ffmpeg mode preference ignored for non-ffmpeg backend");
  }
  if (options.ffmpegPreference === "stream-copy") {
    if (options.videoBitrate !== undefined) {
      notes.push("video bitrate ignored when stream copy is forced");
    }
    if (options.audioBitrate !== undefined) {
      notes.push("audio bitrate ignored when stream copy is forced");
    }
    if (options.preset !== undefined) {
      notes.push("preset ignored when stream copy is forced");
    }
    if (options.videoCodec !== undefined) {
      notes.push("video codec ignored when stream copy is forced");
    }
    if (options.audioCodec !== undefined) {
      notes.push("audio codec ignored when stream copy is forced");
    }
  }

  return notes;
}

export function selectStrategy(
  sourceExt: string | undefined,
  destExt: string | undefined,
  moveSource: boolean,
): Strategy {
  if (sourceExt !== undefined && sourceExt === destExt) {
    return moveSource ? "rename" : "copy";
  }
  return "convert";
}

/**
 * Build a plan from already-detected type information
 * Pure and synchronous; the only failures are ValidationErrors
 */
export function createPlan(input: PlanInput, detected: DetectedType): Plan {
  const { source, destination, moveSource, backup } = input;

  if (path.resolve(source) === path.resolve(destination)) {
    throw new ValidationError("source and destination must differ");
  }

  const options: ConversionOptions = { ...input.options };
  validateOptions(options);

  const sourceExt = normalizeExtension(source);
  const destExt = normalizeExtension(destination);
  const destKind = classifyDestKind(destExt);
  const strategy = selectStrategy(sourceExt, destExt, moveSource);
  const backend = strategy === "convert" ? selectBackend(sourceExt, destExt) : undefined;

  const notes: string[] = [];
  if (strategy === "convert") {
    if (backend === undefined) {
      notes.push("no supported backend found for this conversion");
    }
    if (backend === "ffmpeg") {
      notes.push("ffprobe may be used at runtime to choose stream copy vs transcode");
    }
    if (sourceExt === "pdf" && isImageExt(destExt)) {
      notes.push("PDF to image converts the first page only");
    }
  }
  if (!moveSource) {
    notes.push("source will be kept");
  }
  notes.push(...optionNotes(options, destKind, backend, sourceExt, destExt));

  return Object.freeze({
    source,
    destination,
    detected: Object.freeze({ ...detected }),
    strategy,
    backend,
    notes: Object.freeze(notes),
    moveSource,
    backup,
    options: Object.freeze(options),
    destExt,
    destKind,
  });
}

/**
 * Detect the source type, then build the plan
 *
 * @param fileCommand - `file` executable for system MIME sniffing, or null to skip it
 */
export async function buildPlan(
  input: PlanInput,
  fileCommand: string | null = "file",
): Promise<Plan> {
  const detected = await detectPath(input.source, fileCommand);
  return createPlan(input, detected);
}
