/**
 * Command Builder
 * The one place backend argument lists are built; plan previews and the executor both call it
 */

import type { FfmpegMode, MediaKind, Plan, ToolsConfig } from "../types";
import { normalizeExtension } from "../utils/extensions";

export function defaultVideoCodec(destExt: string | undefined): string | undefined {
  switch (destExt) {
    case "mp4":
    case "mov":
    case "mkv":
    case "avi":
      return "libx264";
    case "webm":
      return "libvpx-vp9";
    default:
      return undefined;
  }
}

export function defaultAudioCodec(
  destExt: string | undefined,
  destKind: MediaKind,
): string | undefined {
  if (destKind === "audio") {
    switch (destExt) {
      case "mp3":
        return "libmp3lame";
      case "flac":
        return "flac";
      case "wav":
        return "pcm_s16le";
      case "opus":
        return "libopus";
      case "ogg":
        return "libvorbis";
      case "m4a":
      case "aac":
        return "aac";
      default:
        return undefined;
    }
  }

  switch (destExt) {
    case "mp4":
    case "mov":
    case "mkv":
    case "avi":
      return "aac";
    case "webm":
      return "libopus";
    default:
      return undefined;
  }
}

/**
 * True when a PDF source should be rasterized to its first page only
 */
export function selectsFirstPage(plan: Plan): boolean {
  return normalizeExtension(plan.source) === "pdf" && plan.destExt !== "pdf";
}

export function magickArgs(plan: Plan, output: string): string[] {
  const args = [selectsFirstPage(plan) ? `${plan.source}[0]` : plan.source];
  if (plan.options.imageQuality !== undefined) {
    args.push("-quality", String(plan.options.imageQuality));
  }
  args.push(output);
  return args;
}

function audioArgs(plan: Plan): string[] {
  const args: string[] = [];
  const codec = plan.options.audioCodec ?? defaultAudioCodec(plan.destExt, plan.destKind);
  if (codec) args.push("-c:a", codec);
  if (plan.options.audioBitrate) args.push("-b:a", plan.options.audioBitrate);
  return args;
}

/**
 * Codec, bitrate and preset flags for a re-encode
 */
export function transcodeArgs(plan: Plan): string[] {
  const { options } = plan;

  if (plan.destKind === "video") {
    const args: string[] = [];
    const codec = options.videoCodec ?? defaultVideoCodec(plan.destExt);
    if (codec) args.push("-c:v", codec);
    if (options.videoBitrate) args.push("-b:v", options.videoBitrate);
    if (options.preset) args.push("-preset", options.preset);
    return [...args, ...audioArgs(plan)];
  }

  if (plan.destKind === "audio") {
    return audioArgs(plan);
  }

  return [];
}

export function ffmpegArgs(plan: Plan, mode: FfmpegMode, output: string): string[] {
  return [
    "-nostdin",
    "-y",
    "-hide_banner",
    "-nostats",
    "-loglevel",
    "error",
    "-i",
    plan.source,
    ...(mode === "stream-copy" ? ["-c", "copy"] : transcodeArgs(plan)),
    "-progress",
    "pipe:1",
    output,
  ];
}

export function sofficeArgs(plan: Plan, outDir: string): string[] {
  return ["--headless", "--convert-to", "pdf", "--outdir", outDir, plan.source];
}

// Placeholder shown in previews for the per-plan temp directory
export const TEMP_DIR_PLACEHOLDER = "<temp>";

function quoteArg(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

export function formatCommand(tool: string, args: string[]): string {
  return [tool, ...args].map(quoteArg).join(" ");
}

/**
 * Printable form of the command(s) the executor will run for this plan
 * With the "auto" ffmpeg preference both candidate invocations are shown
 */
export function commandPreview(plan: Plan, tools: ToolsConfig): string | undefined {
  switch (plan.backend) {
    case "imagemagick":
      return formatCommand(tools.magick[0], magickArgs(plan, plan.destination));
    case "ffmpeg": {
      const preference = plan.options.ffmpegPreference;
      if (preference !== "auto") {
        return formatCommand(tools.ffmpeg, ffmpegArgs(plan, preference, plan.destination));
      }
      const copy = formatCommand(
        tools.ffmpeg,
        ffmpegArgs(plan, "stream-copy", plan.destination),
      );
      const transcode = formatCommand(
        tools.ffmpeg,
        ffmpegArgs(plan, "transcode", plan.destination),
      );
      return `${copy} (if compatible), else ${transcode}`;
    }
    case "libreoffice":
      return formatCommand(tools.soffice, sofficeArgs(plan, TEMP_DIR_PLACEHOLDER));
    default:
      return undefined;
  }
}
