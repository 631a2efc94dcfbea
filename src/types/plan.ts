/**
 * Plan type definitions
 */

export type Strategy = "rename" | "copy" | "convert";

export type Backend = "imagemagick" | "ffmpeg" | "libreoffice";

export type MediaKind = "image" | "audio" | "video" | "document" | "other";

// What the user asked for; "auto" lets the mode decider look at probe results
export type FfmpegPreference = "auto" | "stream-copy" | "transcode";

// What actually runs
export type FfmpegMode = "stream-copy" | "transcode";

export interface ConversionOptions {
  imageQuality?: number; // 1-100
  videoBitrate?: string; // e.g. "2500k"
  audioBitrate?: string; // e.g. "192k"
  preset?: string; // x264-style preset name
  videoCodec?: string;
  audioCodec?: string;
  ffmpegPreference: FfmpegPreference;
}

/**
 * Best-effort classification of the source file
 * Advisory only: strategy and backend selection never read it
 */
export interface DetectedType {
  mime?: string; // Sniffed from the leading bytes
  extHint?: string; // Lowercased extension, not aliased
  systemMime?: string; // From `file --mime-type`, when available
}

export interface PlanInput {
  source: string;
  destination: string;
  moveSource: boolean;
  backup: boolean;
  options: ConversionOptions;
}

export interface Plan {
  readonly source: string;
  readonly destination: string;
  readonly detected: DetectedType;
  readonly strategy: Strategy;
  readonly backend?: Backend;
  readonly notes: readonly string[];
  readonly moveSource: boolean;
  readonly backup: boolean;
  readonly options: Readonly<ConversionOptions>;
  readonly destExt?: string; // Normalized (lowercase, aliased)
  readonly destKind: MediaKind;
}

/**
 * Probed from the source at execution time, never persisted
 */
export interface MediaInfo {
  durationSeconds?: number;
  videoCodec?: string;
  audioCodec?: string;
}

export function defaultConversionOptions(): ConversionOptions {
  return { ffmpegPreference: "auto" };
}
