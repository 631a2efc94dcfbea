/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const FfmpegPreferenceSchema = z.enum(["auto", "stream-copy", "transcode"]);

// Config files may spell the preference with an underscore
const PreferenceInputSchema = z
  .string()
  .transform((value) => value.toLowerCase().replace("_", "-"))
  .pipe(FfmpegPreferenceSchema);

export const ProfileSchema = z.object({
  imageQuality: z.number().int().optional(),
  videoBitrate: z.string().optional(),
  audioBitrate: z.string().optional(),
  preset: z.string().optional(),
  videoCodec: z.string().optional(),
  audioCodec: z.string().optional(),
  ffmpegPreference: PreferenceInputSchema.optional(),
});

export const ToolsConfigSchema = z.object({
  // Tried in order; the next one is used only when the executable is missing
  magick: z.array(z.string().min(1)).min(1),
  ffmpeg: z.string().min(1),
  ffprobe: z.string().min(1),
  soffice: z.string().min(1),
  file: z.string().min(1),
});

export const ProgressConfigSchema = z.object({
  pollInterval: z.number().int().positive(), // Liveness poll (ms)
  tickInterval: z.number().int().positive(), // Dashboard redraw (ms)
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const AppConfigSchema = z.object({
  defaults: ProfileSchema,
  profiles: z.record(z.string(), ProfileSchema),
  tools: ToolsConfigSchema,
  progress: ProgressConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = AppConfigSchema.partial().extend({
  tools: ToolsConfigSchema.partial().optional(),
  progress: ProgressConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type Profile = z.infer<typeof ProfileSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type ProgressConfig = z.infer<typeof ProgressConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;
