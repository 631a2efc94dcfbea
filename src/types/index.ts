/**
 * Central type exports
 */

// Plan
export type {
  Strategy,
  Backend,
  MediaKind,
  FfmpegPreference,
  FfmpegMode,
  ConversionOptions,
  DetectedType,
  PlanInput,
  Plan,
  MediaInfo,
} from "./plan";
export { defaultConversionOptions } from "./plan";

// Progress
export type { ProgressEvent, ProgressSink } from "./progress";

// Batch
export type { BatchItem, BatchEntry, BatchResult } from "./batch";

// Configuration
export type {
  AppConfig,
  PartialAppConfig,
  Profile,
  ToolsConfig,
  ProgressConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  AppConfigSchema,
  PartialAppConfigSchema,
  ProfileSchema,
  FfmpegPreferenceSchema,
} from "./config";
