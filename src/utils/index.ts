/**
 * Utilities barrel export
 */

// Configuration
export { loadConfig, loadDefaultConfig, mergeConfig, getUserConfigPath } from "./load-config";
export type { ConfigError } from "./load-config";
export { resolveOptions } from "./resolve-options";

// Errors
export {
  ConversionError,
  ValidationError,
  PreconditionError,
  ToolMissingError,
  ToolFailureError,
  OutputEmptyError,
  ProbeError,
  ExecutionError,
  errorMessage,
} from "./errors";
export type { ErrorKind, ExecutionStep } from "./errors";

// File system & processes
export { fileExists } from "./file-exists";
export { captureCommand } from "./capture-command";

// Classes
export { EventChannel } from "./event-channel";
export { Logger } from "./logger";
export { Tracker } from "./tracker";
export type { BatchStats, FailureIssue, FailureReason } from "./tracker";
