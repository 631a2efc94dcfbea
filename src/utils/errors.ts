/**
 * Conversion errors
 * One class per failure kind; every per-plan failure names the step it happened in
 */

export type ErrorKind =
  | "validation"
  | "precondition"
  | "tool-missing"
  | "tool-failure"
  | "output-empty"
  | "probe"
  | "io";

export type ExecutionStep =
  | "plan"
  | "prepare"
  | "backup"
  | "rename"
  | "copy"
  | "convert"
  | "verify"
  | "finalize"
  | "remove-source";

export class ConversionError extends Error {
  readonly kind: ErrorKind;
  readonly step: ExecutionStep;

  constructor(
    kind: ErrorKind,
    step: ExecutionStep,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConversionError";
    this.kind = kind;
    this.step = step;
  }
}

/**
 * Bad option or source == destination; the plan is never produced
 */
export class ValidationError extends ConversionError {
  constructor(message: string) {
    super("validation", "plan", message);
    this.name = "ValidationError";
  }
}

export class PreconditionError extends ConversionError {
  constructor(step: ExecutionStep, message: string, options?: { cause?: unknown }) {
    super("precondition", step, message, options);
    this.name = "PreconditionError";
  }
}

export class ToolMissingError extends ConversionError {
  readonly tool: string;
  readonly hint: string;

  constructor(tool: string, hint: string) {
    super("tool-missing", "convert", `${tool} not found; ${hint}`);
    this.name = "ToolMissingError";
    this.tool = tool;
    this.hint = hint;
  }
}

export class ToolFailureError extends ConversionError {
  readonly tool: string;
  readonly status: string;

  constructor(tool: string, status: string) {
    super("tool-failure", "convert", `${tool} exited with status ${status}`);
    this.name = "ToolFailureError";
    this.tool = tool;
    this.status = status;
  }
}

export class OutputEmptyError extends ConversionError {
  constructor() {
    super("output-empty", "verify", "output file is empty");
    this.name = "OutputEmptyError";
  }
}

/**
 * Never fatal: downgrades the mode decider to transcode
 */
export class ProbeError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("probe", "convert", message, options);
    this.name = "ProbeError";
  }
}

/**
 * Filesystem failure inside an execution step
 */
export class ExecutionError extends ConversionError {
  constructor(step: ExecutionStep, message: string, cause: unknown) {
    const details = cause instanceof Error ? cause.message : String(cause);
    super("io", step, `${message}: ${details}`, { cause });
    this.name = "ExecutionError";
  }
}

/**
 * Run a filesystem step, wrapping any failure with the step name
 */
export async function step<T>(
  name: ExecutionStep,
  message: string,
  action: () => Promise<T>,
): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof ConversionError) throw error;
    throw new ExecutionError(name, message, error);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
