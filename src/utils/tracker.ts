/**
 * Batch Tracker
 * Aggregate counts and failure details, updated only by the batch worker
 */

import { ZodError } from "zod";
import { ConversionError, type ErrorKind, type ExecutionStep } from "./errors";

export type FailureReason = ErrorKind | "unknown";

export interface FailureIssue {
  source: string;
  destination?: string;
  reason: FailureReason;
  step?: ExecutionStep;
  details: string;
}

export interface BatchStats {
  total: number;
  succeeded: number;
  failed: number;
  issues: FailureIssue[];
  duration: number; // ms
}

interface IssueInfo {
  reason: FailureReason;
  step?: ExecutionStep;
  details: string;
}

function mapError(error: unknown): IssueInfo {
  if (error instanceof ConversionError) {
    return { reason: error.kind, step: error.step, details: error.message };
  }
  if (error instanceof ZodError) {
    return {
      reason: "validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof Error) {
    return { reason: "unknown", details: error.message };
  }
  return { reason: "unknown", details: String(error) };
}

export class Tracker {
  private total = 0;
  private succeeded = 0;
  private failed = 0;
  private issues: FailureIssue[] = [];
  private startTime = new Date();

  setTotal(count: number): void {
    this.total = count;
  }

  incrementSucceeded(): void {
    this.succeeded++;
  }

  trackFailure(source: string, error: unknown, destination?: string): void {
    this.failed++;
    this.issues.push({ source, destination, ...mapError(error) });
  }

  getIssues(reason?: FailureReason): FailureIssue[] {
    if (!reason) return this.issues;
    return this.issues.filter((issue) => issue.reason === reason);
  }

  getStats(): BatchStats {
    return {
      total: this.total,
      succeeded: this.succeeded,
      failed: this.failed,
      issues: this.issues,
      duration: Date.now() - this.startTime.getTime(),
    };
  }
}
