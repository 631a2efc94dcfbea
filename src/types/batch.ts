/**
 * Batch execution type definitions
 */

export interface BatchItem {
  source: string;
  destination: string;
}

export interface BatchEntry {
  source: string;
  destination: string;
  ok: boolean;
  error?: string;
}

export interface BatchResult {
  total: number;
  succeeded: number;
  failed: number;
  // Same order as the input items
  entries: BatchEntry[];
}
