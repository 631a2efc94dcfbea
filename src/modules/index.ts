/**
 * Modules barrel
 */

export { detectPath } from "./detector";
export { buildPlan, createPlan, validateOptions, PRESETS } from "./planner";
export { decideFfmpegMode } from "./mode-decider";
export { probeMedia } from "./prober";
export { commandPreview } from "./commands";
export { executePlan, executeOptionsFromConfig, TEMP_PREFIX } from "./executor";
export type { ExecuteOptions } from "./executor";
export { planReport, renderPlan, renderPlanJson } from "./report";
export type { PlanReport } from "./report";
export { collectSources, destForSource, runBatch, startBatchWorker } from "./batch";
export type { BatchOptions } from "./batch";
export { TaskBoard, observeBatch, renderBoard } from "./dashboard";
export { displaySummary, summaryJson, summaryLine } from "./stats";
