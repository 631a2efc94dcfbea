/**
 * Plan Reports
 * Human-readable and structured views of the same plan
 */

import type { Plan, ToolsConfig } from "../types";
import { commandPreview } from "./commands";

export interface PlanReport {
  source: string;
  destination: string;
  detectedMime: string | null;
  detectedExtension: string | null;
  systemMime: string | null;
  strategy: Plan["strategy"];
  backend: Plan["backend"] | null;
  destinationKind: Plan["destKind"];
  destinationExtension: string | null;
  overwrite: boolean;
  backup: boolean;
  options: {
    imageQuality: number | null;
    videoBitrate: string | null;
    audioBitrate: string | null;
    preset: string | null;
    videoCodec: string | null;
    audioCodec: string | null;
    ffmpegMode: Plan["options"]["ffmpegPreference"];
  };
  notes: string[];
  commandPreview: string | null;
}

export function planReport(plan: Plan, overwrite: boolean, tools: ToolsConfig): PlanReport {
  const { options } = plan;
  return {
    source: plan.source,
    destination: plan.destination,
    detectedMime: plan.detected.mime ?? null,
    detectedExtension: plan.detected.extHint ?? null,
    systemMime: plan.detected.systemMime ?? null,
    strategy: plan.strategy,
    backend: plan.backend ?? null,
    destinationKind: plan.destKind,
    destinationExtension: plan.destExt ?? null,
    overwrite,
    backup: plan.backup,
    options: {
      imageQuality: options.imageQuality ?? null,
      videoBitrate: options.videoBitrate ?? null,
      audioBitrate: options.audioBitrate ?? null,
      preset: options.preset ?? null,
      videoCodec: options.videoCodec ?? null,
      audioCodec: options.audioCodec ?? null,
      ffmpegMode: options.ffmpegPreference,
    },
    notes: [...plan.notes],
    commandPreview: commandPreview(plan, tools) ?? null,
  };
}

export function renderPlanJson(plan: Plan, overwrite: boolean, tools: ToolsConfig): string {
  return JSON.stringify(planReport(plan, overwrite, tools), null, 2);
}

const yesNo = (value: boolean): string => (value ? "yes" : "no");

/**
 * Multi-line text report; options left at their defaults are omitted
 */
export function renderPlan(plan: Plan, overwrite: boolean, tools: ToolsConfig): string {
  const report = planReport(plan, overwrite, tools);
  const lines: string[] = [];

  lines.push(`Source: ${report.source}`);
  lines.push(`Destination: ${report.destination}`);
  lines.push(`Detected: ${report.detectedMime ?? "unknown"}`);
  if (report.systemMime) lines.push(`Detected (system): ${report.systemMime}`);
  if (report.detectedExtension) lines.push(`Detected extension: ${report.detectedExtension}`);
  lines.push(`Strategy: ${report.strategy}`);
  if (report.destinationExtension) {
    lines.push(`Destination extension: ${report.destinationExtension}`);
  }
  if (report.backend) lines.push(`Backend: ${report.backend}`);
  lines.push(`Destination kind: ${report.destinationKind}`);

  const { options } = report;
  if (options.imageQuality !== null) lines.push(`Image quality: ${options.imageQuality}`);
  if (options.videoBitrate !== null) lines.push(`Video bitrate: ${options.videoBitrate}`);
  if (options.audioBitrate !== null) lines.push(`Audio bitrate: ${options.audioBitrate}`);
  if (options.preset !== null) lines.push(`Preset: ${options.preset}`);
  if (options.videoCodec !== null) lines.push(`Video codec: ${options.videoCodec}`);
  if (options.audioCodec !== null) lines.push(`Audio codec: ${options.audioCodec}`);
  if (report.backend === "ffmpeg" || options.ffmpegMode !== "auto") {
    lines.push(`FFmpeg mode: ${options.ffmpegMode}`);
  }

  if (report.commandPreview) lines.push(`Command preview: ${report.commandPreview}`);
  lines.push(`Overwrite: ${yesNo(report.overwrite)}`);
  lines.push(`Backup: ${yesNo(report.backup)}`);
  for (const note of report.notes) {
    lines.push(`Note: ${note}`);
  }

  return lines.join("\n");
}
