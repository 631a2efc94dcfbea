/**
 * Mode Decider
 * Chooses between stream copy and transcode for ffmpeg conversions
 */

import type { FfmpegMode, MediaInfo, Plan } from "../types";

const MP4_VIDEO = new Set(["h264", "hevc", "mpeg4", "av1"]);
const MP4_AUDIO = new Set(["aac", "mp3", "alac"]);
const WEBM_VIDEO = new Set(["vp8", "vp9", "av1"]);
const WEBM_AUDIO = new Set(["opus", "vorbis"]);

function compatible(
  info: MediaInfo & { videoCodec: string },
  video: Set<string>,
  audio: Set<string>,
): boolean {
  const audioOk = info.audioCodec === undefined || audio.has(info.audioCodec);
  return video.has(info.videoCodec) && audioOk;
}

/**
 * Without probe information the answer is always transcode
 */
export function decideFfmpegMode(
  plan: Pick<Plan, "options" | "destKind" | "destExt">,
  info: MediaInfo | undefined,
): FfmpegMode {
  const preference = plan.options.ffmpegPreference;
  if (preference !== "auto") return preference;

  // Audio containers are too picky about what they accept
  if (plan.destKind === "audio") return "transcode";

  if (plan.destExt === undefined || info === undefined) return "transcode";
  const { videoCodec } = info;
  if (videoCodec === undefined) return "transcode";

  switch (plan.destExt) {
    case "mkv":
      return "stream-copy";
    case "mp4":
    case "mov":
      return compatible({ ...info, videoCodec }, MP4_VIDEO, MP4_AUDIO)
        ? "stream-copy"
        : "transcode";
    case "webm":
      return compatible({ ...info, videoCodec }, WEBM_VIDEO, WEBM_AUDIO)
        ? "stream-copy"
        : "transcode";
    default:
      return "transcode";
  }
}
