/**
 * Prober
 * Reads duration and codecs from a media file with ffprobe
 */

import { z } from "zod";
import type { MediaInfo } from "../types";
import { captureCommand } from "../utils/capture-command";
import { ProbeError, isErrnoException } from "../utils/errors";

const ProbeOutputSchema = z.object({
  format: z
    .object({
      duration: z.string().optional(),
    })
    .optional(),
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
      }),
    )
    .optional(),
});

type ProbeOutput = z.infer<typeof ProbeOutputSchema>;

/**
 * First video and first audio stream win
 */
export function parseProbeOutput(output: ProbeOutput): MediaInfo {
  const duration = Number.parseFloat(output.format?.duration ?? "");
  const info: MediaInfo = {
    durationSeconds: Number.isFinite(duration) ? duration : undefined,
  };

  for (const stream of output.streams ?? []) {
    if (stream.codec_type === "video" && info.videoCodec === undefined) {
      info.videoCodec = stream.codec_name;
    } else if (stream.codec_type === "audio" && info.audioCodec === undefined) {
      info.audioCodec = stream.codec_name;
    }
  }

  return info;
}

/**
 * @throws ProbeError when ffprobe is missing, fails or prints something unexpected
 */
export async function probeMedia(filePath: string, ffprobe = "ffprobe"): Promise<MediaInfo> {
  let stdout: string;
  try {
    const output = await captureCommand(ffprobe, [
      "-v",
      "error",
      "-show_format",
      "-show_streams",
      "-print_format",
      "json",
      filePath,
    ]);
    if (output.code !== 0) {
      throw new ProbeError(`ffprobe exited with status ${output.code ?? output.signal}`);
    }
    stdout = output.stdout;
  } catch (error) {
    if (error instanceof ProbeError) throw error;
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ProbeError(
        "ffprobe not found; install ffmpeg to enable stream-copy detection",
        { cause: error },
      );
    }
    throw new ProbeError("failed to execute ffprobe", { cause: error });
  }

  try {
    return parseProbeOutput(ProbeOutputSchema.parse(JSON.parse(stdout)));
  } catch (error) {
    throw new ProbeError("failed to parse ffprobe output", { cause: error });
  }
}
