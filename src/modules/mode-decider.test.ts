import { describe, it, expect } from "vitest";
import { decideFfmpegMode } from "./mode-decider";
import type { FfmpegPreference, MediaInfo, MediaKind } from "../types";

function target(destExt: string, destKind: MediaKind, ffmpegPreference: FfmpegPreference = "auto") {
  return { destExt, destKind, options: { ffmpegPreference } };
}

const h264Aac: MediaInfo = { durationSeconds: 10, videoCodec: "h264", audioCodec: "aac" };

describe("decideFfmpegMode", () => {
  it("honours an explicit preference", () => {
    expect(decideFfmpegMode(target("mp4", "video", "transcode"), h264Aac)).toBe("transcode");
    expect(decideFfmpegMode(target("mp3", "audio", "stream-copy"), undefined)).toBe("stream-copy");
  });

  it("transcodes audio destinations", () => {
    expect(decideFfmpegMode(target("m4a", "audio"), { audioCodec: "aac" })).toBe("transcode");
  });

  it("transcodes without probe information", () => {
    expect(decideFfmpegMode(target("mp4", "video"), undefined)).toBe("transcode");
  });

  it("transcodes when the source has no video stream", () => {
    expect(decideFfmpegMode(target("mkv", "video"), { audioCodec: "aac" })).toBe("transcode");
  });

  it("stream copies anything with video into mkv", () => {
    expect(decideFfmpegMode(target("mkv", "video"), { videoCodec: "prores" })).toBe("stream-copy");
  });

  describe("mp4 and mov", () => {
    it("stream copies h264 with aac", () => {
      expect(decideFfmpegMode(target("mp4", "video"), h264Aac)).toBe("stream-copy");
      expect(decideFfmpegMode(target("mov", "video"), h264Aac)).toBe("stream-copy");
    });

    it("stream copies video without audio", () => {
      expect(decideFfmpegMode(target("mp4", "video"), { videoCodec: "hevc" })).toBe("stream-copy");
    });

    it("transcodes incompatible audio", () => {
      const info: MediaInfo = { videoCodec: "h264", audioCodec: "opus" };
      expect(decideFfmpegMode(target("mp4", "video"), info)).toBe("transcode");
    });

    it("transcodes incompatible video", () => {
      const info: MediaInfo = { videoCodec: "vp9", audioCodec: "aac" };
      expect(decideFfmpegMode(target("mov", "video"), info)).toBe("transcode");
    });
  });

  describe("webm", () => {
    it("stream copies vp9 with opus", () => {
      const info: MediaInfo = { videoCodec: "vp9", audioCodec: "opus" };
      expect(decideFfmpegMode(target("webm", "video"), info)).toBe("stream-copy");
    });

    it("transcodes h264", () => {
      expect(decideFfmpegMode(target("webm", "video"), h264Aac)).toBe("transcode");
    });
  });

  it("transcodes other containers", () => {
    expect(decideFfmpegMode(target("avi", "video"), h264Aac)).toBe("transcode");
  });
});
