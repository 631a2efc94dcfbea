import { describe, it, expect } from "vitest";
import { createPlan, validateOptions } from "./planner";
import { ValidationError } from "../utils/errors";
import { defaultConversionOptions } from "../types";
import type { ConversionOptions, PlanInput } from "../types";

function input(
  source: string,
  destination: string,
  overrides: Partial<PlanInput> = {},
  options: Partial<ConversionOptions> = {},
): PlanInput {
  return {
    source,
    destination,
    moveSource: false,
    backup: false,
    options: { ...defaultConversionOptions(), ...options },
    ...overrides,
  };
}

function plan(
  source: string,
  destination: string,
  overrides: Partial<PlanInput> = {},
  options: Partial<ConversionOptions> = {},
) {
  return createPlan(input(source, destination, overrides, options), {});
}

describe("createPlan", () => {
  // ==========================================================================
  // Strategy
  // ==========================================================================
  describe("strategy", () => {
    it("copies when extensions match and the source is kept", () => {
      const result = plan("a.txt", "b.txt");
      expect(result.strategy).toBe("copy");
      expect(result.backend).toBeUndefined();
    });

    it("renames when extensions match and the source moves", () => {
      expect(plan("a.txt", "b.txt", { moveSource: true }).strategy).toBe("rename");
    });

    it("treats jpeg and jpg as the same extension", () => {
      expect(plan("photo.JPEG", "out.jpg").strategy).toBe("copy");
    });

    it("treats htm and html as the same extension", () => {
      expect(plan("page.htm", "page.html", { moveSource: true }).strategy).toBe("rename");
    });

    it("converts when extensions differ", () => {
      expect(plan("a.png", "a.jpg").strategy).toBe("convert");
    });

    it("converts when only one side has an extension", () => {
      expect(plan("README", "README.md").strategy).toBe("convert");
    });
  });

  // ==========================================================================
  // Backend
  // ==========================================================================
  describe("backend", () => {
    it("uses ImageMagick for image to image", () => {
      expect(plan("a.png", "a.webp").backend).toBe("imagemagick");
    });

    it("uses ImageMagick for pdf to image and notes the first page", () => {
      const result = plan("doc.pdf", "page.png");
      expect(result.backend).toBe("imagemagick");
      expect(result.notes).toContain("PDF to image converts the first page only");
    });

    it("uses ImageMagick for image to pdf", () => {
      expect(plan("scan.jpg", "scan.pdf").backend).toBe("imagemagick");
    });

    it("uses ffmpeg between audio and video", () => {
      expect(plan("clip.mp4", "clip.mp3").backend).toBe("ffmpeg");
      expect(plan("song.wav", "song.flac").backend).toBe("ffmpeg");
    });

    it("uses LibreOffice for documents to pdf", () => {
      expect(plan("report.docx", "report.pdf").backend).toBe("libreoffice");
    });

    it("has no backend for unsupported pairs but still builds the plan", () => {
      const result = plan("notes.txt", "notes.mp3");
      expect(result.strategy).toBe("convert");
      expect(result.backend).toBeUndefined();
      expect(result.notes[0]).toBe("no supported backend found for this conversion");
    });
  });

  // ==========================================================================
  // Notes
  // ==========================================================================
  describe("notes", () => {
    it("lists notes in a stable order", () => {
      const result = plan("clip.mov", "clip.mp3", {}, { imageQuality: 80 });
      expect(result.notes).toEqual([
        "ffprobe may be used at runtime to choose stream copy vs transcode",
        "source will be kept",
        "image quality ignored for non-image output",
      ]);
    });

    it("omits the keep note when the source moves", () => {
      expect(plan("a.png", "a.jpg", { moveSource: true }).notes).toEqual([]);
    });

    it("notes video settings on audio-only output", () => {
      const result = plan(
        "clip.mp4",
        "clip.mp3",
        { moveSource: true },
        { videoBitrate: "2500k", preset: "fast", videoCodec: "libx264" },
      );
      expect(result.notes).toEqual([
        "ffprobe may be used at runtime to choose stream copy vs transcode",
        "video bitrate ignored for audio-only output",
        "preset ignored for audio-only output",
        "video codec ignored for audio-only output",
      ]);
    });

    it("notes media options on document output", () => {
      const result = plan("a.docx", "a.pdf", { moveSource: true }, { audioBitrate: "128k" });
      expect(result.notes).toEqual(["media options ignored for document conversions"]);
    });

    it("does not note media options for a pdf and image pair", () => {
      const result = plan("a.png", "a.pdf", { moveSource: true }, { audioBitrate: "128k" });
      expect(result.notes).toEqual([]);
    });

    it("notes the ffmpeg preference on other backends", () => {
      const result = plan("a.png", "a.jpg", { moveSource: true }, { ffmpegPreference: "transcode" });
      expect(result.notes).toEqual(["ffmpeg mode preference ignored for non-ffmpeg backend"]);
    });

    it("notes encoder settings ignored by a forced stream copy", () => {
      const result = plan(
        "a.mkv",
        "a.mp4",
        { moveSource: true },
        { ffmpegPreference: "stream-copy", audioBitrate: "192k" },
      );
      expect(result.notes).toEqual([
        "ffprobe may be used at runtime to choose stream copy vs transcode",
        "audio bitrate ignored when stream copy is forced",
      ]);
    });
  });

  // ==========================================================================
  // Plan shape
  // ==========================================================================
  it("records destination extension and kind", () => {
    const result = plan("clip.mov", "clip.MP4");
    expect(result.destExt).toBe("mp4");
    expect(result.destKind).toBe("video");
  });

  it("freezes the plan", () => {
    const result = plan("a.png", "a.jpg");
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.notes)).toBe(true);
  });

  it("rejects identical source and destination", () => {
    expect(() => plan("dir/a.png", "dir/../dir/a.png")).toThrow(ValidationError);
    expect(() => plan("a.png", "a.png")).toThrow("source and destination must differ");
  });
});

describe("validateOptions", () => {
  const valid = (options: Partial<ConversionOptions>) => () =>
    validateOptions({ ...defaultConversionOptions(), ...options });

  it("accepts image quality bounds", () => {
    expect(valid({ imageQuality: 1 })).not.toThrow();
    expect(valid({ imageQuality: 100 })).not.toThrow();
  });

  it("rejects image quality out of range", () => {
    expect(valid({ imageQuality: 0 })).toThrow("image quality must be between 1 and 100");
    expect(valid({ imageQuality: 101 })).toThrow("image quality must be between 1 and 100");
  });

  it("accepts bitrates with optional suffix", () => {
    expect(valid({ videoBitrate: "128k" })).not.toThrow();
    expect(valid({ audioBitrate: "128" })).not.toThrow();
    expect(valid({ videoBitrate: "2M" })).not.toThrow();
  });

  it("rejects malformed bitrates", () => {
    expect(valid({ audioBitrate: "128kbps" })).toThrow(
      'invalid audio bitrate "128kbps": must be numeric with optional k/m suffix',
    );
    expect(valid({ videoBitrate: "" })).toThrow(ValidationError);
  });

  it("accepts known presets in any case", () => {
    expect(valid({ preset: "veryslow" })).not.toThrow();
    expect(valid({ preset: "Medium" })).not.toThrow();
  });

  it("rejects unknown presets", () => {
    expect(valid({ preset: "turbo" })).toThrow(
      "preset must be one of: ultrafast, superfast, veryfast, faster, fast, medium, slow, slower, veryslow",
    );
  });

  it("rejects blank codecs", () => {
    expect(valid({ videoCodec: "  " })).toThrow("video codec must be a non-empty string");
    expect(valid({ audioCodec: "" })).toThrow("audio codec must be a non-empty string");
  });

  it("blocks plan construction", () => {
    expect(() => plan("a.png", "a.jpg", {}, { imageQuality: 0 })).toThrow(ValidationError);
  });
});
