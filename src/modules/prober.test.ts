import { chmod, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { parseProbeOutput, probeMedia } from "./prober";
import { ProbeError } from "../utils/errors";

describe("parseProbeOutput", () => {
  it("takes the first stream of each kind", () => {
    expect(
      parseProbeOutput({
        format: { duration: "12.500000" },
        streams: [
          { codec_type: "video", codec_name: "h264" },
          { codec_type: "audio", codec_name: "aac" },
          { codec_type: "audio", codec_name: "opus" },
        ],
      }),
    ).toEqual({ durationSeconds: 12.5, videoCodec: "h264", audioCodec: "aac" });
  });

  it("leaves an unreadable duration unset", () => {
    expect(parseProbeOutput({ format: { duration: "N/A" } })).toEqual({
      durationSeconds: undefined,
    });
  });
});

describe.skipIf(process.platform === "win32")("probeMedia", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "morphmv-probe-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function fakeProbe(body: string): Promise<string> {
    const file = path.join(dir, "fake-ffprobe");
    await writeFile(file, `#!/bin/sh\n${body}\n`);
    await chmod(file, 0o755);
    return file;
  }

  it("parses ffprobe JSON", async () => {
    const ffprobe = await fakeProbe(
      `echo '{"format":{"duration":"3.0"},"streams":[{"codec_type":"audio","codec_name":"mp3"}]}'`,
    );
    expect(await probeMedia("song.mp3", ffprobe)).toEqual({
      durationSeconds: 3,
      audioCodec: "mp3",
    });
  });

  it("fails on a nonzero exit", async () => {
    const ffprobe = await fakeProbe("exit 1");
    await expect(probeMedia("song.mp3", ffprobe)).rejects.toThrow("ffprobe exited with status 1");
  });

  it("fails on unexpected output", async () => {
    const ffprobe = await fakeProbe("echo not-json");
    await expect(probeMedia("song.mp3", ffprobe)).rejects.toThrow("failed to parse ffprobe output");
  });

  it("explains a missing ffprobe", async () => {
    await expect(probeMedia("song.mp3", path.join(dir, "missing"))).rejects.toBeInstanceOf(
      ProbeError,
    );
  });
});
