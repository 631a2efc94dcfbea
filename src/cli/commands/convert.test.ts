import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { checkExclusiveFlags, cliOverrides, convertCommand } from "./convert";

describe("checkExclusiveFlags", () => {
  it("rejects stream copy with transcode", () => {
    expect(() => checkExclusiveFlags({ streamCopy: true, transcode: true })).toThrow(
      "--stream-copy and --transcode are mutually exclusive",
    );
  });

  it("rejects overwrite with backup", () => {
    expect(() => checkExclusiveFlags({ overwrite: true, backup: true })).toThrow(
      "--overwrite and --backup are mutually exclusive",
    );
  });

  it("requires batch mode for a destination directory", () => {
    expect(() => checkExclusiveFlags({ destDir: "out" })).toThrow("--dest-dir requires --batch");
    expect(() => checkExclusiveFlags({ destDir: "out", batch: true })).not.toThrow();
  });
});

describe("cliOverrides", () => {
  it("maps the mode flags to a preference", () => {
    expect(cliOverrides({ streamCopy: true }).ffmpegPreference).toBe("stream-copy");
    expect(cliOverrides({ transcode: true }).ffmpegPreference).toBe("transcode");
    expect(cliOverrides({}).ffmpegPreference).toBeUndefined();
  });

  it("passes conversion flags through", () => {
    expect(cliOverrides({ imageQuality: 80, preset: "fast" })).toMatchObject({
      imageQuality: 80,
      preset: "fast",
    });
  });
});

describe("convertCommand", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "morphmv-cli-"));
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  async function existingPair(): Promise<[string, string]> {
    const source = path.join(dir, "a.txt");
    const destination = path.join(dir, "b.txt");
    await writeFile(source, "new");
    await writeFile(destination, "old");
    return [source, destination];
  }

  it("reports a failed execution once through the console sink", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const [source, destination] = await existingPair();

    await convertCommand(source, destination, {});

    expect(errorSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
    expect(await readFile(destination, "utf8")).toBe("old");
  });

  it("logs a failed execution as an error in JSON mode", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    const [source, destination] = await existingPair();

    await convertCommand(source, destination, { json: true });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      "[ERROR] destination exists; pass --overwrite or --backup",
    );
    expect(process.exitCode).toBe(1);
  });

  it("stops when the requested config file is missing", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const [source, destination] = await existingPair();
    const config = path.join(dir, "missing-config.json");

    await convertCommand(source, destination, { config, overwrite: true });

    expect(errorSpy).toHaveBeenCalledWith(`[ERROR] config file not found: ${config}`);
    expect(process.exitCode).toBe(1);
    expect(await readFile(destination, "utf8")).toBe("old");
  });
});
