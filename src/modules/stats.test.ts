import { describe, it, expect } from "vitest";
import { formatDuration, summaryJson, summaryLine } from "./stats";

describe("formatDuration", () => {
  it("formats milliseconds, seconds and minutes", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(125000)).toBe("2m 5s");
  });
});

describe("summaryLine", () => {
  it("reports the counts", () => {
    expect(summaryLine({ total: 3, succeeded: 2, failed: 1 })).toBe(
      "Batch summary: total 3, succeeded 2, failed 1",
    );
  });
});

describe("summaryJson", () => {
  it("keeps entry order and only includes errors for failures", () => {
    const json = summaryJson({
      total: 2,
      succeeded: 1,
      failed: 1,
      entries: [
        { source: "a.wav", destination: "out/a.mp3", ok: true },
        { source: "b.txt", destination: "out/b.mp3", ok: false, error: "no backend" },
      ],
    });

    expect(json).toEqual({
      total: 2,
      succeeded: 1,
      failed: 1,
      results: [
        { source: "a.wav", destination: "out/a.mp3", ok: true },
        { source: "b.txt", destination: "out/b.mp3", ok: false, error: "no backend" },
      ],
    });
    expect("error" in json.results[0]).toBe(false);
  });
});
