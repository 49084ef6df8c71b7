import { describe, expect, it } from "vitest";
import { formatDuration, parseDuration, sleep } from "./duration.js";

describe("parseDuration", () => {
  it("parses every unit", () => {
    expect(parseDuration("500ms")).toBe(500);
    expect(parseDuration("30s")).toBe(30_000);
    expect(parseDuration("10m")).toBe(600_000);
    expect(parseDuration("1h")).toBe(3_600_000);
  });

  it("passes numbers through", () => {
    expect(parseDuration(1_234)).toBe(1_234);
  });

  it("rejects malformed input", () => {
    expect(() => parseDuration("ten minutes")).toThrow(/Invalid duration/);
  });

  it("rejects durations beyond the timer limit", () => {
    expect(parseDuration("596h")).toBe(2_145_600_000);
    expect(() => parseDuration("600h")).toThrow("Duration 600h is too long; the maximum is 596h.");
  });
});

describe("formatDuration", () => {
  it("picks a readable unit", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1_500)).toBe("1.5s");
    expect(formatDuration(120_000)).toBe("2m");
    expect(formatDuration(7_200_000)).toBe("2h");
  });
});

describe("sleep", () => {
  it("resolves immediately when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(10_000, controller.signal);
    expect(Date.now() - started).toBeLessThan(1_000);
  });
});
