import { describe, expect, it } from "vitest";
import { createLogger, resolveLogLevel } from "./logger.js";

describe("resolveLogLevel", () => {
  it("accepts known levels case-insensitively", () => {
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel(" silent ")).toBe("silent");
  });

  it("falls back to info", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("verbose")).toBe("info");
  });
});

describe("createLogger", () => {
  it("applies the requested level", () => {
    const log = createLogger({ level: "warn" });
    expect(log.level).toBe("warn");
    expect(log.isLevelEnabled("info")).toBe(false);
    expect(log.isLevelEnabled("error")).toBe(true);
  });
});
