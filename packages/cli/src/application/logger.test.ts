import { describe, expect, it } from "vitest";
import { createStderrLogger, parseLogLevel } from "./logger.js";

describe("createStderrLogger", () => {
  it("drops messages below the configured level", () => {
    const lines: string[] = [];
    const logger = createStderrLogger("warn", (line) => lines.push(line));

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("profile is incomplete");
    logger.error("cannot read file");

    expect(lines).toEqual([
      "[deepxcheck] WARN profile is incomplete\n",
      "[deepxcheck] ERROR cannot read file\n",
    ]);
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    createStderrLogger("silent", (line) => lines.push(line)).error("boom");
    expect(lines).toEqual([]);
  });
});

describe("parseLogLevel", () => {
  it("falls back to info for missing or unknown values", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});
