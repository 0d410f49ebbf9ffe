import { describe, it, expect, vi } from "vitest";
import { createReporter, parseInteger } from "../src/utils.js";
import { nullLogger, resolveLogger, type Logger } from "../src/logger.js";

function recordingLogger(): Logger & { errors: string[] } {
  const errors: string[] = [];
  return {
    errors,
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: (message: string) => {
      errors.push(message);
    },
  };
}

describe("parseInteger", () => {
  it("accepts signed decimal integers with surrounding spaces", () => {
    expect(parseInteger(" 98100 ")).toBe(98100);
    expect(parseInteger("-150")).toBe(-150);
    expect(parseInteger("+7")).toBe(7);
  });

  it("rejects anything else", () => {
    expect(parseInteger("")).toBeNull();
    expect(parseInteger("1.5")).toBeNull();
    expect(parseInteger("12abc")).toBeNull();
    expect(parseInteger("0x10")).toBeNull();
  });
});

describe("createReporter", () => {
  it("forwards status and progress", () => {
    const onStatus = vi.fn();
    const onProgress = vi.fn();
    const report = createReporter({ onStatus, onProgress }, nullLogger);

    report.status("Reading configuration from radio...");
    report.progress(3, 20);

    expect(onStatus).toHaveBeenCalledWith("Reading configuration from radio...");
    expect(onProgress).toHaveBeenCalledWith(3, 20);
  });

  it("logs a throwing callback instead of propagating it", () => {
    const log = recordingLogger();
    const report = createReporter(
      {
        onStatus: () => {
          throw new Error("display gone");
        },
      },
      log
    );

    expect(() => report.status("hello")).not.toThrow();
    expect(log.errors).toEqual(["Error in status callback: display gone"]);
  });
});

describe("resolveLogger", () => {
  it("prefers an explicit logger", () => {
    const log = recordingLogger();
    expect(resolveLogger({ logger: log, verbose: true })).toBe(log);
  });

  it("is silent unless verbose", () => {
    expect(resolveLogger({})).toBe(nullLogger);
    expect(resolveLogger({ verbose: true })).not.toBe(nullLogger);
  });
});
