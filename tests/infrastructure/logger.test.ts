import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger, LogLevel, parseLogLevel } from "../../src/infrastructure/logging/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ConsoleLogger", () => {
  it("writes messages at or above its level to stderr", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger(LogLevel.WARN);

    logger.info("hidden");
    logger.warn("shown", { path: "chords.txt" });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith("[WARN] shown", { path: "chords.txt" });
  });

  it("prefixes nested scopes", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    new ConsoleLogger(LogLevel.DEBUG, "cli").child("tools").debug("ready");

    expect(errorSpy).toHaveBeenCalledWith("[DEBUG] [cli:tools] ready", "");
  });
});

describe("parseLogLevel", () => {
  it("maps names case-insensitively and defaults to info", () => {
    expect(parseLogLevel("ERROR")).toBe(LogLevel.ERROR);
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("loud")).toBe(LogLevel.INFO);
  });
});
