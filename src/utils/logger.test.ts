import { afterEach, describe, expect, it, vi } from "vitest";
import { LogLevel, logLevelFromName, logger, setLogLevel, setStderrOnly } from "./logger";

describe("logger", () => {
  afterEach(() => {
    setLogLevel(LogLevel.INFO);
    setStderrOnly(false);
    vi.restoreAllMocks();
  });

  it("should skip messages below the current level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    logger.debug("hidden");
    logger.info("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith("shown");
  });

  it("should only log errors at ERROR level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel(LogLevel.ERROR);

    logger.warn("hidden");
    logger.error("failure");

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("failure");
  });

  it("should send info and debug to stderr when asked", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel(LogLevel.DEBUG);
    setStderrOnly(true);

    logger.info("info message");
    logger.debug("debug message");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenNthCalledWith(1, "info message");
    expect(error).toHaveBeenNthCalledWith(2, "debug message");
  });

  it("should resolve level names", () => {
    expect(logLevelFromName("error")).toBe(LogLevel.ERROR);
    expect(logLevelFromName("warn")).toBe(LogLevel.WARN);
    expect(logLevelFromName("info")).toBe(LogLevel.INFO);
    expect(logLevelFromName("debug")).toBe(LogLevel.DEBUG);
  });
});
