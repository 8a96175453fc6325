import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  setupLogger,
  setLogLevel,
  getLogLevel,
  isLogLevel,
  maskIdentifier,
} from "./logger.js";

describe("logger", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    setLogLevel("info");
  });

  it("should log messages with level and module name", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = setupLogger("session");

    logger.info("Logged in");

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    const logOutput = consoleSpy.mock.calls[0][0] as string;
    expect(logOutput).toMatch(
      /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] INFO  \[session\] Logged in$/
    );
  });

  it("should respect log level (warn)", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("warn");
    const logger = setupLogger("test");

    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");
    logger.error("error message");

    expect(consoleSpy).toHaveBeenCalledTimes(2);
    expect(getLogLevel()).toBe("warn");
  });

  it("should respect log level (debug)", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("debug");
    const logger = setupLogger("test");

    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");
    logger.error("error message");

    expect(consoleSpy).toHaveBeenCalledTimes(4);
  });

  it("should recognise valid level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });

  it("should mask identifiers", () => {
    expect(maskIdentifier("jane@example.com")).toBe("ja***");
  });
});
