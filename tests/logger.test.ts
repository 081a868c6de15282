import { describe, it, expect, afterEach, vi } from "vitest";

import { LogLevel, disableQuietMode, enableQuietMode, log, setLogLevel, setPrefix } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setPrefix(false);
    disableQuietMode();
    vi.restoreAllMocks();
  });

  it("should print info messages unstyled", () => {
    const consoleLog = vi.spyOn(console, "log").mockImplementation(() => {});
    log.info("rendering");
    expect(consoleLog).toHaveBeenCalledWith("rendering");
  });

  it("should add the prefix when enabled", () => {
    const consoleLog = vi.spyOn(console, "log").mockImplementation(() => {});
    setPrefix(true);
    log.info("rendering");
    expect(consoleLog).toHaveBeenCalledWith("[dockerfile-kit] rendering");
  });

  it("should hide debug output below the debug level", () => {
    const consoleLog = vi.spyOn(console, "log").mockImplementation(() => {});
    log.debug("hidden");
    expect(consoleLog).not.toHaveBeenCalled();

    setLogLevel(LogLevel.DEBUG);
    log.debug("shown");
    expect(consoleLog).toHaveBeenCalledTimes(1);
  });

  it("should suppress everything in quiet mode", () => {
    const consoleLog = vi.spyOn(console, "log").mockImplementation(() => {});
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    enableQuietMode();

    log.info("info");
    log.error("error");

    expect(consoleLog).not.toHaveBeenCalled();
    expect(consoleError).not.toHaveBeenCalled();
  });
});
