// CHANGE: Verify logger respects configured log level.
// WHY: INFO for stage summaries, DEBUG for HTTP and parsing details, WARN and ERROR on stderr.

import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, error, info, setLogLevel, warn } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("suppresses debug logs when level is info", () => {
    setLogLevel("info");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("hidden");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("emits debug logs when level is debug", () => {
    setLogLevel("debug");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("visible");
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining("[DEBUG] visible"));
  });

  it("always logs info regardless of debug level", () => {
    setLogLevel("info");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    info("always");
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it("keeps warnings and errors when level is warn", () => {
    setLogLevel("warn");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    info("quiet");
    warn("careful");
    error("broken");
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("[WARN] careful"));
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("[ERROR] broken"));
  });

  it("rejects unknown levels", () => {
    expect(() => setLogLevel("verbose")).toThrow("Unsupported log level: verbose");
  });
});
