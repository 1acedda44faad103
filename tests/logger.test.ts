// CHANGE: Verify logger respects configured log level.
// WHY: Debug output carries HTTP and cache details that stay hidden at the default level.

import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, error, getLogLevel, info, setLogLevel, warn } from "../src/logger.js";

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
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0]?.[0]).toContain("[DEBUG] visible");
  });

  it("sends warnings and errors to stderr", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    warn("careful");
    error("broken");
    expect(warnSpy.mock.calls[0]?.[0]).toContain("[WARN] careful");
    expect(errorSpy.mock.calls[0]?.[0]).toContain("[ERROR] broken");
  });

  it("drops info below the error level", () => {
    setLogLevel("error");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    info("quiet");
    expect(logSpy).not.toHaveBeenCalled();
    expect(getLogLevel()).toBe("error");
  });

  it("rejects unknown levels", () => {
    expect(() => setLogLevel("verbose")).toThrow("Unsupported log level: verbose");
  });
});
