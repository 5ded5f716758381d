import { describe, it, expect, afterEach, vi } from "vitest";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below the level", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger("warn");

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("shown");
  });

  it("prefixes debug output and writes it to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("debug").debug("Formatted url", "https://parse.test");

    expect(error).toHaveBeenCalledWith("[debug]", "Formatted url", "https://parse.test");
    expect(log).not.toHaveBeenCalled();
  });

  it("is quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("silent").error("hidden");

    expect(error).not.toHaveBeenCalled();
  });
});
