import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should drop messages below the level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createLogger("info");
    logger.debug("hidden");
    logger.info("shown");
    logger.warn("also shown");

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith("shown");
    expect(warn).toHaveBeenCalledWith("also shown");
  });

  it("should follow level changes", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createLogger("debug");
    logger.level = "error";
    logger.warn("hidden");
    logger.error("shown");

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("shown");
  });
});
