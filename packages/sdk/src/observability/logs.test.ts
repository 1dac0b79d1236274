import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, parseLogLevel } from "./logs.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write one JSON line per event to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("info");

    logger.info("corpus.load.end", { source: "/data/codes.txt", details: { records: 5 } });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: "info",
      event: "corpus.load.end",
      source: "/data/codes.txt",
      details: { records: 5 },
    });
  });

  it("should drop events below the minimum level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger();

    logger.debug("query.search");
    logger.info("index.build.end");
    logger.warn("corpus.slow");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(logger.level).toBe("warn");
  });

  it("should change level and stay silent when disabled", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("error");

    logger.setLevel("debug");
    logger.debug("query.search");
    logger.setEnabled(false);
    logger.error("corpus.load.failed");

    expect(spy).toHaveBeenCalledTimes(1);
  });
});

describe("parseLogLevel", () => {
  it("should accept level names in any case", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(" info ")).toBe("info");
  });

  it("should fall back for unknown or missing values", () => {
    expect(parseLogLevel(undefined)).toBe("warn");
    expect(parseLogLevel("verbose")).toBe("warn");
    expect(parseLogLevel("verbose", "error")).toBe("error");
  });
});
