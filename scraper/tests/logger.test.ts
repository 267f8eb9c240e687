import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { logger } from "../src/logger";

describe("logger", () => {
  const originalLogLevel = process.env.LOG_LEVEL;
  let stderr: MockInstance<typeof console.error>;
  let stdout: MockInstance<typeof console.log>;

  beforeEach(() => {
    stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    stdout = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalLogLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = originalLogLevel;
  });

  it("writes JSON lines to stderr only", () => {
    process.env.LOG_LEVEL = "debug";

    logger.info("Content fetched", { tier: "HTTP" });

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(stderr.mock.calls[0]?.[0]))).toMatchObject({
      level: "info",
      message: "Content fetched",
      tier: "HTTP",
    });
  });

  it("drops entries below the warn level by default", () => {
    delete process.env.LOG_LEVEL;

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(stderr).toHaveBeenCalledTimes(1);
  });

  it.each(["constructor", "toString", "__proto__", "verbose"])(
    "falls back to warn for LOG_LEVEL=%s",
    (level) => {
      process.env.LOG_LEVEL = level;

      logger.debug("hidden");
      logger.info("hidden");
      logger.warn("shown");
      logger.error("shown");

      expect(stderr).toHaveBeenCalledTimes(2);
      expect(JSON.parse(String(stderr.mock.calls[0]?.[0]))).toMatchObject({ level: "warn" });
    }
  );

  it("serializes errors", () => {
    process.env.LOG_LEVEL = "error";

    logger.error("Failed", new TypeError("bad input"), { url: "https://example.com" });

    const entry = JSON.parse(String(stderr.mock.calls[0]?.[0]));
    expect(entry.error).toMatchObject({ name: "TypeError", message: "bad input" });
    expect(entry.url).toBe("https://example.com");
  });
});
