import type { JSDOM } from "jsdom";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HttpTier } from "../src/tiers/http";
import { PROSE, articlePage } from "./fixtures";

describe("HttpTier", () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("fetches the page and extracts the main region with its title", async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response(articlePage("Field Notes", PROSE), { status: 200 }));
    globalThis.fetch = fetchSpy;

    const result = await new HttpTier().extract("https://example.com/notes", 15);

    expect(result).toEqual({
      ok: true,
      text: `# Field Notes\n\n${PROSE}`,
      capability: "available",
    });
    expect(fetchSpy).toHaveBeenCalledTimes(1);

    const [url, init] = fetchSpy.mock.calls[0] ?? [];
    expect(url).toBe("https://example.com/notes");
    expect(init.method).toBe("GET");
    expect(init.redirect).toBe("follow");
    expect(init.headers["User-Agent"]).toContain("Chrome/120.0.0.0");
    expect(init.headers["Accept-Language"]).toBe("en-US,en;q=0.9");
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("sends a configured user agent", async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response("<p>ok</p>", { status: 200 }));
    globalThis.fetch = fetchSpy;

    await new HttpTier({ userAgent: "test-agent/1.0" }).extract("https://example.com/", 5);

    const [, init] = fetchSpy.mock.calls[0] ?? [];
    expect(init.headers["User-Agent"]).toBe("test-agent/1.0");
  });

  it("reports a non-success status as a transport error", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response("nope", { status: 404 }));

    const result = await new HttpTier().extract("https://example.com/missing", 5);

    expect(result).toEqual({
      ok: false,
      reason: "transport_error",
      capability: "error_during_use",
      detail: "HTTP 404",
    });
  });

  it("reports network failures as transport errors", async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError("fetch failed"));

    const result = await new HttpTier().extract("https://example.com/", 5);

    expect(result).toEqual({
      ok: false,
      reason: "transport_error",
      capability: "error_during_use",
      detail: "fetch failed",
    });
  });

  it("reports timeouts with the budget", async () => {
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), {
      name: "TimeoutError",
    });
    globalThis.fetch = vi.fn().mockRejectedValue(timeout);

    const result = await new HttpTier().extract("https://example.com/", 5);

    expect(result).toMatchObject({ ok: false, reason: "transport_error", detail: "Request timed out after 5s" });
  });

  it("is unavailable when the parser cannot be loaded", async () => {
    const fetchSpy = vi.fn();
    globalThis.fetch = fetchSpy;

    const tier = new HttpTier({
      loadParser: () => Promise.reject(new Error("Cannot find module 'jsdom'")),
    });
    const result = await tier.extract("https://example.com/", 5);

    expect(result).toEqual({
      ok: false,
      reason: "unavailable",
      capability: "unavailable",
      detail: "jsdom could not be loaded: Cannot find module 'jsdom'",
    });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("reports parser failures as parse errors", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response("<p>ok</p>", { status: 200 }));

    class BrokenDom {
      constructor() {
        throw new Error("bad markup");
      }
    }
    const tier = new HttpTier({
      loadParser: async () => ({ JSDOM: BrokenDom as unknown as typeof JSDOM }),
    });
    const result = await tier.extract("https://example.com/", 5);

    expect(result).toEqual({
      ok: false,
      reason: "parse_error",
      capability: "error_during_use",
      detail: "Could not parse https://example.com/: bad markup",
    });
  });
});
