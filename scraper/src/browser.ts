import type { Browser, BrowserContext, BrowserType } from "playwright";
import {
  CapabilityUnavailableError,
  ParseError,
  TransportError,
  errorMessage,
} from "./exceptions";
import {
  CONTENT_REGION_SELECTORS,
  NON_CONTENT_TAGS,
  extractRenderedText,
} from "./extractor";
import { logger } from "./logger";

export type ChromiumLauncher = Pick<BrowserType, "launch">;

// Chromium's sandbox is unavailable in most containers.
export const CONTAINER_LAUNCH_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
];

export const INSTALL_HINT =
  "Install: npm install playwright && npx playwright install chromium";

export interface BrowserManagerOptions {
  userAgent: string;
  acceptLanguage: string;
}

export interface RenderOptions {
  timeoutMs: number;
  /** Extra wait after the network goes idle, for late-loading content. */
  settleMs: number;
}

export class BrowserManager {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;

  constructor(
    private readonly chromium: ChromiumLauncher,
    private readonly options: BrowserManagerOptions
  ) {}

  async initialize(headless: boolean = true): Promise<void> {
    const browser = await this.launch(headless);
    this.browser = browser;
    this.context = await browser.newContext({
      userAgent: this.options.userAgent,
      extraHTTPHeaders: { "Accept-Language": this.options.acceptLanguage },
    });
  }

  private async launch(headless: boolean): Promise<Browser> {
    try {
      return await this.chromium.launch({ headless, args: CONTAINER_LAUNCH_ARGS });
    } catch (error) {
      if (/executable doesn't exist|playwright install/i.test(errorMessage(error))) {
        throw new CapabilityUnavailableError(
          `Chromium is not installed for Playwright. ${INSTALL_HINT}`
        );
      }
      throw error;
    }
  }

  async extractFromUrl(url: string, { timeoutMs, settleMs }: RenderOptions): Promise<string> {
    if (!this.context) {
      throw new Error("Browser not initialized");
    }

    const page = await this.context.newPage();
    try {
      try {
        await page.goto(url, { waitUntil: "networkidle", timeout: timeoutMs });
      } catch (error) {
        throw new TransportError(`Navigation to ${url} failed: ${errorMessage(error)}`);
      }
      await page.waitForTimeout(settleMs);

      try {
        return await page.evaluate(extractRenderedText, {
          tags: [...NON_CONTENT_TAGS],
          selectors: [...CONTENT_REGION_SELECTORS],
        });
      } catch (error) {
        throw new ParseError(`In-page extraction failed: ${errorMessage(error)}`);
      }
    } finally {
      await page.close();
    }
  }

  /** Closes the context and the browser process. Safe to call more than once. */
  async cleanup(): Promise<void> {
    const { context, browser } = this;
    this.context = null;
    this.browser = null;

    try {
      await context?.close();
    } catch (error) {
      logger.warn("Error closing browser context", { error: errorMessage(error) });
    }

    // The process must go even when the context is already gone.
    try {
      await browser?.close();
    } catch (error) {
      logger.warn("Error closing browser", { error: errorMessage(error) });
    }
  }
}
