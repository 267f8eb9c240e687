import { BrowserManager, INSTALL_HINT, type ChromiumLauncher } from "../browser";
import { errorMessage } from "../exceptions";
import { logger } from "../logger";
import type { FetchRequest, TierName } from "../types";
import { ACCEPT_LANGUAGE, DEFAULT_USER_AGENT, ExtractionTier, type Probe } from "./base";

export const DEFAULT_SETTLE_MS = 1500;

export interface PlaywrightModule {
  chromium: ChromiumLauncher;
}

export interface BrowserTierOptions {
  userAgent?: string;
  settleMs?: number;
  headless?: boolean;
  loadPlaywright?: () => Promise<PlaywrightModule>;
}

/**
 * Renders the page in a local headless Chromium and reads the visible text
 * of the live DOM. A fresh browser is launched for every call and closed
 * before returning.
 */
export class BrowserTier extends ExtractionTier<ChromiumLauncher> {
  readonly name: TierName = "Browser";

  private readonly userAgent: string;
  private readonly settleMs: number;
  private readonly headless: boolean;
  private readonly loadPlaywright: () => Promise<PlaywrightModule>;

  constructor(options: BrowserTierOptions = {}) {
    super();
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.headless = options.headless ?? true;
    this.loadPlaywright = options.loadPlaywright ?? (() => import("playwright"));
  }

  protected async probe(): Promise<Probe<ChromiumLauncher>> {
    try {
      const { chromium } = await this.loadPlaywright();
      return { status: "available", tool: chromium };
    } catch (error) {
      logger.debug("Playwright import failed", { error: errorMessage(error) });
      return {
        status: "unavailable",
        detail: `Playwright not installed, skipping browser tier. ${INSTALL_HINT}`,
      };
    }
  }

  protected async run(
    { url, timeoutSeconds }: FetchRequest,
    chromium: ChromiumLauncher
  ): Promise<string> {
    const manager = new BrowserManager(chromium, {
      userAgent: this.userAgent,
      acceptLanguage: ACCEPT_LANGUAGE,
    });

    try {
      await manager.initialize(this.headless);
      return await manager.extractFromUrl(url, {
        timeoutMs: timeoutSeconds * 1000,
        settleMs: this.settleMs,
      });
    } finally {
      await manager.cleanup();
    }
  }

  protected override onUnavailable(detail: string): void {
    logger.warn("Browser tier unavailable", { tier: this.name, detail });
  }

  protected override onError(error: unknown): void {
    logger.warn("Playwright error", { tier: this.name, detail: errorMessage(error) });
  }
}
