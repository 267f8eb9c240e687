import { DEFAULT_TIMEOUT_SECONDS, type Config } from "./config";
import { logger } from "./logger";
import { clean } from "./normalize";
import { DEFAULT_QUALITY_POLICY, isUseful } from "./quality";
import { DEFAULT_USER_AGENT, type ExtractionTier } from "./tiers/base";
import { BrowserTier, DEFAULT_SETTLE_MS } from "./tiers/browser";
import { HttpTier } from "./tiers/http";
import { DEFAULT_READER_URL, ReaderTier } from "./tiers/reader";
import type { FetchOutcome, QualityPolicy, TierAttempt } from "./types";

export interface PipelineOptions {
  /** Replaces the default HTTP, Reader, Browser chain. Order is significant. */
  tiers?: ReadonlyArray<ExtractionTier<unknown>>;
  quality?: QualityPolicy;
  config?: Partial<Config>;
}

/** The default chain, cheapest first. */
export function createDefaultTiers(config: Partial<Config> = {}): ExtractionTier<unknown>[] {
  const userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
  return [
    new HttpTier({ userAgent }),
    new ReaderTier({ baseUrl: config.readerUrl ?? DEFAULT_READER_URL }),
    new BrowserTier({ userAgent, settleMs: config.settleMs ?? DEFAULT_SETTLE_MS }),
  ];
}

/**
 * Tries each tier in turn and returns the first result that passes the
 * quality gate, normalized. Tiers run one at a time; the timeout applies to
 * each tier separately, so the worst case is the sum of all tier budgets.
 */
export class ContentPipeline {
  private readonly tiers: ReadonlyArray<ExtractionTier<unknown>>;
  private readonly quality: QualityPolicy;
  private readonly defaultTimeout: number;

  constructor(options: PipelineOptions = {}) {
    this.tiers = options.tiers ?? createDefaultTiers(options.config);
    this.quality = options.quality ?? options.config?.quality ?? DEFAULT_QUALITY_POLICY;
    this.defaultTimeout = options.config?.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
  }

  async fetch(url: string, timeoutSeconds: number = this.defaultTimeout): Promise<FetchOutcome> {
    const attempts: TierAttempt[] = [];

    for (const tier of this.tiers) {
      const startTime = Date.now();
      const result = await tier.extract(url, timeoutSeconds);
      const durationMs = Date.now() - startTime;

      if (!result.ok) {
        attempts.push({
          tier: tier.name,
          outcome: result.reason,
          capability: result.capability,
          durationMs,
          detail: result.detail,
        });
        logger.debug("Tier skipped", { url, tier: tier.name, reason: result.reason });
        continue;
      }

      // An empty cleaned text never wins, whatever the policy's minimum.
      const content = clean(result.text);
      if (!content || !isUseful(result.text, this.quality)) {
        attempts.push({
          tier: tier.name,
          outcome: "below_quality_threshold",
          capability: result.capability,
          durationMs,
          detail: `${result.text.trim().length} characters`,
        });
        logger.debug("Tier output rejected by quality gate", { url, tier: tier.name });
        continue;
      }

      attempts.push({
        tier: tier.name,
        outcome: "accepted",
        capability: result.capability,
        durationMs,
      });
      logger.info("Content fetched", { url, tier: tier.name, duration: `${durationMs}ms` });
      return { content, tier: tier.name, attempts };
    }

    logger.info("All tiers failed", { url, attempts: attempts.length });
    return { content: "", tier: "", attempts };
  }
}

/**
 * Fetch readable text from `url`. Resolves to `{ content: "", tier: "" }`
 * when no tier produced useful content; never rejects for fetch failures.
 */
export function fetchContent(
  url: string,
  timeoutSeconds: number = DEFAULT_TIMEOUT_SECONDS,
  options: PipelineOptions = {}
): Promise<FetchOutcome> {
  return new ContentPipeline(options).fetch(url, timeoutSeconds);
}
