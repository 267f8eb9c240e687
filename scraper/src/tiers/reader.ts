import { TransportError } from "../exceptions";
import type { FetchRequest, TierName } from "../types";
import { ExtractionTier, hasFetch, timeoutSignal, toTransportError, type Probe } from "./base";

export const DEFAULT_READER_URL = "https://r.jina.ai";

// Longest render time the reader service is asked to spend on a page.
const MAX_READER_TIMEOUT_SECONDS = 30;

// Allowance for remote rendering on top of network latency.
const READER_GRACE_SECONDS = 10;

export interface ReaderTierOptions {
  baseUrl?: string;
}

/**
 * Delegates rendering to a reader service that takes the target URL as its
 * path and answers with plain text or markdown.
 */
export class ReaderTier extends ExtractionTier {
  readonly name: TierName = "Reader";

  private readonly baseUrl: string;

  constructor(options: ReaderTierOptions = {}) {
    super();
    this.baseUrl = (options.baseUrl ?? DEFAULT_READER_URL).replace(/\/+$/, "");
  }

  readerUrl(url: string): string {
    return `${this.baseUrl}/${url}`;
  }

  protected async probe(): Promise<Probe<void>> {
    if (!hasFetch()) {
      return { status: "unavailable", detail: "No fetch implementation in this runtime" };
    }
    return { status: "available", tool: undefined };
  }

  protected async run({ url, timeoutSeconds }: FetchRequest): Promise<string> {
    const budget = timeoutSeconds + READER_GRACE_SECONDS;
    try {
      const response = await fetch(this.readerUrl(url), {
        method: "GET",
        headers: {
          "X-Timeout": String(Math.min(timeoutSeconds, MAX_READER_TIMEOUT_SECONDS)),
          Accept: "text/plain, text/markdown",
        },
        signal: timeoutSignal(budget),
      });

      if (!response.ok) {
        throw new TransportError(`Reader returned HTTP ${response.status}`, response.status);
      }
      return await response.text();
    } catch (error) {
      throw toTransportError(error, budget);
    }
  }
}
