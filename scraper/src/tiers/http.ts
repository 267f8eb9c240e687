import type { JSDOM } from "jsdom";
import { ParseError, TransportError, errorMessage } from "../exceptions";
import { extractStaticContent, formatExtracted } from "../extractor";
import type { FetchRequest, TierName } from "../types";
import {
  ACCEPT_LANGUAGE,
  DEFAULT_USER_AGENT,
  ExtractionTier,
  hasFetch,
  timeoutSignal,
  toTransportError,
  type Probe,
} from "./base";

export interface JsdomModule {
  JSDOM: typeof JSDOM;
}

export interface HttpTierOptions {
  userAgent?: string;
  loadParser?: () => Promise<JsdomModule>;
}

/**
 * Direct GET of the page and a static parse of the returned markup.
 */
export class HttpTier extends ExtractionTier<typeof JSDOM> {
  readonly name: TierName = "HTTP";
  protected override readonly defaultFailure = "parse_error" as const;

  private readonly userAgent: string;
  private readonly loadParser: () => Promise<JsdomModule>;

  constructor(options: HttpTierOptions = {}) {
    super();
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.loadParser = options.loadParser ?? (() => import("jsdom"));
  }

  protected async probe(): Promise<Probe<typeof JSDOM>> {
    if (!hasFetch()) {
      return { status: "unavailable", detail: "No fetch implementation in this runtime" };
    }
    try {
      const { JSDOM } = await this.loadParser();
      return { status: "available", tool: JSDOM };
    } catch (error) {
      return { status: "unavailable", detail: `jsdom could not be loaded: ${errorMessage(error)}` };
    }
  }

  protected async run(
    { url, timeoutSeconds }: FetchRequest,
    JSDOMClass: typeof JSDOM
  ): Promise<string> {
    const { html, finalUrl } = await this.download(url, timeoutSeconds);

    try {
      return formatExtracted(extractStaticContent(JSDOMClass, html, finalUrl));
    } catch (error) {
      throw new ParseError(`Could not parse ${url}: ${errorMessage(error)}`);
    }
  }

  private async download(
    url: string,
    timeoutSeconds: number
  ): Promise<{ html: string; finalUrl: string }> {
    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          "User-Agent": this.userAgent,
          Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
          "Accept-Language": ACCEPT_LANGUAGE,
        },
        redirect: "follow",
        signal: timeoutSignal(timeoutSeconds),
      });

      if (!response.ok) {
        throw new TransportError(`HTTP ${response.status}`, response.status);
      }

      // Responses built in memory have no url; fall back to the requested one.
      return { html: await response.text(), finalUrl: response.url || url };
    } catch (error) {
      throw toTransportError(error, timeoutSeconds);
    }
  }
}
