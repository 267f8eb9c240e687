import {
  CapabilityUnavailableError,
  ParseError,
  TransportError,
  errorMessage,
} from "../exceptions";
import { logger } from "../logger";
import type { FetchRequest, TierName, TierResult } from "../types";

type FailureReason = Exclude<TierResult, { ok: true }>["reason"];

/** Outcome of looking for the tooling a tier needs, carrying the tool when found. */
export type Probe<TTool> =
  | { status: "available"; tool: TTool }
  | { status: "unavailable"; detail: string };

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const ACCEPT_LANGUAGE = "en-US,en;q=0.9";

/**
 * One strategy in the fallback chain. Subclasses implement `probe` and `run`;
 * `extract` turns every failure into a TierResult and never rejects.
 */
export abstract class ExtractionTier<TTool = void> {
  abstract readonly name: TierName;

  /** Reason reported for errors that are not one of the known error types. */
  protected readonly defaultFailure: FailureReason = "transport_error";

  protected abstract probe(): Promise<Probe<TTool>>;

  protected abstract run(request: FetchRequest, tool: TTool): Promise<string>;

  async extract(url: string, timeoutSeconds: number): Promise<TierResult> {
    const request: FetchRequest = { url, timeoutSeconds };

    let probe: Probe<TTool>;
    try {
      probe = await this.probe();
    } catch (error) {
      return this.fail(error);
    }

    if (probe.status === "unavailable") {
      this.onUnavailable(probe.detail);
      return {
        ok: false,
        reason: "unavailable",
        capability: "unavailable",
        detail: probe.detail,
      };
    }

    try {
      const text = await this.run(request, probe.tool);
      return { ok: true, text, capability: "available" };
    } catch (error) {
      return this.fail(error);
    }
  }

  /** Hook for tiers that report a missing capability to the operator. */
  protected onUnavailable(detail: string): void {
    logger.debug("Tier unavailable", { tier: this.name, detail });
  }

  /** Hook for tiers that report internal failures to the operator. */
  protected onError(error: unknown): void {
    logger.debug("Tier failed", { tier: this.name, detail: errorMessage(error) });
  }

  private fail(error: unknown): TierResult {
    const detail = errorMessage(error);

    if (error instanceof CapabilityUnavailableError) {
      this.onUnavailable(detail);
      return { ok: false, reason: "unavailable", capability: "unavailable", detail };
    }

    this.onError(error);
    let reason = this.defaultFailure;
    if (error instanceof TransportError) {
      reason = "transport_error";
    } else if (error instanceof ParseError) {
      reason = "parse_error";
    }
    return { ok: false, reason, capability: "error_during_use", detail };
  }
}

export function timeoutSignal(seconds: number): AbortSignal {
  return AbortSignal.timeout(Math.max(0, seconds) * 1000);
}

export function toTransportError(error: unknown, timeoutSeconds: number): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new TransportError(`Request timed out after ${timeoutSeconds}s`);
  }
  return new TransportError(errorMessage(error));
}

export function hasFetch(): boolean {
  return typeof globalThis.fetch === "function";
}
