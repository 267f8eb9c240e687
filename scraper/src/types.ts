export type TierName = "HTTP" | "Reader" | "Browser";

export type SkipReason =
  | "unavailable"
  | "transport_error"
  | "parse_error"
  | "below_quality_threshold";

export type CapabilityStatus = "available" | "unavailable" | "error_during_use";

export interface FetchRequest {
  readonly url: string;
  /** Soft budget for a single tier, not for the whole pipeline. */
  readonly timeoutSeconds: number;
}

export type TierResult =
  | { ok: true; text: string; capability: "available" }
  | {
      ok: false;
      reason: Exclude<SkipReason, "below_quality_threshold">;
      capability: Exclude<CapabilityStatus, "available">;
      detail: string;
    };

export interface TierAttempt {
  tier: TierName;
  outcome: "accepted" | SkipReason;
  capability: CapabilityStatus;
  durationMs: number;
  detail?: string;
}

export interface FetchOutcome {
  /** Gated and normalized text, or "" when every tier failed. */
  content: string;
  tier: TierName | "";
  attempts: TierAttempt[];
}

export type BlockSignalEffect = "reject" | "allow";

export interface QualityPolicy {
  minLength: number;
  /** Number of leading characters searched for block signals. */
  headWindow: number;
  blockSignals: Record<string, BlockSignalEffect>;
}

export type OutputFormat = "text" | "json" | "jsonl";

export interface ExtractionResult {
  url: string;
  tier: TierName | "";
  content: string;
  extracted_at: string;
  error: string | null;
  attempts: TierAttempt[];
}

export interface CliOptions {
  url?: string;
  timeout?: number;
  format: OutputFormat;
  checkConfig: boolean;
}
