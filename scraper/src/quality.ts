import type { BlockSignalEffect, QualityPolicy } from "./types";

export const DEFAULT_BLOCK_SIGNALS = [
  "just a moment",
  "enable javascript",
  "checking your browser",
  "please wait",
  "ddos protection",
  "access denied",
  "403 forbidden",
  "404 not found",
] as const;

export const DEFAULT_QUALITY_POLICY: QualityPolicy = {
  minLength: 350,
  headWindow: 600,
  blockSignals: Object.fromEntries(
    DEFAULT_BLOCK_SIGNALS.map((signal): [string, BlockSignalEffect] => [signal, "reject"])
  ),
};

/**
 * Merge overrides onto the default policy. Signal maps are merged key by key,
 * so a single default can be switched off with `{ "please wait": "allow" }`.
 */
export function createQualityPolicy(
  overrides: Partial<QualityPolicy> = {}
): QualityPolicy {
  const blockSignals: QualityPolicy["blockSignals"] = {};
  const merged = {
    ...DEFAULT_QUALITY_POLICY.blockSignals,
    ...overrides.blockSignals,
  };
  for (const [signal, effect] of Object.entries(merged)) {
    blockSignals[signal.toLowerCase()] = effect;
  }

  return {
    minLength: overrides.minLength ?? DEFAULT_QUALITY_POLICY.minLength,
    headWindow: overrides.headWindow ?? DEFAULT_QUALITY_POLICY.headWindow,
    blockSignals,
  };
}

/**
 * Returns the first rejecting block signal found in the head of the text,
 * or null when there is none.
 */
export function findBlockSignal(
  text: string,
  policy: QualityPolicy = DEFAULT_QUALITY_POLICY
): string | null {
  const head = text.toLowerCase().slice(0, policy.headWindow);
  for (const [signal, effect] of Object.entries(policy.blockSignals)) {
    if (effect === "reject" && head.includes(signal.toLowerCase())) {
      return signal;
    }
  }
  return null;
}

/**
 * Decide whether extracted text looks like real content rather than an
 * interstitial, error page or stub.
 */
export function isUseful(
  text: string,
  policy: QualityPolicy = DEFAULT_QUALITY_POLICY
): boolean {
  if (!text || text.trim().length < policy.minLength) {
    return false;
  }
  return findBlockSignal(text, policy) === null;
}
