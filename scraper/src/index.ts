export { ContentPipeline, createDefaultTiers, fetchContent } from "./pipeline";
export type { PipelineOptions } from "./pipeline";
export { DEFAULT_BLOCK_SIGNALS, DEFAULT_QUALITY_POLICY, createQualityPolicy, findBlockSignal, isUseful } from "./quality";
export { clean } from "./normalize";
export { ExtractionTier } from "./tiers/base";
export type { Probe } from "./tiers/base";
export { HttpTier } from "./tiers/http";
export { ReaderTier } from "./tiers/reader";
export { BrowserTier } from "./tiers/browser";
export { BrowserManager } from "./browser";
export { DEFAULT_TIMEOUT_SECONDS, loadConfig } from "./config";
export type { Config, LoadedConfig } from "./config";
export {
  CapabilityUnavailableError,
  ConfigError,
  ParseError,
  TransportError,
  WebReadError,
} from "./exceptions";
export type * from "./types";
