import { readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { ConfigError } from "./exceptions";
import { DEFAULT_QUALITY_POLICY, createQualityPolicy } from "./quality";
import { DEFAULT_USER_AGENT } from "./tiers/base";
import { DEFAULT_SETTLE_MS } from "./tiers/browser";
import { DEFAULT_READER_URL } from "./tiers/reader";
import type { QualityPolicy } from "./types";

export const DEFAULT_TIMEOUT_SECONDS = 20;

export interface Config {
  timeoutSeconds: number;
  userAgent: string;
  readerUrl: string;
  settleMs: number;
  quality: QualityPolicy;
}

export type ConfigSource = "defaults" | "file" | "environment" | "file+environment";

export interface LoadedConfig {
  config: Config;
  source: ConfigSource;
  path: string;
}

const positiveNumber = z.coerce.number().positive();

const ConfigSchema = z.object({
  timeoutSeconds: positiveNumber.default(DEFAULT_TIMEOUT_SECONDS),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  readerUrl: z.string().url().default(DEFAULT_READER_URL),
  settleMs: z.coerce.number().int().nonnegative().default(DEFAULT_SETTLE_MS),
  minLength: positiveNumber.int().default(DEFAULT_QUALITY_POLICY.minLength),
  headWindow: positiveNumber.int().default(DEFAULT_QUALITY_POLICY.headWindow),
  signals: z.record(z.string(), z.enum(["reject", "allow"])).default({}),
});

// Values as read from TOML or the environment, before coercion.
type RawConfig = { [K in keyof z.input<typeof ConfigSchema>]?: unknown };

/**
 * Simple TOML parser for config file.
 * Handles sections and key-value pairs with quoted/unquoted strings and keys.
 */
export function parseToml(content: string): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {};
  let currentSection = "";

  for (const line of content.split("\n")) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    // Parse section header: [section]
    const sectionMatch = trimmed.match(/^\[([^\]]+)\]$/);
    if (sectionMatch && sectionMatch[1]) {
      currentSection = sectionMatch[1].trim();
      if (!result[currentSection]) {
        result[currentSection] = {};
      }
      continue;
    }

    // Parse key-value pair: key = "value", "quoted key" = value
    const kvMatch = trimmed.match(/^("[^"]*"|'[^']*'|[^=]+)=(.*)$/);
    if (kvMatch && kvMatch[1] && kvMatch[2] !== undefined && currentSection) {
      const section = result[currentSection];
      if (section) {
        section[unquote(kvMatch[1].trim())] = unquote(kvMatch[2].trim());
      }
    }
  }

  return result;
}

function unquote(value: string): string {
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }
  return value;
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.WEB_READ_CONFIG || join(homedir(), ".config", "web-read", "config.toml");
}

function readConfigFile(configPath: string): RawConfig | null {
  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw new ConfigError(`Could not read config file ${configPath}: ${String(error)}`);
  }

  const toml = parseToml(content);
  const raw: RawConfig = {};
  const fetchSection = toml.fetch ?? {};
  const readerSection = toml.reader ?? {};
  const browserSection = toml.browser ?? {};
  const qualitySection = toml.quality ?? {};

  if (fetchSection.timeout !== undefined) raw.timeoutSeconds = fetchSection.timeout;
  if (fetchSection.user_agent !== undefined) raw.userAgent = fetchSection.user_agent;
  if (readerSection.url !== undefined) raw.readerUrl = readerSection.url;
  if (browserSection.settle_ms !== undefined) raw.settleMs = browserSection.settle_ms;
  if (qualitySection.min_length !== undefined) raw.minLength = qualitySection.min_length;
  if (qualitySection.head_window !== undefined) raw.headWindow = qualitySection.head_window;
  if (toml.signals) raw.signals = toml.signals;

  return raw;
}

function readEnvironment(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  if (env.WEB_READ_TIMEOUT) raw.timeoutSeconds = env.WEB_READ_TIMEOUT;
  if (env.WEB_READ_USER_AGENT) raw.userAgent = env.WEB_READ_USER_AGENT;
  if (env.WEB_READ_READER_URL) raw.readerUrl = env.WEB_READ_READER_URL;
  if (env.WEB_READ_SETTLE_MS) raw.settleMs = env.WEB_READ_SETTLE_MS;
  if (env.WEB_READ_MIN_LENGTH) raw.minLength = env.WEB_READ_MIN_LENGTH;
  return raw;
}

/**
 * Load configuration from environment variables or config file.
 * Precedence: env vars > config file > defaults. A missing file is not an error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const path = defaultConfigPath(env);
  const fromFile = readConfigFile(path);
  const fromEnv = readEnvironment(env);

  const parsed = ConfigSchema.safeParse({ ...fromFile, ...fromEnv });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const hasEnv = Object.keys(fromEnv).length > 0;
  let source: ConfigSource = "defaults";
  if (fromFile && hasEnv) source = "file+environment";
  else if (fromFile) source = "file";
  else if (hasEnv) source = "environment";

  const { minLength, headWindow, signals, ...rest } = parsed.data;
  return {
    config: {
      ...rest,
      quality: createQualityPolicy({ minLength, headWindow, blockSignals: signals }),
    },
    source,
    path,
  };
}
