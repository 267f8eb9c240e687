import { loadConfig, type LoadedConfig } from "./config";
import { errorMessage } from "./exceptions";
import { NO_CONTENT_ERROR, formatResult, toExtractionResult } from "./output";
import { fetchContent } from "./pipeline";
import type { CliOptions, OutputFormat } from "./types";

export const USAGE =
  "Usage: web-read <url> [timeout_seconds] [--format text|json|jsonl] [--check-config]";

const PREFIX = "[web-read]";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
}

export interface CliDeps {
  fetchContent: typeof fetchContent;
  loadConfig: typeof loadConfig;
}

const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
  env: process.env,
};

function isOutputFormat(value: string): value is OutputFormat {
  return value === "text" || value === "json" || value === "jsonl";
}

export type ParsedArgs = CliOptions & {
  help: boolean;
  /** Set when the arguments cannot be used, e.g. an unknown flag. */
  usageError?: string;
};

const VALUE_FLAGS = new Set(["--format", "--timeout"]);

function isFlag(arg: string): boolean {
  return arg.startsWith("--") || /^-[a-z]/i.test(arg);
}

export function parseArgs(args: string[]): ParsedArgs {
  const options: ParsedArgs = {
    format: "text",
    checkConfig: false,
    help: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (arg === "--config" || arg === "--check-config") {
      options.checkConfig = true;
    } else if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || isFlag(value)) {
        options.usageError = options.usageError ?? `Missing value for ${arg}`;
        continue;
      }
      if (arg === "--timeout") {
        options.timeout = Number(value);
      } else if (isOutputFormat(value)) {
        options.format = value;
      }
      i++;
    } else if (isFlag(arg)) {
      options.usageError = options.usageError ?? `Unknown option: ${arg}`;
    } else {
      positional.push(arg);
    }
  }

  const [url, timeout] = positional;
  if (url) {
    options.url = url;
  }
  if (timeout !== undefined && options.timeout === undefined) {
    options.timeout = Number(timeout);
  }

  return options;
}

function checkConfig(io: CliIO, deps: CliDeps): number {
  let loaded: LoadedConfig;
  try {
    loaded = deps.loadConfig(io.env);
  } catch (error) {
    io.stderr("✗ Failed to load config:");
    io.stderr(`  ${errorMessage(error)}`);
    return 1;
  }

  const { config, source, path } = loaded;
  const signals = Object.entries(config.quality.blockSignals)
    .filter(([, effect]) => effect === "reject")
    .map(([signal]) => signal);

  io.stdout("✓ Config loaded successfully!");
  io.stdout("");
  io.stdout("Configuration:");
  io.stdout(`  Timeout: ${config.timeoutSeconds}s per tier`);
  io.stdout(`  User agent: ${config.userAgent}`);
  io.stdout(`  Reader URL: ${config.readerUrl}`);
  io.stdout(`  Browser settle: ${config.settleMs}ms`);
  io.stdout(`  Minimum length: ${config.quality.minLength}`);
  io.stdout(`  Block signals: ${signals.join(", ")}`);
  io.stdout("");
  io.stdout("Config source:");
  io.stdout(`  ${source} (file: ${path})`);
  return 0;
}

/**
 * Runs the command and resolves to the process exit status.
 */
export async function run(
  argv: string[],
  io: CliIO = processIO,
  deps: CliDeps = { fetchContent, loadConfig }
): Promise<number> {
  const options = parseArgs(argv);

  if (options.help) {
    io.stderr(USAGE);
    return 0;
  }

  if (options.usageError) {
    io.stderr(`${PREFIX} ${options.usageError}`);
    io.stderr(USAGE);
    return 1;
  }

  if (options.checkConfig) {
    return checkConfig(io, deps);
  }

  if (!options.url) {
    io.stderr(USAGE);
    return 1;
  }

  if (options.timeout !== undefined && !(Number.isFinite(options.timeout) && options.timeout > 0)) {
    io.stderr(`${PREFIX} Timeout must be a positive number of seconds.`);
    return 1;
  }

  let loaded: LoadedConfig;
  try {
    loaded = deps.loadConfig(io.env);
  } catch (error) {
    io.stderr(`${PREFIX} ${errorMessage(error)}`);
    return 1;
  }

  const timeout = options.timeout ?? loaded.config.timeoutSeconds;
  const outcome = await deps.fetchContent(options.url, timeout, { config: loaded.config });
  const result = toExtractionResult(options.url, outcome);

  if (outcome.content) {
    io.stderr(`${PREFIX} Fetched via ${outcome.tier}`);
    io.stdout(formatResult(result, options.format));
    return 0;
  }

  io.stderr(`${PREFIX} ${NO_CONTENT_ERROR}`);
  if (options.format !== "text") {
    io.stdout(formatResult(result, options.format));
  }
  return 1;
}
