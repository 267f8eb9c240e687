export class WebReadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WebReadError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Network failure, timeout or a non-success HTTP status. */
export class TransportError extends WebReadError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/** Markup that could not be parsed, or an in-page script that threw. */
export class ParseError extends WebReadError {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

/** Tooling a tier needs is not installed or not usable in this runtime. */
export class CapabilityUnavailableError extends WebReadError {
  constructor(message: string) {
    super(message);
    this.name = "CapabilityUnavailableError";
  }
}

export class ConfigError extends WebReadError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
