// Error types raised by the OCC codec, the strike ladder and the Massive client

export type OccErrorCode = "INVALID_FORMAT" | "INVALID_TICKER" | "INVALID_RANGE";

export class OccError extends Error {
  readonly code: OccErrorCode;
  readonly input: unknown;

  constructor(code: OccErrorCode, message: string, input: unknown) {
    super(message);
    this.name = "OccError";
    this.code = code;
    this.input = input;
  }
}

/** A positional field (expiration date, root, strike) does not fit the fixed-width layout. */
export class InvalidFormatError extends OccError {
  constructor(message: string, input: unknown) {
    super("INVALID_FORMAT", message, input);
    this.name = "InvalidFormatError";
  }
}

export class InvalidTickerError extends OccError {
  constructor(ticker: string) {
    super("INVALID_TICKER", `Invalid OCC option ticker: ${ticker}`, ticker);
    this.name = "InvalidTickerError";
  }
}

export class InvalidRangeError extends OccError {
  constructor(message: string, input: unknown) {
    super("INVALID_RANGE", message, input);
    this.name = "InvalidRangeError";
  }
}

export class MassiveApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(`Massive ${status}: ${message}`);
    this.name = "MassiveApiError";
    this.status = status;
  }
}

export class MissingApiKeyError extends Error {
  constructor() {
    super("MASSIVE_API_KEY is not configured");
    this.name = "MissingApiKeyError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof OccError) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
