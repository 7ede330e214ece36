export type MarketErrorCode =
  | "transient_fetch"
  | "no_data"
  | "insufficient_history"
  | "forecast_failed"
  | "insight_failed"
  | "store_failed"
  | "config_invalid"
  | "cancelled";

export class MarketPipelineError extends Error {
  readonly code: MarketErrorCode;
  readonly retryable: boolean;

  constructor(code: MarketErrorCode, message: string, opts: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "MarketPipelineError";
    this.code = code;
    this.retryable = opts.retryable ?? false;
  }
}

/**
* Network, rate-limit and provider-side failures. Retried with backoff.
*/
export class TransientFetchError extends MarketPipelineError {
  constructor(symbol: string, message: string, cause?: unknown) {
    super("transient_fetch", `Transient fetch failure for ${symbol}: ${message}`, { retryable: true, cause });
    this.name = "TransientFetchError";
  }
}

/**
* The provider returned nothing for the symbol (delisted, unknown, empty window).
*/
export class NoDataError extends MarketPipelineError {
  constructor(symbol: string, detail = "provider returned an empty series") {
    super("no_data", `No data for ${symbol}: ${detail}`);
    this.name = "NoDataError";
  }
}

export class InsufficientHistoryError extends MarketPipelineError {
  readonly have: number;
  readonly need: number;

  constructor(symbol: string, have: number, need: number) {
    super("insufficient_history", `Insufficient history for ${symbol}: have ${have} bars, need >= ${need}`);
    this.name = "InsufficientHistoryError";
    this.have = have;
    this.need = need;
  }
}

export class ForecastError extends MarketPipelineError {
  constructor(symbol: string, message: string, cause?: unknown) {
    super("forecast_failed", `Forecast failed for ${symbol}: ${message}`, { cause });
    this.name = "ForecastError";
  }
}

export class InsightError extends MarketPipelineError {
  constructor(symbol: string, message: string, cause?: unknown) {
    super("insight_failed", `Insight failed for ${symbol}: ${message}`, { cause });
    this.name = "InsightError";
  }
}

export class StoreError extends MarketPipelineError {
  constructor(message: string, cause?: unknown) {
    super("store_failed", message, { cause });
    this.name = "StoreError";
  }
}

export class ConfigError extends MarketPipelineError {
  constructor(message: string) {
    super("config_invalid", message);
    this.name = "ConfigError";
  }
}

export class CancelledError extends MarketPipelineError {
  constructor(message = "Operation cancelled") {
    super("cancelled", message);
    this.name = "CancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorSummary(error: unknown): { code: string; message: string } {
  if (error instanceof MarketPipelineError) {
    return { code: error.code, message: error.message };
  }

  return { code: "unknown", message: errorMessage(error) };
}
