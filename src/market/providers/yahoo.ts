import YahooFinance from "yahoo-finance2";

import { throwIfAborted } from "../concurrency";
import { MarketPipelineError, NoDataError, TransientFetchError, errorMessage } from "../errors";
import { MARKET_INTERVAL, type HistoryRange, type LiveQuote, type MarketBar, type RawSeries } from "../types";

import type { MarketDataGateway } from "./types";

const PROVIDER = "yahoo-finance";

// Provider messages that mean "this symbol has nothing", as opposed to a flaky request.
const NO_DATA_PATTERN = /not found|no data|delisted|invalid symbol|symbol may be/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function finiteOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
* Converts chart quotes to bars, applying the `adjclose / close` ratio to every
* price field so splits and dividends are reflected consistently.
*
* Quotes without a date or a finite close are dropped; a missing open/high/low
* falls back to the close and a missing volume to 0.
*/
export function toMarketBars(quotes: readonly unknown[]): MarketBar[] {
  const bars: MarketBar[] = [];

  for (const q of quotes) {
    if (!isRecord(q) || !(q.date instanceof Date)) {
      continue;
    }

    const close = q.close;
    if (typeof close !== "number" || !Number.isFinite(close) || close <= 0) {
      continue;
    }

    const adjclose = q.adjclose;
    const factor = typeof adjclose === "number" && Number.isFinite(adjclose) && adjclose > 0 ? adjclose / close : 1;

    bars.push({
      t: q.date.toISOString(),
      o: finiteOr(q.open, close) * factor,
      h: finiteOr(q.high, close) * factor,
      l: finiteOr(q.low, close) * factor,
      c: close * factor,
      v: finiteOr(q.volume, 0)
    });
  }

  bars.sort((a, b) => a.t.localeCompare(b.t));
  return bars;
}

export function classifyProviderError(symbol: string, error: unknown): MarketPipelineError {
  if (error instanceof MarketPipelineError) {
    return error;
  }

  const message = errorMessage(error);
  if (NO_DATA_PATTERN.test(message)) {
    return new NoDataError(symbol, message);
  }

  return new TransientFetchError(symbol, message, error);
}

export function toLiveQuote(symbol: string, raw: unknown, now: Date): LiveQuote {
  if (!isRecord(raw)) {
    throw new NoDataError(symbol, "provider returned no quote");
  }

  const price = raw.regularMarketPrice;
  if (typeof price !== "number" || !Number.isFinite(price) || price <= 0) {
    throw new NoDataError(symbol, "quote has no regular market price");
  }

  const time = raw.regularMarketTime;
  return {
    symbol,
    price,
    timestamp: (time instanceof Date ? time : now).toISOString()
  };
}

export class YahooMarketDataProvider implements MarketDataGateway {
  readonly #yf: InstanceType<typeof YahooFinance>;

  constructor() {
    this.#yf = new YahooFinance();
  }

  async fetchHistory(symbol: string, range: HistoryRange, signal?: AbortSignal): Promise<RawSeries> {
    throwIfAborted(signal);
    const fetchedAt = new Date().toISOString();

    let res: unknown;
    try {
      res = await this.#yf.chart(symbol, { interval: MARKET_INTERVAL, period1: range.start, period2: range.end });
    } catch (error) {
      throw classifyProviderError(symbol, error);
    }

    const quotes = isRecord(res) && Array.isArray(res.quotes) ? res.quotes : [];
    const bars = toMarketBars(quotes);
    if (bars.length === 0) {
      throw new NoDataError(symbol);
    }

    return {
      symbol,
      interval: MARKET_INTERVAL,
      provider: PROVIDER,
      fetchedAt,
      bars
    };
  }

  async fetchQuote(symbol: string, signal?: AbortSignal): Promise<LiveQuote> {
    throwIfAborted(signal);

    let res: unknown;
    try {
      res = await this.#yf.quote(symbol);
    } catch (error) {
      throw classifyProviderError(symbol, error);
    }

    return toLiveQuote(symbol, res, new Date());
  }
}
