import { parsePipelineConfig, type PipelineConfig } from "./config";
import type { FeatureSet, MarketBar, RawSeries } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;
const START_MS = Date.UTC(2024, 0, 1);

/**
* Small indicator periods so a few dozen bars are enough history.
* Needs 5 bars; the first 4 are warm-up.
*/
export function testConfig(overrides: Record<string, unknown> = {}): PipelineConfig {
  return parsePipelineConfig({
    features: {
      smaPeriods: [3],
      emaPeriod: 3,
      rsiPeriod: 3,
      volatilityWindow: 3,
      atrPeriod: 3,
      momentumPeriod: 2,
      macd: { fastPeriod: 2, slowPeriod: 4, signalPeriod: 2 }
    },
    forecast: { lookback: 5, minTrainingSamples: 10, epochs: 200, learningRate: 0.5 },
    insight: { provider: "local" },
    retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    timeouts: { fetchMs: 1000, insightMs: 1000 },
    ...overrides
  });
}

export function dayIso(index: number): string {
  return new Date(START_MS + index * DAY_MS).toISOString();
}

export function waveCloses(count: number, offset = 0): number[] {
  return Array.from({ length: count }, (_, i) => 100 + offset + i * 0.3 + 2 * Math.sin(i / 3));
}

export function makeBars(closes: readonly number[]): MarketBar[] {
  return closes.map((c, i) => ({ t: dayIso(i), o: c, h: c + 1, l: c - 1, c, v: 1000 + i }));
}

export function makeSeries(symbol: string, closes: readonly number[]): RawSeries {
  return {
    symbol,
    interval: "1d",
    provider: "test",
    fetchedAt: "2024-06-01T00:00:00.000Z",
    bars: makeBars(closes)
  };
}

export function makeFeatureSet(symbol: string, closes: readonly number[]): FeatureSet {
  const rows = closes.map((close, i) => ({
    t: dayIso(i),
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1000,
    returnPct: i === 0 ? 0 : ((close - (closes[i - 1] ?? close)) / (closes[i - 1] ?? close)) * 100,
    indicators: { rsi3: 55, volatility3: 1.25 }
  }));

  return {
    symbol,
    interval: "1d",
    asOf: dayIso(closes.length - 1),
    sourceFingerprint: "source",
    tailFingerprint: "tail",
    configFingerprint: "config",
    warmupRows: 0,
    columns: ["rsi3", "volatility3"],
    rows
  };
}
