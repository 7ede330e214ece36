import { fingerprint } from "../lib/hash";

import type { FeatureConfig } from "./config";
import { InsufficientHistoryError } from "./errors";
import { MIN_BARS, atr, ema, macd, momentum, pctChange, rsi, sma, stdev } from "./indicators";
import type { FeatureRow, FeatureSet, MarketBar, RawSeries } from "./types";

type ColumnSeries = { name: string; values: Array<number | null> };

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
* Sorts by timestamp, keeps the last bar seen for a duplicated timestamp,
* drops bars without a usable close, and fills missing open/high/low from the
* close and missing volume with 0.
*/
export function cleanBars(bars: readonly MarketBar[]): MarketBar[] {
  const byTime = new Map<string, MarketBar>();
  for (const bar of bars) {
    if (typeof bar.t !== "string" || !isFiniteNumber(bar.c) || bar.c <= 0) {
      continue;
    }

    byTime.set(bar.t, {
      t: bar.t,
      o: isFiniteNumber(bar.o) ? bar.o : bar.c,
      h: isFiniteNumber(bar.h) ? bar.h : bar.c,
      l: isFiniteNumber(bar.l) ? bar.l : bar.c,
      c: bar.c,
      v: isFiniteNumber(bar.v) ? bar.v : 0
    });
  }

  return Array.from(byTime.values()).sort((a, b) => a.t.localeCompare(b.t));
}

/**
* Minimum number of clean bars needed before every configured indicator
* produces a value on the last bar.
*/
export function requiredHistory(cfg: FeatureConfig): number {
  const { macd: m } = cfg;
  return Math.max(
    ...cfg.smaPeriods.map(MIN_BARS.sma),
    MIN_BARS.ema(cfg.emaPeriod),
    MIN_BARS.rsi(cfg.rsiPeriod),
    // volatility runs over one-bar returns, which start a bar late
    MIN_BARS.stdev(cfg.volatilityWindow) + 1,
    MIN_BARS.atr(cfg.atrPeriod),
    MIN_BARS.momentum(cfg.momentumPeriod),
    MIN_BARS.macdSignal(m.slowPeriod, m.signalPeriod)
  );
}

function computeColumns(bars: MarketBar[], cfg: FeatureConfig, returns: Array<number | null>): ColumnSeries[] {
  const close = bars.map((b) => b.c);
  const m = macd(close, cfg.macd.fastPeriod, cfg.macd.slowPeriod, cfg.macd.signalPeriod);

  return [
    ...cfg.smaPeriods.map((p) => ({ name: `sma${p}`, values: sma(close, p) })),
    { name: `ema${cfg.emaPeriod}`, values: ema(close, cfg.emaPeriod) },
    { name: `rsi${cfg.rsiPeriod}`, values: rsi(close, cfg.rsiPeriod) },
    { name: `volatility${cfg.volatilityWindow}`, values: stdev(returns, cfg.volatilityWindow) },
    { name: `atr${cfg.atrPeriod}`, values: atr(bars, cfg.atrPeriod) },
    { name: `momentum${cfg.momentumPeriod}`, values: momentum(close, cfg.momentumPeriod) },
    { name: "macd", values: m.macd },
    { name: "macdSignal", values: m.signal },
    { name: "macdHistogram", values: m.histogram }
  ];
}

/**
* Derives the feature set for one raw series.
*
* Pure: the output depends only on `raw.symbol`, `raw.bars` and `cfg`. Rows where
* any indicator is still warming up are omitted.
*/
export function transformSeries(raw: Pick<RawSeries, "symbol" | "interval" | "bars">, cfg: FeatureConfig): FeatureSet {
  const bars = cleanBars(raw.bars);
  const need = requiredHistory(cfg);
  if (bars.length < need) {
    throw new InsufficientHistoryError(raw.symbol, bars.length, need);
  }

  const returns = pctChange(bars.map((b) => b.c));
  const columns = computeColumns(bars, cfg, returns);

  const rows: FeatureRow[] = [];
  for (let i = 0; i < bars.length; i += 1) {
    const bar = bars[i];
    const ret = returns[i];
    if (!bar || !isFiniteNumber(ret)) {
      continue;
    }

    const indicators: Record<string, number> = {};
    let complete = true;
    for (const col of columns) {
      const v = col.values[i];
      if (!isFiniteNumber(v)) {
        complete = false;
        break;
      }
      indicators[col.name] = v;
    }
    if (!complete) {
      continue;
    }

    rows.push({
      t: bar.t,
      open: bar.o,
      high: bar.h,
      low: bar.l,
      close: bar.c,
      volume: bar.v,
      returnPct: ret,
      indicators
    });
  }

  const last = rows[rows.length - 1];
  if (!last || last.t !== bars[bars.length - 1]?.t) {
    throw new InsufficientHistoryError(raw.symbol, rows.length, need);
  }

  return {
    symbol: raw.symbol,
    interval: raw.interval,
    asOf: last.t,
    sourceFingerprint: fingerprint({ symbol: raw.symbol, interval: raw.interval, bars }),
    tailFingerprint: fingerprint({ symbol: raw.symbol, interval: raw.interval, bars: bars.slice(-need) }),
    configFingerprint: fingerprint(cfg),
    warmupRows: bars.length - rows.length,
    columns: columns.map((c) => c.name),
    rows
  };
}

export function lastFeatureRow(features: FeatureSet): FeatureRow | null {
  return features.rows[features.rows.length - 1] ?? null;
}
