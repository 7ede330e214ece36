import type { MarketBar } from "./types";

/**
* Indicator output aligned with its input: index `i` belongs to bar `i`, and
* `null` marks a value that is still warming up or has a gap in its window.
*/
export type Series = Array<number | null>;

export type MacdSeries = {
  macd: Series;
  signal: Series;
  histogram: Series;
};

/**
* Bars each indicator needs before it emits its first value. The first
* non-null index of every series below is `MIN_BARS.<name>(...) - 1`.
*/
export const MIN_BARS = {
  sma: (period: number) => period,
  ema: (period: number) => period,
  stdev: (period: number) => period,
  rsi: (period: number) => period + 2,
  atr: (period: number) => period,
  momentum: (period: number) => period + 1,
  macdSignal: (slowPeriod: number, signalPeriod: number) => slowPeriod + signalPeriod - 1
} as const;

function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function assertPeriod(name: string, period: number): void {
  if (period <= 0) {
    throw new Error(`${name} period must be > 0, got ${period}`);
  }
}

function emptySeries(length: number): Series {
  return new Array<number | null>(length).fill(null);
}

/**
* Slides a window of `period` values and emits `reduce(sum, sumSq)` wherever
* every value in the window is finite.
*/
function rolling(values: Series, period: number, reduce: (sum: number, sumSq: number) => number): Series {
  const out = emptySeries(values.length);
  let sum = 0;
  let sumSq = 0;
  let finite = 0;

  for (let i = 0; i < values.length; i += 1) {
    const v = values[i];
    if (isFiniteNumber(v)) {
      sum += v;
      sumSq += v * v;
      finite += 1;
    }

    const leaving = i >= period ? values[i - period] : null;
    if (isFiniteNumber(leaving)) {
      sum -= leaving;
      sumSq -= leaving * leaving;
      finite -= 1;
    }

    if (finite === period) {
      out[i] = reduce(sum, sumSq);
    }
  }

  return out;
}

/**
* Recursive smoothing seeded with the first full simple average of `inputs`.
* `onGap` decides what a non-finite input emits; the running value is kept.
*/
function smoothFromSeed(
  inputs: Series,
  period: number,
  step: (prev: number, x: number) => number,
  onGap: (prev: number) => number | null
): Series {
  const seed = sma(inputs, period);
  const out = emptySeries(inputs.length);
  let prev: number | null = null;

  for (let i = 0; i < inputs.length; i += 1) {
    if (prev === null) {
      const seeded = seed[i];
      if (isFiniteNumber(seeded)) {
        prev = seeded;
        out[i] = prev;
      }
      continue;
    }

    const x = inputs[i];
    if (!isFiniteNumber(x)) {
      out[i] = onGap(prev);
      continue;
    }

    prev = step(prev, x);
    out[i] = prev;
  }

  return out;
}

export function sma(values: Series, period: number): Series {
  assertPeriod("SMA", period);
  return rolling(values, period, (sum) => sum / period);
}

/**
* Population standard deviation over a rolling window.
*/
export function stdev(values: Series, period: number): Series {
  assertPeriod("stdev", period);
  return rolling(values, period, (sum, sumSq) => {
    const mean = sum / period;
    return Math.sqrt(Math.max(0, sumSq / period - mean * mean));
  });
}

export function ema(values: Series, period: number): Series {
  assertPeriod("EMA", period);
  const k = 2 / (period + 1);
  return smoothFromSeed(values, period, (prev, x) => (x - prev) * k + prev, (prev) => prev);
}

/**
* Wilder RSI: the first `period` changes seed plain averages, later changes
* are smoothed. A window without losses reads 100.
*/
export function rsi(values: Series, period: number): Series {
  assertPeriod("RSI", period);

  const out = emptySeries(values.length);
  let gain = 0;
  let loss = 0;
  let seeded = false;

  for (let i = 1; i < values.length; i += 1) {
    const prev = values[i - 1];
    const curr = values[i];
    if (!isFiniteNumber(prev) || !isFiniteNumber(curr)) {
      continue;
    }

    const change = curr - prev;
    const up = Math.max(change, 0);
    const down = Math.max(-change, 0);

    if (i <= period) {
      gain += up;
      loss += down;
      if (i === period) {
        gain /= period;
        loss /= period;
        seeded = true;
      }
      continue;
    }
    if (!seeded) {
      continue;
    }

    gain = (gain * (period - 1) + up) / period;
    loss = (loss * (period - 1) + down) / period;
    out[i] = loss === 0 ? 100 : 100 - 100 / (1 + gain / loss);
  }

  return out;
}

function pairwise(a: Series, b: Series, combine: (x: number, y: number) => number): Series {
  return a.map((x, i) => {
    const y = b[i];
    return isFiniteNumber(x) && isFiniteNumber(y) ? combine(x, y) : null;
  });
}

export function macd(values: Series, fastPeriod: number, slowPeriod: number, signalPeriod: number): MacdSeries {
  if (fastPeriod <= 0 || slowPeriod <= 0 || signalPeriod <= 0) {
    throw new Error("MACD periods must all be > 0");
  }
  if (fastPeriod >= slowPeriod) {
    throw new Error(`MACD fastPeriod must be < slowPeriod (${fastPeriod} vs ${slowPeriod})`);
  }

  const line = pairwise(ema(values, fastPeriod), ema(values, slowPeriod), (f, s) => f - s);
  const signal = ema(line, signalPeriod);
  return { macd: line, signal, histogram: pairwise(line, signal, (m, s) => m - s) };
}

function trueRange(bars: readonly MarketBar[]): Series {
  return bars.map((bar, i) => {
    if (!isFiniteNumber(bar.h) || !isFiniteNumber(bar.l)) {
      return null;
    }

    const range = bar.h - bar.l;
    const prevClose = bars[i - 1]?.c;
    return isFiniteNumber(prevClose)
      ? Math.max(range, Math.abs(bar.h - prevClose), Math.abs(bar.l - prevClose))
      : range;
  });
}

/**
* Wilder-smoothed average true range. A bar without a usable range emits null.
*/
export function atr(bars: readonly MarketBar[], period: number): Series {
  assertPeriod("ATR", period);
  return smoothFromSeed(trueRange(bars), period, (prev, tr) => (prev * (period - 1) + tr) / period, () => null);
}

/**
* Rate of change over `period` bars, in percent. A zero base emits null.
*/
export function momentum(values: Series, period: number): Series {
  assertPeriod("momentum", period);
  return values.map((curr, i) => {
    const base = i >= period ? values[i - period] : null;
    return isFiniteNumber(base) && isFiniteNumber(curr) && base !== 0 ? ((curr - base) / base) * 100 : null;
  });
}

/**
* One-bar percent change; index 0 is always null.
*/
export function pctChange(values: Series): Series {
  return momentum(values, 1);
}
