import { withTimeout } from "./concurrency";
import { resolveContentDir, type PipelineConfig } from "./config";
import { TransientFetchError, errorMessage } from "./errors";
import { lastFeatureRow } from "./features";
import type { MarketDataGateway } from "./providers/types";
import { YahooMarketDataProvider } from "./providers/yahoo";
import { FileArtifactStore, type ArtifactStore } from "./storage";
import type { FeatureSet, ForecastArtifact, InsightArtifact, LiveQuote } from "./types";

export const FRESHNESS_STATES = ["live", "cached-fresh", "cached-stale", "unavailable"] as const;

export type FreshnessState = (typeof FRESHNESS_STATES)[number];

export type CachedComponent<T> =
  | { status: "present"; value: T; stalenessSeconds: number }
  | { status: "absent" };

export type CachedClose = {
  price: number;
  /**
  * Timestamp of the bar the close belongs to.
  */
  timestamp: string;
  /**
  * When the artifact holding the close was generated or committed.
  */
  generatedAt: string;
};

export type MarketView = {
  symbol: string;
  state: FreshnessState;
  livePrice: number | null;
  liveTimestamp: string | null;
  stale: boolean;
  notice: string | null;
  forecast: CachedComponent<ForecastArtifact>;
  insight: CachedComponent<InsightArtifact>;
  /**
  * Age of the oldest cached value served: the forecast, the insight and, when
  * the quote is missing, the cached close. `null` when nothing cached is served.
  */
  stalenessSeconds: number | null;
  servedAt: string;
};

export type FreshnessInput = {
  quote: LiveQuote | null;
  cachedClose: CachedClose | null;
  now: Date;
  freshForSeconds: number;
};

export type FreshnessResolution = {
  state: FreshnessState;
  price: number | null;
  timestamp: string | null;
  stale: boolean;
  notice: string | null;
};

function ageSeconds(now: Date, iso: string): number {
  const ms = Date.parse(iso);
  return Number.isFinite(ms) ? Math.max(0, Math.round((now.getTime() - ms) / 1000)) : Number.POSITIVE_INFINITY;
}

/**
* Live-versus-cached reconciliation.
*
* - quote available → `live`
* - quote missing, cached close younger than `freshForSeconds` → `cached-fresh`
* - quote missing, older cached close → `cached-stale`
* - nothing at all → `unavailable`
*
* Every state except `live` is flagged `stale`.
*/
export function resolveFreshness(input: FreshnessInput): FreshnessResolution {
  if (input.quote) {
    return {
      state: "live",
      price: input.quote.price,
      timestamp: input.quote.timestamp,
      stale: false,
      notice: null
    };
  }

  const cached = input.cachedClose;
  if (!cached) {
    return {
      state: "unavailable",
      price: null,
      timestamp: null,
      stale: true,
      notice: "live price unavailable and no cached data"
    };
  }

  const age = ageSeconds(input.now, cached.generatedAt);
  return {
    state: age <= input.freshForSeconds ? "cached-fresh" : "cached-stale",
    price: cached.price,
    timestamp: cached.timestamp,
    stale: true,
    notice: `live price unavailable, showing cached data as of ${cached.timestamp}`
  };
}

/**
* Picks the most recent close among the latest forecast and feature artifacts.
*/
export function pickCachedClose(
  forecast: ForecastArtifact | null,
  features: FeatureSet | null,
  featuresCommittedAt: string | null
): CachedClose | null {
  const candidates: CachedClose[] = [];
  if (forecast) {
    candidates.push({ price: forecast.lastClose, timestamp: forecast.asOf, generatedAt: forecast.generatedAt });
  }

  const lastRow = features ? lastFeatureRow(features) : null;
  if (lastRow && featuresCommittedAt) {
    candidates.push({ price: lastRow.close, timestamp: lastRow.t, generatedAt: featuresCommittedAt });
  }

  candidates.sort((a, b) => b.timestamp.localeCompare(a.timestamp) || b.generatedAt.localeCompare(a.generatedAt));
  return candidates[0] ?? null;
}

function cachedComponent<T extends { generatedAt: string }>(value: T | null, now: Date): CachedComponent<T> {
  if (!value) {
    return { status: "absent" };
  }
  return { status: "present", value, stalenessSeconds: ageSeconds(now, value.generatedAt) };
}

export type MarketViewAccessorOptions = {
  gateway: MarketDataGateway;
  store: ArtifactStore;
  freshForSeconds: number;
  quoteTimeoutMs: number;
  now?: () => Date;
};

/**
* Read-only merge of a live quote with the latest committed artifacts.
* Never writes to the store and never throws for missing or unreadable data.
*/
export class MarketViewAccessor {
  readonly #opts: MarketViewAccessorOptions;
  readonly #now: () => Date;

  constructor(opts: MarketViewAccessorOptions) {
    this.#opts = opts;
    this.#now = opts.now ?? (() => new Date());
  }

  async #readLatest<T>(label: string, read: () => Promise<T | null>): Promise<T | null> {
    try {
      return await read();
    } catch (error) {
      console.error(`[market:view] ${label}: ${errorMessage(error)}`);
      return null;
    }
  }

  async #fetchQuote(symbol: string, signal?: AbortSignal): Promise<LiveQuote | null> {
    const { gateway, quoteTimeoutMs } = this.#opts;
    try {
      return await withTimeout(
        quoteTimeoutMs,
        signal,
        () => new TransientFetchError(symbol, `quote timed out after ${quoteTimeoutMs}ms`),
        (s) => gateway.fetchQuote(symbol, s)
      );
    } catch (error) {
      console.error(`[market:view] live quote for ${symbol} unavailable: ${errorMessage(error)}`);
      return null;
    }
  }

  async getView(symbol: string, opts: { signal?: AbortSignal } = {}): Promise<MarketView> {
    const { store } = this.#opts;
    const key = symbol.trim().toUpperCase();

    const [quote, forecast, insight, features, featuresPointer] = await Promise.all([
      this.#fetchQuote(key, opts.signal),
      this.#readLatest(`${key} forecast`, () => store.get({ symbol: key, kind: "forecast", version: "latest" })),
      this.#readLatest(`${key} insight`, () => store.get({ symbol: key, kind: "insight", version: "latest" })),
      this.#readLatest(`${key} features`, () => store.get({ symbol: key, kind: "features", version: "latest" })),
      this.#readLatest(`${key} features pointer`, () => store.getLatestPointer(key, "features"))
    ]);

    const now = this.#now();
    const cachedClose = quote ? null : pickCachedClose(forecast, features, featuresPointer?.committedAt ?? null);
    const freshness = resolveFreshness({ quote, cachedClose, now, freshForSeconds: this.#opts.freshForSeconds });

    const forecastComponent = cachedComponent(forecast, now);
    const insightComponent = cachedComponent(insight, now);
    const ages = [forecastComponent, insightComponent].flatMap((c) => (c.status === "present" ? [c.stalenessSeconds] : []));
    if (cachedClose) {
      ages.push(ageSeconds(now, cachedClose.generatedAt));
    }

    return {
      symbol: key,
      state: freshness.state,
      livePrice: freshness.price,
      liveTimestamp: freshness.timestamp,
      stale: freshness.stale,
      notice: freshness.notice,
      forecast: forecastComponent,
      insight: insightComponent,
      stalenessSeconds: ages.length > 0 ? Math.max(...ages) : null,
      servedAt: now.toISOString()
    };
  }
}

export function createMarketViewAccessor(config: PipelineConfig, rootDir = process.cwd()): MarketViewAccessor {
  return new MarketViewAccessor({
    gateway: new YahooMarketDataProvider(),
    store: new FileArtifactStore(resolveContentDir(config, rootDir)),
    freshForSeconds: config.view.freshForSeconds,
    quoteTimeoutMs: config.timeouts.fetchMs
  });
}
