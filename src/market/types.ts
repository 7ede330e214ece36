export type MarketInterval = "1d";

export const MARKET_INTERVAL: MarketInterval = "1d";

export type MarketBar = {
  t: string;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
};

export type RawSeries = {
  symbol: string;
  interval: MarketInterval;
  provider: string;
  fetchedAt: string;
  bars: MarketBar[];
};

export type HistoryRange = {
  start: Date;
  end: Date;
};

export type LiveQuote = {
  symbol: string;
  price: number;
  timestamp: string;
};

export type FeatureRow = {
  t: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  returnPct: number;
  /**
  * Keyed by indicator column name (e.g. `sma20`, `rsi14`).
  */
  indicators: Record<string, number>;
};

/**
* Derived, deterministic view of a RawSeries.
*
* Rows whose indicators are still warming up are omitted, never null-filled;
* `warmupRows` records how many leading bars were dropped for that reason.
* The object carries no wall-clock fields so identical input serializes to
* identical bytes.
*/
export type FeatureSet = {
  symbol: string;
  interval: MarketInterval;
  asOf: string;
  /**
  * Digest of every bar in the fetched window. Moves whenever the window's
  * start moves, even without a new bar.
  */
  sourceFingerprint: string;
  /**
  * Digest of the newest bars only (as many as the slowest indicator needs).
  * Equal tails with an equal `asOf` mean the series has neither grown nor
  * been revised at its end.
  */
  tailFingerprint: string;
  configFingerprint: string;
  warmupRows: number;
  columns: string[];
  rows: FeatureRow[];
};

export const DIRECTIONS = ["up", "down", "flat"] as const;

export type Direction = (typeof DIRECTIONS)[number];

export type ForecastArtifact = {
  symbol: string;
  asOf: string;
  predictedClose: number;
  lastClose: number;
  changePct: number;
  direction: Direction;
  deadband: number;
  modelVersion: string;
  generatedAt: string;
};

export type InsightArtifact = {
  symbol: string;
  asOf: string;
  commentary: string;
  generatedAt: string;
  sourceModelId: string;
  forecastReferenced: boolean;
};

export type ModelSnapshot = {
  algorithm: string;
  version: string;
  lookback: number;
  weights: number[];
  bias: number;
  scale: { min: number; max: number };
  trainedAsOf: string;
  trainedAt: string;
  samples: number;
  epochs: number;
  finalLoss: number;
  configFingerprint: string;
};

export const ARTIFACT_KINDS = ["raw", "features", "forecast", "insight", "model"] as const;

export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

export type ArtifactPayloads = {
  raw: RawSeries;
  features: FeatureSet;
  forecast: ForecastArtifact;
  insight: InsightArtifact;
  model: ModelSnapshot;
};

export type ArtifactKey<K extends ArtifactKind = ArtifactKind> = {
  symbol: string;
  kind: K;
  version: string | "latest";
};

export type LatestPointer = {
  symbol: string;
  kind: ArtifactKind;
  version: string;
  committedAt: string;
};

export type StageName = "fetch" | "transform" | "forecast" | "insight" | "commit";

export type StageStatus = "ok" | "failed" | "skipped";

export type StageOutcome = {
  status: StageStatus;
  attempts: number;
  durationMs: number;
  error?: { code: string; message: string };
  reason?: string;
};

export const SYMBOL_STATES = ["committed", "partially_committed", "failed", "unchanged"] as const;

export type SymbolState = (typeof SYMBOL_STATES)[number];

export type SymbolOutcome = {
  symbol: string;
  state: SymbolState;
  asOf: string | null;
  stages: Partial<Record<StageName, StageOutcome>>;
  versions: Partial<Record<ArtifactKind, string>>;
};

export type PipelineRunRecord = {
  runId: string;
  asOf: string;
  force: boolean;
  startedAt: string;
  endedAt: string;
  symbols: SymbolOutcome[];
  totals: Record<SymbolState, number>;
};

export type RunReport = PipelineRunRecord;
