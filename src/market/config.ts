import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { ConfigError } from "./errors";

export type FeatureConfig = {
  smaPeriods: number[];
  emaPeriod: number;
  rsiPeriod: number;
  volatilityWindow: number;
  atrPeriod: number;
  momentumPeriod: number;
  macd: { fastPeriod: number; slowPeriod: number; signalPeriod: number };
};

export type ForecastConfig = {
  lookback: number;
  deadband: number;
  epochs: number;
  learningRate: number;
  tolerance: number;
  minTrainingSamples: number;
  retrainAfterDays: number;
};

export type InsightProviderName = "openai" | "local";

export type InsightConfig = {
  provider: InsightProviderName;
  model: string;
  recentRows: number;
  maxPromptChars: number;
  maxCommentaryChars: number;
  maxTokens: number;
  temperature: number;
};

export type StageMode = "sequential" | "concurrent";

export type PipelineConfig = {
  history: { lookbackDays: number };
  features: FeatureConfig;
  forecast: ForecastConfig;
  insight: InsightConfig;
  retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };
  timeouts: { fetchMs: number; insightMs: number };
  concurrency: { symbols: number; insight: number };
  pipeline: { stageMode: StageMode };
  view: { freshForSeconds: number };
  schedule: { intervalHours: number };
  storage: { contentDir: string };
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  history: { lookbackDays: 730 },
  features: {
    smaPeriods: [5, 20, 50],
    emaPeriod: 20,
    rsiPeriod: 14,
    volatilityWindow: 20,
    atrPeriod: 14,
    momentumPeriod: 10,
    macd: { fastPeriod: 12, slowPeriod: 26, signalPeriod: 9 }
  },
  forecast: {
    lookback: 60,
    deadband: 0.5,
    epochs: 500,
    learningRate: 0.5,
    tolerance: 1e-9,
    minTrainingSamples: 40,
    retrainAfterDays: 7
  },
  insight: {
    provider: "openai",
    model: "gpt-4o-mini",
    recentRows: 5,
    maxPromptChars: 4000,
    maxCommentaryChars: 400,
    maxTokens: 120,
    temperature: 0.2
  },
  retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 15000 },
  timeouts: { fetchMs: 30000, insightMs: 60000 },
  concurrency: { symbols: 4, insight: 2 },
  pipeline: { stageMode: "sequential" },
  view: { freshForSeconds: 6 * 60 * 60 },
  schedule: { intervalHours: 6 },
  storage: { contentDir: "content/artifacts" }
};

const SYMBOL_PATTERN = /^[A-Z0-9.\-^=]{1,15}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${name} must be a mapping`);
  }
  return value;
}

function assertString(value: unknown, name: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${name} must be a non-empty string`);
  }
  return value;
}

function assertNumber(value: unknown, name: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a finite number`);
  }
  return value;
}

function assertNonNegative(value: unknown, name: string): number {
  const n = assertNumber(value, name);
  if (n < 0) {
    throw new ConfigError(`${name} must be >= 0, got ${n}`);
  }
  return n;
}

function assertPositive(value: unknown, name: string): number {
  const n = assertNumber(value, name);
  if (n <= 0) {
    throw new ConfigError(`${name} must be > 0, got ${n}`);
  }
  return n;
}

function assertPositiveInteger(value: unknown, name: string): number {
  const n = assertNumber(value, name);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${n}`);
  }
  return n;
}

function pick<T>(raw: Record<string, unknown>, key: string, fallback: T, check: (value: unknown, name: string) => T, name: string): T {
  const value = raw[key];
  return value === undefined ? fallback : check(value, `${name}.${key}`);
}

function assertOneOf<T extends string>(allowed: readonly T[]) {
  return (value: unknown, name: string): T => {
    const s = assertString(value, name);
    const match = allowed.find((a) => a === s);
    if (match === undefined) {
      throw new ConfigError(`${name} must be one of ${allowed.join(", ")}, got ${s}`);
    }
    return match;
  };
}

function assertPeriodList(value: unknown, name: string): number[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(`${name} must be a non-empty list of periods`);
  }
  const periods = value.map((p, i) => assertPositiveInteger(p, `${name}[${i}]`));
  return Array.from(new Set(periods)).sort((a, b) => a - b);
}

function parseFeatures(raw: Record<string, unknown>): FeatureConfig {
  const d = DEFAULT_PIPELINE_CONFIG.features;
  const macdRaw = section(raw, "macd");
  const macd = {
    fastPeriod: pick(macdRaw, "fastPeriod", d.macd.fastPeriod, assertPositiveInteger, "features.macd"),
    slowPeriod: pick(macdRaw, "slowPeriod", d.macd.slowPeriod, assertPositiveInteger, "features.macd"),
    signalPeriod: pick(macdRaw, "signalPeriod", d.macd.signalPeriod, assertPositiveInteger, "features.macd")
  };
  if (macd.fastPeriod >= macd.slowPeriod) {
    throw new ConfigError("features.macd.fastPeriod must be < slowPeriod");
  }

  return {
    smaPeriods: pick(raw, "smaPeriods", [...d.smaPeriods], assertPeriodList, "features"),
    emaPeriod: pick(raw, "emaPeriod", d.emaPeriod, assertPositiveInteger, "features"),
    rsiPeriod: pick(raw, "rsiPeriod", d.rsiPeriod, assertPositiveInteger, "features"),
    volatilityWindow: pick(raw, "volatilityWindow", d.volatilityWindow, assertPositiveInteger, "features"),
    atrPeriod: pick(raw, "atrPeriod", d.atrPeriod, assertPositiveInteger, "features"),
    momentumPeriod: pick(raw, "momentumPeriod", d.momentumPeriod, assertPositiveInteger, "features"),
    macd
  };
}

function parseForecast(raw: Record<string, unknown>): ForecastConfig {
  const d = DEFAULT_PIPELINE_CONFIG.forecast;
  return {
    lookback: pick(raw, "lookback", d.lookback, assertPositiveInteger, "forecast"),
    deadband: pick(raw, "deadband", d.deadband, assertNonNegative, "forecast"),
    epochs: pick(raw, "epochs", d.epochs, assertPositiveInteger, "forecast"),
    learningRate: pick(raw, "learningRate", d.learningRate, assertPositive, "forecast"),
    tolerance: pick(raw, "tolerance", d.tolerance, assertNonNegative, "forecast"),
    minTrainingSamples: pick(raw, "minTrainingSamples", d.minTrainingSamples, assertPositiveInteger, "forecast"),
    retrainAfterDays: pick(raw, "retrainAfterDays", d.retrainAfterDays, assertNonNegative, "forecast")
  };
}

function parseInsight(raw: Record<string, unknown>): InsightConfig {
  const d = DEFAULT_PIPELINE_CONFIG.insight;
  return {
    provider: pick(raw, "provider", d.provider, assertOneOf(["openai", "local"] as const), "insight"),
    model: pick(raw, "model", d.model, assertString, "insight"),
    recentRows: pick(raw, "recentRows", d.recentRows, assertPositiveInteger, "insight"),
    maxPromptChars: pick(raw, "maxPromptChars", d.maxPromptChars, assertPositiveInteger, "insight"),
    maxCommentaryChars: pick(raw, "maxCommentaryChars", d.maxCommentaryChars, assertPositiveInteger, "insight"),
    maxTokens: pick(raw, "maxTokens", d.maxTokens, assertPositiveInteger, "insight"),
    temperature: pick(raw, "temperature", d.temperature, assertNonNegative, "insight")
  };
}

/**
* Validates a parsed `pipeline.yml` document and fills in defaults.
*
* Environment overrides win over file values:
* `PIPELINE_INTERVAL_HOURS`, `MARKET_CONTENT_DIR`, `OPENAI_MODEL`.
*/
export function parsePipelineConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): PipelineConfig {
  const doc = raw === null || raw === undefined ? {} : raw;
  if (!isRecord(doc)) {
    throw new ConfigError("pipeline.yml must be a mapping");
  }

  const d = DEFAULT_PIPELINE_CONFIG;
  const history = section(doc, "history");
  const retry = section(doc, "retry");
  const timeouts = section(doc, "timeouts");
  const concurrency = section(doc, "concurrency");
  const pipeline = section(doc, "pipeline");
  const view = section(doc, "view");
  const schedule = section(doc, "schedule");
  const storage = section(doc, "storage");

  const cfg: PipelineConfig = {
    history: {
      lookbackDays: pick(history, "lookbackDays", d.history.lookbackDays, assertPositiveInteger, "history")
    },
    features: parseFeatures(section(doc, "features")),
    forecast: parseForecast(section(doc, "forecast")),
    insight: parseInsight(section(doc, "insight")),
    retry: {
      maxAttempts: pick(retry, "maxAttempts", d.retry.maxAttempts, assertPositiveInteger, "retry"),
      baseDelayMs: pick(retry, "baseDelayMs", d.retry.baseDelayMs, assertNonNegative, "retry"),
      maxDelayMs: pick(retry, "maxDelayMs", d.retry.maxDelayMs, assertNonNegative, "retry")
    },
    timeouts: {
      fetchMs: pick(timeouts, "fetchMs", d.timeouts.fetchMs, assertPositiveInteger, "timeouts"),
      insightMs: pick(timeouts, "insightMs", d.timeouts.insightMs, assertPositiveInteger, "timeouts")
    },
    concurrency: {
      symbols: pick(concurrency, "symbols", d.concurrency.symbols, assertPositiveInteger, "concurrency"),
      insight: pick(concurrency, "insight", d.concurrency.insight, assertPositiveInteger, "concurrency")
    },
    pipeline: {
      stageMode: pick(pipeline, "stageMode", d.pipeline.stageMode, assertOneOf(["sequential", "concurrent"] as const), "pipeline")
    },
    view: {
      freshForSeconds: pick(view, "freshForSeconds", d.view.freshForSeconds, assertNonNegative, "view")
    },
    schedule: {
      intervalHours: pick(schedule, "intervalHours", d.schedule.intervalHours, assertPositive, "schedule")
    },
    storage: {
      contentDir: pick(storage, "contentDir", d.storage.contentDir, assertString, "storage")
    }
  };

  if (cfg.retry.maxDelayMs < cfg.retry.baseDelayMs) {
    throw new ConfigError("retry.maxDelayMs must be >= retry.baseDelayMs");
  }

  if (env.PIPELINE_INTERVAL_HOURS) {
    cfg.schedule.intervalHours = assertPositive(Number(env.PIPELINE_INTERVAL_HOURS), "PIPELINE_INTERVAL_HOURS");
  }
  if (env.MARKET_CONTENT_DIR) {
    cfg.storage.contentDir = env.MARKET_CONTENT_DIR;
  }
  if (env.OPENAI_MODEL) {
    cfg.insight.model = env.OPENAI_MODEL;
  }

  return cfg;
}

export async function loadPipelineConfig(
  rootDir = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<PipelineConfig> {
  const raw = await readFile(path.join(rootDir, "config", "pipeline.yml"), "utf8");
  return parsePipelineConfig(parseYaml(raw), env);
}

/**
* Trims, upper-cases and de-duplicates symbols, keeping first-seen order.
*/
export function normalizeSymbols(symbols: readonly string[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();

  for (const raw of symbols) {
    const symbol = raw.trim().toUpperCase();
    if (symbol.length === 0) {
      continue;
    }
    if (!SYMBOL_PATTERN.test(symbol)) {
      throw new ConfigError(`Invalid symbol: ${raw}`);
    }
    if (seen.has(symbol)) {
      continue;
    }
    seen.add(symbol);
    out.push(symbol);
  }

  return out;
}

export function parseSymbolList(value: string): string[] {
  return normalizeSymbols(value.split(","));
}

/**
* Symbols come from `STOCK_TICKERS` (comma separated) when set, otherwise from
* `config/symbols.json`.
*/
export async function loadSymbols(rootDir = process.cwd(), env: NodeJS.ProcessEnv = process.env): Promise<string[]> {
  if (env.STOCK_TICKERS) {
    const fromEnv = parseSymbolList(env.STOCK_TICKERS);
    if (fromEnv.length === 0) {
      throw new ConfigError("STOCK_TICKERS is set but contains no symbols");
    }
    return fromEnv;
  }

  const raw = await readFile(path.join(rootDir, "config", "symbols.json"), "utf8");
  const json: unknown = JSON.parse(raw);
  if (!isRecord(json) || !Array.isArray(json.symbols) || !json.symbols.every((s) => typeof s === "string")) {
    throw new ConfigError("config/symbols.json must contain { symbols: string[] }");
  }

  const symbols = normalizeSymbols(json.symbols);
  if (symbols.length === 0) {
    throw new ConfigError("config/symbols.json lists no symbols");
  }
  return symbols;
}

export function resolveContentDir(cfg: PipelineConfig, rootDir = process.cwd()): string {
  return path.resolve(rootDir, cfg.storage.contentDir);
}
