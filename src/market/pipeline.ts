import { randomUUID } from "node:crypto";

import { RetryExhaustedError, createLimiter, mapWithConcurrency, withRetry, withTimeout } from "./concurrency";
import { loadPipelineConfig, loadSymbols, normalizeSymbols, resolveContentDir, type PipelineConfig } from "./config";
import {
  CancelledError,
  ConfigError,
  NoDataError,
  StoreError,
  TransientFetchError,
  errorMessage,
  toErrorSummary
} from "./errors";
import { transformSeries } from "./features";
import { Forecaster, type ForecastResult } from "./forecast/forecaster";
import { createLanguageModelClient } from "./insight/client";
import { InsightGenerator } from "./insight/generator";
import type { MarketDataGateway } from "./providers/types";
import { YahooMarketDataProvider } from "./providers/yahoo";
import { FileArtifactStore, type ArtifactStore } from "./storage";
import type {
  ArtifactKind,
  ArtifactPayloads,
  FeatureSet,
  ForecastArtifact,
  HistoryRange,
  InsightArtifact,
  LatestPointer,
  ModelSnapshot,
  RawSeries,
  RunReport,
  StageName,
  StageOutcome,
  SymbolOutcome,
  SymbolState
} from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type PipelineDeps = {
  config: PipelineConfig;
  gateway: MarketDataGateway;
  store: ArtifactStore;
  forecaster: Forecaster;
  insights: InsightGenerator;
  now?: () => Date;
  newRunId?: () => string;
};

export type RunOptions = {
  symbols: readonly string[];
  asOf: Date | string;
  force?: boolean;
  signal?: AbortSignal;
  concurrency?: number;
};

type PendingArtifact = {
  [K in ArtifactKind]: { kind: K; version: string; payload: ArtifactPayloads[K] };
}[ArtifactKind];

type StageResult<T> = { ok: true; value: T; outcome: StageOutcome } | { ok: false; error: unknown; outcome: StageOutcome };

export function historyRange(asOf: Date, lookbackDays: number): HistoryRange {
  return { start: new Date(asOf.getTime() - lookbackDays * DAY_MS), end: asOf };
}

function parseAsOf(value: Date | string): Date {
  const d = value instanceof Date ? value : new Date(value);
  if (!Number.isFinite(d.getTime())) {
    throw new ConfigError(`Invalid as-of timestamp: ${String(value)}`);
  }
  return d;
}

function failedOutcome(error: unknown, startedAt: number, attempts = 1): StageOutcome {
  return { status: "failed", attempts, durationMs: Date.now() - startedAt, error: toErrorSummary(error) };
}

function skippedOutcome(reason: string): StageOutcome {
  return { status: "skipped", attempts: 0, durationMs: 0, reason };
}

async function runStage<T>(fn: () => Promise<T> | T): Promise<StageResult<T>> {
  const startedAt = Date.now();
  try {
    const value = await fn();
    return { ok: true, value, outcome: { status: "ok", attempts: 1, durationMs: Date.now() - startedAt } };
  } catch (error) {
    return { ok: false, error, outcome: failedOutcome(error, startedAt) };
  }
}

function summarizeTotals(outcomes: readonly SymbolOutcome[]): Record<SymbolState, number> {
  const totals: Record<SymbolState, number> = { committed: 0, partially_committed: 0, failed: 0, unchanged: 0 };
  for (const o of outcomes) {
    totals[o.state] += 1;
  }
  return totals;
}

class SymbolPipeline {
  readonly #deps: PipelineDeps;
  readonly #asOf: Date;
  readonly #force: boolean;
  readonly #signal: AbortSignal | undefined;
  readonly outcome: SymbolOutcome;

  constructor(deps: PipelineDeps, symbol: string, asOf: Date, force: boolean, signal: AbortSignal | undefined) {
    this.#deps = deps;
    this.#asOf = asOf;
    this.#force = force;
    this.#signal = signal;
    this.outcome = { symbol, state: "failed", asOf: null, stages: {}, versions: {} };
  }

  get symbol(): string {
    return this.outcome.symbol;
  }

  #record(stage: StageName, outcome: StageOutcome): void {
    this.outcome.stages[stage] = outcome;
  }

  #skipRemaining(stages: readonly StageName[], reason: string): void {
    for (const stage of stages) {
      this.#record(stage, skippedOutcome(reason));
    }
  }

  async run(): Promise<SymbolOutcome> {
    const raw = await this.#fetch();
    if (!raw) {
      this.#skipRemaining(["transform", "forecast", "insight", "commit"], "fetch did not succeed");
      return this.outcome;
    }

    const transformed = await runStage(() => transformSeries(raw, this.#deps.config.features));
    this.#record("transform", transformed.outcome);
    if (!transformed.ok) {
      console.error(`[market:transform] ${this.symbol}: ${errorMessage(transformed.error)}`);
      this.#skipRemaining(["forecast", "insight", "commit"], "transform did not succeed");
      return this.outcome;
    }

    const features = transformed.value;
    this.outcome.asOf = features.asOf;

    if (!this.#force && (await this.#isUnchanged(features))) {
      this.outcome.state = "unchanged";
      this.#skipRemaining(["forecast", "insight", "commit"], "inputs unchanged since last commit");
      console.log(`[market:run] ${this.symbol} unchanged as of ${features.asOf}`);
      return this.outcome;
    }

    const { forecast, insight } = await this.#forecastAndInsight(features);

    if (this.#signal?.aborted) {
      this.#record("commit", failedOutcome(new CancelledError("run cancelled before commit"), Date.now(), 0));
      return this.outcome;
    }

    await this.#commit(raw, features, forecast, insight);
    return this.outcome;
  }

  async #fetch(): Promise<RawSeries | null> {
    const { config, gateway } = this.#deps;
    const range = historyRange(this.#asOf, config.history.lookbackDays);
    const startedAt = Date.now();

    try {
      const { value, attempts } = await withRetry(
        {
          ...config.retry,
          signal: this.#signal,
          onRetry: ({ attempt, delayMs, error }) =>
            console.error(
              `[market:fetch] ${this.symbol} attempt ${attempt} failed (${errorMessage(error)}); retrying in ${delayMs}ms`
            )
        },
        () =>
          withTimeout(
            config.timeouts.fetchMs,
            this.#signal,
            () => new TransientFetchError(this.symbol, `timed out after ${config.timeouts.fetchMs}ms`),
            (signal) => gateway.fetchHistory(this.symbol, range, signal)
          )
      );
      this.#record("fetch", { status: "ok", attempts, durationMs: Date.now() - startedAt });
      return value;
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;

      if (cause instanceof NoDataError) {
        this.#record("fetch", { ...failedOutcome(cause, startedAt, attempts), status: "skipped", reason: "no_data" });
        console.error(`[market:fetch] ${this.symbol} skipped: ${cause.message}`);
        return null;
      }

      this.#record("fetch", failedOutcome(cause, startedAt, attempts));
      console.error(`[market:fetch] ${this.symbol} failed after ${attempts} attempt(s): ${errorMessage(cause)}`);
      return null;
    }
  }

  /**
  * The fetch window slides with the as-of, so the whole-window digest is not
  * compared here: only the newest bar, the tail of the series and the feature
  * settings decide whether anything new arrived.
  */
  async #isUnchanged(features: FeatureSet): Promise<boolean> {
    const { store } = this.#deps;
    try {
      const previous = await store.get({ symbol: this.symbol, kind: "features", version: "latest" });
      if (
        !previous ||
        previous.asOf !== features.asOf ||
        previous.tailFingerprint !== features.tailFingerprint ||
        previous.configFingerprint !== features.configFingerprint
      ) {
        return false;
      }

      for (const kind of ["features", "forecast", "insight"] as const) {
        const pointer = await store.getLatestPointer(this.symbol, kind);
        if (pointer) {
          this.outcome.versions[kind] = pointer.version;
        }
      }
      return true;
    } catch (error) {
      console.error(`[market:run] ${this.symbol}: could not read latest artifacts (${errorMessage(error)}); recomputing`);
      return false;
    }
  }

  async #forecastAndInsight(features: FeatureSet): Promise<{
    forecast: StageResult<ForecastResult>;
    insight: StageResult<InsightArtifact>;
  }> {
    const { store, forecaster, insights, config } = this.#deps;

    let previousModel: ModelSnapshot | null = null;
    try {
      previousModel = await store.get({ symbol: this.symbol, kind: "model", version: "latest" });
    } catch (error) {
      console.error(`[market:forecast] ${this.symbol}: could not load persisted model (${errorMessage(error)}); retraining`);
    }

    const runForecast = () => runStage(() => forecaster.predict(features, previousModel));
    const runInsight = (forecast: ForecastArtifact | null) =>
      runStage(() => insights.summarize(features, forecast, { signal: this.#signal }));

    let forecast: StageResult<ForecastResult>;
    let insight: StageResult<InsightArtifact>;
    if (config.pipeline.stageMode === "concurrent") {
      [forecast, insight] = await Promise.all([runForecast(), runInsight(null)]);
    } else {
      forecast = await runForecast();
      insight = await runInsight(forecast.ok ? forecast.value.forecast : null);
    }

    this.#record("forecast", forecast.outcome);
    this.#record("insight", insight.outcome);

    if (!forecast.ok) {
      console.error(`[market:forecast] ${this.symbol}: ${errorMessage(forecast.error)}`);
    }
    if (!insight.ok) {
      console.error(`[market:insight] ${this.symbol}: ${errorMessage(insight.error)}`);
    }

    return { forecast, insight };
  }

  async #commit(
    raw: RawSeries,
    features: FeatureSet,
    forecast: StageResult<ForecastResult>,
    insight: StageResult<InsightArtifact>
  ): Promise<void> {
    const { store } = this.#deps;
    const symbol = this.symbol;
    const startedAt = Date.now();

    const pending: PendingArtifact[] = [];
    try {
      pending.push({ kind: "raw", version: await store.nextVersion(symbol, "raw", features.asOf), payload: raw });
      pending.push({
        kind: "features",
        version: await store.nextVersion(symbol, "features", features.asOf),
        payload: features
      });
      if (forecast.ok) {
        pending.push({
          kind: "forecast",
          version: await store.nextVersion(symbol, "forecast", features.asOf),
          payload: forecast.value.forecast
        });
        if (forecast.value.trained) {
          pending.push({
            kind: "model",
            version: await store.nextVersion(symbol, "model", forecast.value.model.trainedAsOf),
            payload: forecast.value.model
          });
        }
      }
      if (insight.ok) {
        pending.push({
          kind: "insight",
          version: await store.nextVersion(symbol, "insight", features.asOf),
          payload: insight.value
        });
      }

      for (const artifact of pending) {
        await store.put({ symbol, kind: artifact.kind, version: artifact.version }, artifact.payload);
      }
    } catch (error) {
      this.#record("commit", failedOutcome(error, startedAt));
      console.error(`[market:commit] ${symbol}: nothing advanced: ${errorMessage(error)}`);
      return;
    }

    const advanced: Array<{ kind: ArtifactKind; previous: LatestPointer | null }> = [];
    try {
      for (const artifact of pending) {
        const previous = await store.getLatestPointer(symbol, artifact.kind);
        await store.advanceLatest(symbol, artifact.kind, artifact.version);
        advanced.push({ kind: artifact.kind, previous });
      }
    } catch (error) {
      await this.#rollback(advanced);
      this.#record("commit", failedOutcome(error, startedAt));
      console.error(`[market:commit] ${symbol}: pointer advance failed, rolled back: ${errorMessage(error)}`);
      return;
    }

    for (const artifact of pending) {
      this.outcome.versions[artifact.kind] = artifact.version;
    }
    this.#record("commit", { status: "ok", attempts: 1, durationMs: Date.now() - startedAt });
    this.outcome.state = forecast.ok && insight.ok ? "committed" : "partially_committed";
    console.log(`[market:run] ${symbol} ${this.outcome.state} as of ${features.asOf}`);
  }

  async #rollback(advanced: ReadonlyArray<{ kind: ArtifactKind; previous: LatestPointer | null }>): Promise<void> {
    for (const { kind, previous } of [...advanced].reverse()) {
      try {
        await this.#deps.store.restoreLatest(this.symbol, kind, previous);
      } catch (error) {
        console.error(`[market:commit] ${this.symbol}: failed restoring ${kind} pointer: ${errorMessage(error)}`);
      }
    }
  }
}

/**
* Runs fetch → transform → {forecast, insight} → commit for every symbol.
*
* Stage failures are recorded per symbol and never abort siblings. Only an
* invalid invocation (no symbols, bad as-of) throws.
*/
export async function runPipeline(deps: PipelineDeps, opts: RunOptions): Promise<RunReport> {
  const symbols = normalizeSymbols(opts.symbols);
  if (symbols.length === 0) {
    throw new ConfigError("No symbols configured for the pipeline run");
  }

  const asOf = parseAsOf(opts.asOf);
  const now = deps.now ?? (() => new Date());
  const runId = deps.newRunId?.() ?? randomUUID();
  const force = opts.force ?? false;
  const startedAt = now().toISOString();

  console.log(`[market:run] ${runId} starting: ${symbols.length} symbol(s) as of ${asOf.toISOString()}${force ? " (force)" : ""}`);

  const outcomes = await mapWithConcurrency(symbols, opts.concurrency ?? deps.config.concurrency.symbols, async (symbol) => {
    const pipeline = new SymbolPipeline(deps, symbol, asOf, force, opts.signal);
    try {
      return await pipeline.run();
    } catch (error) {
      // Anything escaping the stage handlers still only fails this symbol.
      console.error(`[market:run] ${symbol} crashed: ${errorMessage(error)}`);
      pipeline.outcome.state = "failed";
      pipeline.outcome.stages.commit ??= failedOutcome(error, Date.now());
      return pipeline.outcome;
    }
  });

  const report: RunReport = {
    runId,
    asOf: asOf.toISOString(),
    force,
    startedAt,
    endedAt: now().toISOString(),
    symbols: outcomes,
    totals: summarizeTotals(outcomes)
  };

  try {
    await deps.store.writeRunRecord(report);
  } catch (error) {
    const wrapped = error instanceof StoreError ? error : new StoreError(errorMessage(error), error);
    console.error(`[market:run] ${runId}: failed to persist run record: ${wrapped.message}`);
  }

  console.log(`[market:run] ${runId} done: ${JSON.stringify(report.totals)}`);
  return report;
}

export function createPipelineDeps(config: PipelineConfig, opts: { rootDir?: string; env?: NodeJS.ProcessEnv } = {}): PipelineDeps {
  const rootDir = opts.rootDir ?? process.cwd();
  return {
    config,
    gateway: new YahooMarketDataProvider(),
    store: new FileArtifactStore(resolveContentDir(config, rootDir)),
    forecaster: new Forecaster(config.forecast),
    insights: new InsightGenerator(config.insight, {
      client: createLanguageModelClient(config.insight, opts.env ?? process.env),
      timeoutMs: config.timeouts.insightMs,
      limiter: createLimiter(config.concurrency.insight)
    })
  };
}

/**
* Entry point used by the scripts: loads configuration and symbols from disk,
* then runs one pass.
*/
export async function runMarketPipeline(args: {
  asOf?: Date | string;
  symbols?: readonly string[];
  force?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
  rootDir?: string;
}): Promise<RunReport> {
  const rootDir = args.rootDir ?? process.cwd();
  const config = await loadPipelineConfig(rootDir);
  const symbols = args.symbols && args.symbols.length > 0 ? args.symbols : await loadSymbols(rootDir);

  return runPipeline(createPipelineDeps(config, { rootDir }), {
    symbols,
    asOf: args.asOf ?? new Date(),
    force: args.force,
    concurrency: args.concurrency,
    signal: args.signal
  });
}
