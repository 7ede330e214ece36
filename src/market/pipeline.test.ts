import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { PipelineConfig } from "./config";
import { ConfigError, NoDataError, StoreError, TransientFetchError } from "./errors";
import { Forecaster } from "./forecast/forecaster";
import type { SequenceModel } from "./forecast/model";
import type { LanguageModelClient } from "./insight/client";
import { InsightGenerator } from "./insight/generator";
import { runPipeline, type PipelineDeps } from "./pipeline";
import type { MarketDataGateway } from "./providers/types";
import { FileArtifactStore } from "./storage";
import { makeBars, makeSeries, testConfig, waveCloses } from "./testFixtures";
import type { ArtifactKey, ArtifactKind, ArtifactPayloads, HistoryRange, LatestPointer, RawSeries } from "./types";

const NOW = new Date("2024-02-01T12:00:00.000Z");
const AS_OF = "2024-02-01T00:00:00.000Z";
// Last of 30 daily bars starting 2024-01-01.
const V = "20240130T000000Z";

class FailingStore extends FileArtifactStore {
  readonly #failPut: ArtifactKind | null;
  readonly #failAdvance: ArtifactKind | null;

  constructor(root: string, fail: { put?: ArtifactKind; advance?: ArtifactKind }) {
    super(root, { now: () => NOW });
    this.#failPut = fail.put ?? null;
    this.#failAdvance = fail.advance ?? null;
  }

  async put<K extends ArtifactKind>(key: ArtifactKey<K>, payload: ArtifactPayloads[K]): Promise<void> {
    if (key.kind === this.#failPut) {
      throw new StoreError("disk full");
    }
    return super.put(key, payload);
  }

  async advanceLatest(symbol: string, kind: ArtifactKind, version: string): Promise<LatestPointer> {
    if (kind === this.#failAdvance) {
      throw new StoreError("rename failed");
    }
    return super.advanceLatest(symbol, kind, version);
  }
}

function gatewayFor(series: (symbol: string) => Promise<RawSeries>) {
  const fetchHistory = vi.fn((symbol: string) => series(symbol));
  const gateway: MarketDataGateway = {
    fetchHistory,
    fetchQuote: async () => {
      throw new Error("not used");
    }
  };
  return { gateway, fetchHistory };
}

describe("runPipeline", () => {
  let root: string;
  let store: FileArtifactStore;
  let config: PipelineConfig;

  function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
    return {
      config,
      gateway: gatewayFor(async (symbol) => makeSeries(symbol, waveCloses(30))).gateway,
      store,
      forecaster: new Forecaster(config.forecast, { now: () => NOW }),
      insights: new InsightGenerator(config.insight, { client: null, timeoutMs: 1000, now: () => NOW }),
      now: () => NOW,
      newRunId: () => "run-1",
      ...overrides
    };
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    root = await mkdtemp(path.join(os.tmpdir(), "market-pipeline-"));
    store = new FileArtifactStore(root, { now: () => NOW });
    config = testConfig();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("commits every artifact and advances the latest pointers", async () => {
    const report = await runPipeline(deps(), { symbols: ["aapl"], asOf: AS_OF });

    expect(report.totals).toEqual({ committed: 1, partially_committed: 0, failed: 0, unchanged: 0 });
    const [aapl] = report.symbols;
    expect(aapl?.state).toBe("committed");
    expect(aapl?.versions).toEqual({ raw: V, features: V, forecast: V, model: V, insight: V });
    expect(aapl?.stages.fetch).toMatchObject({ status: "ok", attempts: 1 });

    const forecast = await store.get({ symbol: "AAPL", kind: "forecast", version: "latest" });
    const insight = await store.get({ symbol: "AAPL", kind: "insight", version: "latest" });
    expect(forecast?.asOf).toBe("2024-01-30T00:00:00.000Z");
    expect(insight?.forecastReferenced).toBe(true);
    expect(insight?.commentary).toContain("The model projects");

    await expect(store.readRunRecord("run-1")).resolves.toEqual(report);
  });

  it("is idempotent for unchanged inputs", async () => {
    await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF });
    const second = await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF });

    expect(second.symbols[0]?.state).toBe("unchanged");
    expect(second.symbols[0]?.versions).toEqual({ features: V, forecast: V, insight: V });
    await expect(store.listVersions("AAPL", "raw")).resolves.toEqual([V]);
  });

  it("stays unchanged when a later as-of slides the window over the same newest bar", async () => {
    config = testConfig({ history: { lookbackDays: 29 } });
    const bars = makeBars(waveCloses(30));
    const served: number[] = [];
    const gateway: MarketDataGateway = {
      fetchHistory: async (symbol: string, range: HistoryRange) => {
        const inRange = bars.filter((b) => Date.parse(b.t) >= range.start.getTime() && Date.parse(b.t) <= range.end.getTime());
        served.push(inRange.length);
        return { ...makeSeries(symbol, []), bars: inRange };
      },
      fetchQuote: async () => {
        throw new Error("not used");
      }
    };
    const insights = new InsightGenerator(config.insight, { client: null, timeoutMs: 1000, now: () => NOW });
    const summarize = vi.spyOn(insights, "summarize");

    const first = await runPipeline(deps({ gateway, insights }), { symbols: ["AAPL"], asOf: "2024-01-30T23:00:00.000Z" });
    const second = await runPipeline(deps({ gateway, insights }), { symbols: ["AAPL"], asOf: "2024-01-31T01:00:00.000Z" });

    expect(served).toEqual([29, 28]);
    expect(first.symbols[0]?.state).toBe("committed");
    expect(second.symbols[0]?.state).toBe("unchanged");
    expect(second.symbols[0]?.versions).toEqual({ features: V, forecast: V, insight: V });
    expect(summarize).toHaveBeenCalledTimes(1);
    await expect(store.listVersions("AAPL", "raw")).resolves.toEqual([V]);
  });

  it("recomputes when a new bar arrives", async () => {
    await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF });
    const { gateway } = gatewayFor(async (symbol) => makeSeries(symbol, waveCloses(31)));

    const report = await runPipeline(deps({ gateway }), { symbols: ["AAPL"], asOf: AS_OF });

    expect(report.symbols[0]?.state).toBe("committed");
    expect(report.symbols[0]?.versions.features).toBe("20240131T000000Z");
  });

  it("writes revision versions on a forced recompute and reuses a fresh model", async () => {
    await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF });
    const forced = await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF, force: true });

    expect(forced.symbols[0]?.state).toBe("committed");
    expect(forced.symbols[0]?.versions).toEqual({
      raw: `${V}~2`,
      features: `${V}~2`,
      forecast: `${V}~2`,
      insight: `${V}~2`
    });
    await expect(store.listVersions("AAPL", "model")).resolves.toEqual([V]);
  });

  it("commits a partial result when the insight stage fails", async () => {
    const client: LanguageModelClient = {
      modelId: "fake-llm",
      complete: async () => {
        throw new Error("503 upstream");
      }
    };
    const insights = new InsightGenerator(config.insight, { client, timeoutMs: 1000, now: () => NOW });

    const report = await runPipeline(deps({ insights }), { symbols: ["AAPL"], asOf: AS_OF });
    const [aapl] = report.symbols;

    expect(aapl?.state).toBe("partially_committed");
    expect(aapl?.stages.insight).toMatchObject({
      status: "failed",
      error: { code: "insight_failed", message: "Insight failed for AAPL: 503 upstream" }
    });
    expect(aapl?.versions.forecast).toBe(V);
    expect(aapl?.versions.insight).toBeUndefined();
    await expect(store.getLatestPointer("AAPL", "insight")).resolves.toBeNull();
  });

  it("commits features and insight when the forecast fails", async () => {
    const broken = {
      id: "broken",
      train: () => {
        throw new Error("singular matrix");
      },
      predict: () => 0
    } satisfies SequenceModel;
    const forecaster = new Forecaster(config.forecast, { model: broken, now: () => NOW });

    const report = await runPipeline(deps({ forecaster }), { symbols: ["AAPL"], asOf: AS_OF });
    const [aapl] = report.symbols;

    expect(aapl?.state).toBe("partially_committed");
    expect(aapl?.stages.forecast).toMatchObject({
      status: "failed",
      error: { code: "forecast_failed", message: "Forecast failed for AAPL: singular matrix" }
    });
    expect(aapl?.versions).toEqual({ raw: V, features: V, insight: V });
    await expect(store.getLatestPointer("AAPL", "forecast")).resolves.toBeNull();
    await expect(store.getLatestPointer("AAPL", "model")).resolves.toBeNull();

    const insight = await store.get({ symbol: "AAPL", kind: "insight", version: "latest" });
    expect(insight?.forecastReferenced).toBe(false);
    expect(insight?.commentary).not.toContain("The model projects");
  });

  it("keeps concurrent symbols on their own keys", async () => {
    const offsets: Record<string, number> = { AAPL: 0, MSFT: 50 };
    const { gateway } = gatewayFor(async (symbol) => makeSeries(symbol, waveCloses(30, offsets[symbol] ?? 0)));

    const report = await runPipeline(deps({ gateway }), { symbols: ["AAPL", "MSFT"], asOf: AS_OF, concurrency: 2 });

    expect(report.totals).toEqual({ committed: 2, partially_committed: 0, failed: 0, unchanged: 0 });
    for (const [symbol, offset] of Object.entries(offsets)) {
      for (const kind of ["raw", "features", "forecast", "insight"] as const) {
        const versions = await store.listVersions(symbol, kind);
        expect(versions).toEqual([V]);
        const payload = await store.get({ symbol, kind, version: V });
        expect(payload?.symbol).toBe(symbol);
        await expect(store.getLatestPointer(symbol, kind)).resolves.toMatchObject({ symbol, kind, version: V });
      }
      const forecast = await store.get({ symbol, kind: "forecast", version: "latest" });
      expect(forecast?.lastClose).toBe(waveCloses(30, offset)[29]);
      const raw = await store.get({ symbol, kind: "raw", version: "latest" });
      expect(raw?.bars[29]?.c).toBe(waveCloses(30, offset)[29]);
    }
  });

  it("runs insight without the forecast in concurrent mode", async () => {
    config = testConfig({ pipeline: { stageMode: "concurrent" } });

    await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF });

    const insight = await store.get({ symbol: "AAPL", kind: "insight", version: "latest" });
    expect(insight?.forecastReferenced).toBe(false);
  });

  it("retries transient fetch failures", async () => {
    let calls = 0;
    const { gateway, fetchHistory } = gatewayFor(async (symbol) => {
      calls += 1;
      if (calls < 3) {
        throw new TransientFetchError(symbol, "503");
      }
      return makeSeries(symbol, waveCloses(30));
    });

    const report = await runPipeline(deps({ gateway }), { symbols: ["AAPL"], asOf: AS_OF });

    expect(fetchHistory).toHaveBeenCalledTimes(3);
    expect(report.symbols[0]?.stages.fetch).toMatchObject({ status: "ok", attempts: 3 });
    expect(report.symbols[0]?.state).toBe("committed");
  });

  it("isolates a symbol without data from its siblings", async () => {
    const { gateway } = gatewayFor(async (symbol) => {
      if (symbol === "ZZZZ") {
        throw new NoDataError(symbol);
      }
      return makeSeries(symbol, waveCloses(30));
    });

    const report = await runPipeline(deps({ gateway }), { symbols: ["AAPL", "ZZZZ"], asOf: AS_OF });
    const [aapl, zzzz] = report.symbols;

    expect(aapl?.state).toBe("committed");
    expect(zzzz?.state).toBe("failed");
    expect(zzzz?.stages.fetch).toMatchObject({ status: "skipped", reason: "no_data", error: { code: "no_data" } });
    expect(zzzz?.stages.transform).toMatchObject({ status: "skipped" });
    expect(report.totals).toEqual({ committed: 1, partially_committed: 0, failed: 1, unchanged: 0 });
    await expect(store.listVersions("ZZZZ", "raw")).resolves.toEqual([]);
  });

  it("records insufficient history as a transform failure", async () => {
    const { gateway } = gatewayFor(async (symbol) => makeSeries(symbol, waveCloses(4)));

    const report = await runPipeline(deps({ gateway }), { symbols: ["NEWCO"], asOf: AS_OF });

    expect(report.symbols[0]?.stages.transform).toMatchObject({
      status: "failed",
      error: { code: "insufficient_history" }
    });
    expect(report.symbols[0]?.stages.forecast).toMatchObject({ status: "skipped" });
    await expect(store.listVersions("NEWCO", "raw")).resolves.toEqual([]);
  });

  it("advances nothing when a write fails", async () => {
    store = new FailingStore(root, { put: "insight" });

    const report = await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF });

    expect(report.symbols[0]?.state).toBe("failed");
    expect(report.symbols[0]?.stages.commit).toMatchObject({
      status: "failed",
      error: { code: "store_failed", message: "disk full" }
    });
    for (const kind of ["raw", "features", "forecast", "model", "insight"] as const) {
      await expect(store.getLatestPointer("AAPL", kind)).resolves.toBeNull();
    }
  });

  it("rolls pointers back when an advance fails", async () => {
    await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF });
    store = new FailingStore(root, { advance: "insight" });

    const report = await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF, force: true });

    expect(report.symbols[0]?.state).toBe("failed");
    for (const kind of ["raw", "features", "forecast", "insight"] as const) {
      await expect(store.getLatestPointer("AAPL", kind)).resolves.toMatchObject({ version: V });
    }
  });

  it("records cancellation before any fetch", async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await runPipeline(deps(), { symbols: ["AAPL"], asOf: AS_OF, signal: controller.signal });

    expect(report.symbols[0]?.stages.fetch).toMatchObject({ status: "failed", error: { code: "cancelled" } });
  });

  it("rejects an empty symbol list", async () => {
    await expect(runPipeline(deps(), { symbols: [" "], asOf: AS_OF })).rejects.toThrow(ConfigError);
  });
});
