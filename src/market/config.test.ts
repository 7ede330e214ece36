import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_PIPELINE_CONFIG, loadPipelineConfig, loadSymbols, normalizeSymbols, parsePipelineConfig } from "./config";
import { ConfigError } from "./errors";

describe("parsePipelineConfig", () => {
  it("fills defaults for an empty document", () => {
    expect(parsePipelineConfig(null)).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it("merges partial sections", () => {
    const cfg = parsePipelineConfig({ forecast: { deadband: 1.5 }, pipeline: { stageMode: "concurrent" } });

    expect(cfg.forecast.deadband).toBe(1.5);
    expect(cfg.forecast.lookback).toBe(DEFAULT_PIPELINE_CONFIG.forecast.lookback);
    expect(cfg.pipeline.stageMode).toBe("concurrent");
  });

  it("sorts and de-duplicates sma periods", () => {
    expect(parsePipelineConfig({ features: { smaPeriods: [50, 5, 20, 5] } }).features.smaPeriods).toEqual([5, 20, 50]);
  });

  it("rejects invalid values", () => {
    expect(() => parsePipelineConfig({ forecast: { lookback: 0 } })).toThrow(
      "forecast.lookback must be a positive integer, got 0"
    );
    expect(() => parsePipelineConfig({ pipeline: { stageMode: "parallel" } })).toThrow(
      "pipeline.stageMode must be one of sequential, concurrent, got parallel"
    );
    expect(() => parsePipelineConfig({ features: { macd: { fastPeriod: 30 } } })).toThrow(
      "features.macd.fastPeriod must be < slowPeriod"
    );
    expect(() => parsePipelineConfig({ retry: { baseDelayMs: 500, maxDelayMs: 100 } })).toThrow(ConfigError);
    expect(() => parsePipelineConfig([])).toThrow("pipeline.yml must be a mapping");
  });

  it("applies environment overrides", () => {
    const cfg = parsePipelineConfig(
      {},
      { PIPELINE_INTERVAL_HOURS: "2", MARKET_CONTENT_DIR: "/tmp/artifacts", OPENAI_MODEL: "gpt-4o" }
    );

    expect(cfg.schedule.intervalHours).toBe(2);
    expect(cfg.storage.contentDir).toBe("/tmp/artifacts");
    expect(cfg.insight.model).toBe("gpt-4o");
    expect(() => parsePipelineConfig({}, { PIPELINE_INTERVAL_HOURS: "soon" })).toThrow(ConfigError);
  });
});

describe("normalizeSymbols", () => {
  it("trims, upper-cases and de-duplicates in order", () => {
    expect(normalizeSymbols([" aapl", "MSFT", "aapl ", "", "brk.b"])).toEqual(["AAPL", "MSFT", "BRK.B"]);
  });

  it("rejects symbols that cannot be a ticker", () => {
    expect(() => normalizeSymbols(["../etc"])).toThrow("Invalid symbol: ../etc");
  });
});

describe("loading from disk", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "market-config-"));
    await mkdir(path.join(root, "config"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads pipeline.yml", async () => {
    await writeFile(path.join(root, "config", "pipeline.yml"), "forecast:\n  deadband: 0.25\n", "utf8");

    const cfg = await loadPipelineConfig(root, {});
    expect(cfg.forecast.deadband).toBe(0.25);
  });

  it("prefers STOCK_TICKERS over symbols.json", async () => {
    await writeFile(path.join(root, "config", "symbols.json"), JSON.stringify({ symbols: ["aapl", "msft"] }), "utf8");

    await expect(loadSymbols(root, {})).resolves.toEqual(["AAPL", "MSFT"]);
    await expect(loadSymbols(root, { STOCK_TICKERS: "tsla, amzn" })).resolves.toEqual(["TSLA", "AMZN"]);
  });

  it("rejects an empty symbol list", async () => {
    await writeFile(path.join(root, "config", "symbols.json"), JSON.stringify({ symbols: [] }), "utf8");

    await expect(loadSymbols(root, {})).rejects.toThrow("config/symbols.json lists no symbols");
    await expect(loadSymbols(root, { STOCK_TICKERS: " , " })).rejects.toThrow(
      "STOCK_TICKERS is set but contains no symbols"
    );
  });
});
