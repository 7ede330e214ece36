import type { Limiter } from "../concurrency";
import { withTimeout } from "../concurrency";
import type { InsightConfig } from "../config";
import { InsightError, MarketPipelineError, errorMessage } from "../errors";
import { lastFeatureRow } from "../features";
import type { FeatureSet, ForecastArtifact, InsightArtifact } from "../types";

import type { LanguageModelClient } from "./client";
import { buildInsightPrompt } from "./prompt";

export const LOCAL_TEMPLATE_MODEL_ID = "local-template";

const HIGH_VOLATILITY_PCT = 2;

/**
* Collapses whitespace, strips markdown markers and caps the length at a word
* boundary. The result is display text only.
*/
export function normalizeCommentary(text: string, maxChars: number): string {
  const plain = text
    .replace(/```[\s\S]*?```/g, " ")
    .replace(/[*_#`>]+/g, "")
    .replace(/^\s*[-•]\s+/gm, "")
    .replace(/\s+/g, " ")
    .trim();

  if (plain.length <= maxChars) {
    return plain;
  }

  const cut = plain.slice(0, Math.max(1, maxChars - 1));
  const lastSpace = cut.lastIndexOf(" ");
  return `${(lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trimEnd()}…`;
}

function columnValue(features: FeatureSet, prefix: string): number | null {
  const last = lastFeatureRow(features);
  const col = features.columns.find((c) => c.startsWith(prefix));
  if (!last || !col) {
    return null;
  }
  return last.indicators[col] ?? null;
}

/**
* Deterministic commentary computed from the features alone, used when no
* hosted model is configured.
*/
export function composeLocalCommentary(features: FeatureSet, forecast: ForecastArtifact | null): string {
  const last = lastFeatureRow(features);
  if (!last) {
    return `${features.symbol}: no data available for commentary.`;
  }

  const trend = last.returnPct > 0 ? "bullish" : last.returnPct < 0 ? "bearish" : "flat";
  const parts = [
    `${features.symbol} closed at $${last.close.toFixed(2)} on ${last.t.slice(0, 10)}, a ${trend} move of ${last.returnPct.toFixed(2)}%.`
  ];

  const volatility = columnValue(features, "volatility");
  const rsi = columnValue(features, "rsi");
  if (volatility !== null) {
    const desc = volatility > HIGH_VOLATILITY_PCT ? "elevated" : "stable";
    const rsiText = rsi !== null ? ` and RSI at ${rsi.toFixed(1)}` : "";
    parts.push(`Volatility is ${desc} (${volatility.toFixed(2)}% daily)${rsiText}.`);
  }

  if (forecast) {
    parts.push(`The model projects $${forecast.predictedClose.toFixed(2)} for the next session (${forecast.direction}).`);
  }

  return parts.join(" ");
}

export type InsightGeneratorOptions = {
  client: LanguageModelClient | null;
  timeoutMs: number;
  limiter?: Limiter;
  now?: () => Date;
};

export class InsightGenerator {
  readonly #cfg: InsightConfig;
  readonly #client: LanguageModelClient | null;
  readonly #timeoutMs: number;
  readonly #limiter: Limiter;
  readonly #now: () => Date;

  constructor(cfg: InsightConfig, opts: InsightGeneratorOptions) {
    this.#cfg = cfg;
    this.#client = opts.client;
    this.#timeoutMs = opts.timeoutMs;
    this.#limiter = opts.limiter ?? ((fn) => fn());
    this.#now = opts.now ?? (() => new Date());
  }

  get sourceModelId(): string {
    return this.#client?.modelId ?? LOCAL_TEMPLATE_MODEL_ID;
  }

  /**
  * Produces commentary for the latest feature rows. When `forecast` is `null`
  * the prompt forbids any numeric forecast reference.
  *
  * Throws `InsightError` on timeout, service failure or an empty answer.
  */
  async summarize(
    features: FeatureSet,
    forecast: ForecastArtifact | null,
    opts: { signal?: AbortSignal } = {}
  ): Promise<InsightArtifact> {
    const { symbol } = features;
    let text: string;

    if (this.#client === null) {
      text = composeLocalCommentary(features, forecast);
    } else {
      const client = this.#client;
      const prompt = buildInsightPrompt(features, forecast, {
        recentRows: this.#cfg.recentRows,
        maxPromptChars: this.#cfg.maxPromptChars
      });

      try {
        text = await this.#limiter(() =>
          withTimeout(
            this.#timeoutMs,
            opts.signal,
            () => new InsightError(symbol, `language model timed out after ${this.#timeoutMs}ms`),
            (signal) =>
              client.complete({
                system: prompt.system,
                user: prompt.user,
                maxTokens: this.#cfg.maxTokens,
                temperature: this.#cfg.temperature,
                signal
              })
          )
        );
      } catch (error) {
        if (error instanceof MarketPipelineError) {
          throw error;
        }
        throw new InsightError(symbol, errorMessage(error), error);
      }
    }

    const commentary = normalizeCommentary(text, this.#cfg.maxCommentaryChars);
    if (commentary.length === 0) {
      throw new InsightError(symbol, "language model returned empty commentary");
    }

    return {
      symbol,
      asOf: features.asOf,
      commentary,
      generatedAt: this.#now().toISOString(),
      sourceModelId: this.sourceModelId,
      forecastReferenced: forecast !== null
    };
  }
}
