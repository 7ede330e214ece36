import type { FeatureRow, FeatureSet, ForecastArtifact } from "../types";

export type InsightPrompt = {
  system: string;
  user: string;
};

export const INSIGHT_SYSTEM_PROMPT =
  "You are a financial analyst writing one-line dashboard commentary. " +
  "Be factual and concise, describe trend, volatility and volume, and never give buy or sell advice.";

const INSTRUCTIONS_WITH_FORECAST =
  "Write at most two plain sentences about this symbol. You may mention the model forecast. Do not use markdown.";

const INSTRUCTIONS_WITHOUT_FORECAST =
  "Write at most two plain sentences about this symbol. No forecast is available: do not mention any predicted price. Do not use markdown.";

function fmt(value: number): string {
  return value.toFixed(2);
}

function formatRow(row: FeatureRow, columns: readonly string[]): string {
  const parts = [
    row.t.slice(0, 10),
    `close=${fmt(row.close)}`,
    `ret=${fmt(row.returnPct)}%`,
    `vol=${Math.round(row.volume)}`
  ];
  for (const col of columns) {
    const v = row.indicators[col];
    if (v !== undefined) {
      parts.push(`${col}=${fmt(v)}`);
    }
  }
  return parts.join(" ");
}

export function formatForecastLine(forecast: ForecastArtifact): string {
  const sign = forecast.changePct >= 0 ? "+" : "";
  return (
    `Forecast next close: ${fmt(forecast.predictedClose)} (${forecast.direction}, ` +
    `${sign}${fmt(forecast.changePct)}% vs last close ${fmt(forecast.lastClose)})`
  );
}

/**
* Builds a bounded prompt from the most recent `recentRows` feature rows and the
* forecast when there is one.
*
* Oldest rows are dropped first when the prompt exceeds `maxPromptChars`. If it
* still does not fit, the header and rows are cut; the forecast line and the
* instructions are always sent whole.
*/
export function buildInsightPrompt(
  features: FeatureSet,
  forecast: ForecastArtifact | null,
  opts: { recentRows: number; maxPromptChars: number }
): InsightPrompt {
  const header = [`Symbol: ${features.symbol}`, `As of: ${features.asOf.slice(0, 10)}`, "Recent daily rows (oldest first):"];
  const footer = [
    forecast ? formatForecastLine(forecast) : "Forecast: unavailable",
    forecast ? INSTRUCTIONS_WITH_FORECAST : INSTRUCTIONS_WITHOUT_FORECAST
  ];

  let rows = features.rows.slice(-opts.recentRows).map((r) => formatRow(r, features.columns));
  let user = [...header, ...rows, ...footer].join("\n");

  while (user.length > opts.maxPromptChars && rows.length > 1) {
    rows = rows.slice(1);
    user = [...header, ...rows, ...footer].join("\n");
  }
  if (user.length > opts.maxPromptChars) {
    const tail = footer.join("\n");
    const budget = opts.maxPromptChars - tail.length - 1;
    const head = budget > 0 ? [...header, ...rows].join("\n").slice(0, budget) : "";
    user = head ? `${head}\n${tail}` : tail;
  }

  return { system: INSIGHT_SYSTEM_PROMPT, user };
}
