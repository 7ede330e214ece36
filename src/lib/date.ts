import { ConfigError } from "../market/errors";

export function formatDateYYYYMMDD(date: Date, timeZone = "America/New_York"): string {
  // We use `formatToParts()` so we don't depend on locale-specific separators/order.
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).formatToParts(date);

  const year = parts.find((p) => p.type === "year")?.value;
  const month = parts.find((p) => p.type === "month")?.value;
  const day = parts.find((p) => p.type === "day")?.value;

  if (!year || !month || !day) {
    throw new Error(`Failed to format date (tz=${timeZone})`);
  }

  return `${year}-${month}-${day}`;
}

function parseCalendarDay(date: string): Date {
  const [yearStr, monthStr, dayStr] = date.split("-");
  const year = Number(yearStr);
  const month = Number(monthStr);
  const day = Number(dayStr);

  // End of the UTC day, so the day's close is inside the history window.
  const parsed = new Date(Date.UTC(year, month - 1, day, 23, 59, 59));
  if (
    !Number.isFinite(parsed.getTime()) ||
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new ConfigError(`Invalid date: ${date}. Expected a real calendar day (YYYY-MM-DD).`);
  }
  return parsed;
}

/**
* Accepts `YYYY-MM-DD` or a full ISO-8601 timestamp. Timestamps in the future
* relative to `now` are rejected.
*/
export function parseAsOf(value: string, now = new Date()): Date {
  const parsed = /^\d{4}-\d{2}-\d{2}$/.test(value) ? parseCalendarDay(value) : new Date(value);
  if (!Number.isFinite(parsed.getTime())) {
    throw new ConfigError(`Expected YYYY-MM-DD or an ISO timestamp, got: ${value}`);
  }

  if (/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    const today = formatDateYYYYMMDD(now, "UTC");
    if (value > today) {
      throw new ConfigError(`As-of cannot be in the future. Got ${value}, today is ${today} (UTC)`);
    }
    return parsed.getTime() > now.getTime() ? now : parsed;
  }

  if (parsed.getTime() > now.getTime()) {
    throw new ConfigError(`As-of cannot be in the future. Got ${parsed.toISOString()}`);
  }
  return parsed;
}
