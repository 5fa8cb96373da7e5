/**
 * Provider payload shapes (Alpha Vantage) and their normalization into
 * DailyBar[] / CompanyOverview.
 */

import { z } from "zod";
import {
  NOT_AVAILABLE,
  UNKNOWN,
  type CompanyOverview,
  type DailyBar,
  type NotAvailable,
} from "common/portfolio";

export const TIME_SERIES_FIELD = "Time Series (Daily)";

const Quantity = z.union([z.string(), z.number()]);

const DailyBarSchema = z.object({
  "1. open": Quantity,
  "2. high": Quantity,
  "3. low": Quantity,
  "4. close": Quantity,
  "5. volume": Quantity,
});

export const TimeSeriesPayloadSchema = z
  .object({
    "Meta Data": z.record(z.unknown()).optional(),
    [TIME_SERIES_FIELD]: z.record(DailyBarSchema),
  })
  .passthrough();

export type TimeSeriesPayload = z.output<typeof TimeSeriesPayloadSchema>;

export const OverviewPayloadSchema = z.record(z.unknown());

export type OverviewPayload = z.output<typeof OverviewPayloadSchema>;

/** Bars ordered most-recent-first. Bars without a numeric close are dropped. */
export function parseDailyBars(payload: TimeSeriesPayload): DailyBar[] {
  return Object.entries(payload[TIME_SERIES_FIELD])
    .map(([date, values]) => ({
      date,
      open: Number(values["1. open"]),
      high: Number(values["2. high"]),
      low: Number(values["3. low"]),
      close: Number(values["4. close"]),
      volume: Number(values["5. volume"]),
    }))
    .filter((bar) => Number.isFinite(bar.close))
    .sort((a, b) => b.date.localeCompare(a.date));
}

// The provider fills unknown attributes with these instead of omitting them.
const PLACEHOLDERS = new Set(["", "None", "-", "N/A"]);

function textField(payload: OverviewPayload, field: string): string | null {
  const value = payload[field];
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return PLACEHOLDERS.has(trimmed) ? null : trimmed;
}

function numberField(payload: OverviewPayload, field: string): number | NotAvailable {
  const text = textField(payload, field);
  if (text == null) return NOT_AVAILABLE;
  const n = Number(text);
  return Number.isFinite(n) ? n : NOT_AVAILABLE;
}

export function normalizeOverview(
  payload: OverviewPayload,
  symbol: string
): CompanyOverview {
  return {
    name: textField(payload, "Name") ?? symbol,
    assetType: textField(payload, "AssetType") ?? UNKNOWN,
    sector: textField(payload, "Sector") ?? UNKNOWN,
    industry: textField(payload, "Industry") ?? UNKNOWN,
    exchange: textField(payload, "Exchange") ?? NOT_AVAILABLE,
    currency: textField(payload, "Currency") ?? NOT_AVAILABLE,
    country: textField(payload, "Country") ?? NOT_AVAILABLE,
    marketCapitalization: numberField(payload, "MarketCapitalization"),
    peRatio: numberField(payload, "PERatio"),
    eps: numberField(payload, "EPS"),
    beta: numberField(payload, "Beta"),
    dividendYield: numberField(payload, "DividendYield"),
    week52High: numberField(payload, "52WeekHigh"),
    week52Low: numberField(payload, "52WeekLow"),
    movingAverage50: numberField(payload, "50DayMovingAverage"),
    movingAverage200: numberField(payload, "200DayMovingAverage"),
  };
}

export const TRADING_DAYS_PER_YEAR = 252;

/**
 * Change from roughly one year ago to the latest close, as a fraction.
 * Uses the bar at offset 251 when there are at least 252 bars, otherwise the oldest bar.
 * Bars are counted, not calendar days, so gaps or duplicates in the series skew it.
 */
export function weekChange52(bars: DailyBar[]): number | null {
  const latest = bars[0];
  if (!latest) return null;
  const reference =
    bars.length >= TRADING_DAYS_PER_YEAR
      ? bars[TRADING_DAYS_PER_YEAR - 1]
      : bars[bars.length - 1];
  if (!reference || reference.close === 0) return null;
  return (latest.close - reference.close) / reference.close;
}
