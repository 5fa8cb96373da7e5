/**
 * Per-symbol retrieval: validate → (cache | upstream) per data class → normalized quote.
 *
 * Each data class is served from cached-db while fresh (time series: same calendar day,
 * overview: 7 days) and otherwise fetched and written back with today's date.
 * A failed fetch is returned as-is; there is no fallback to a stale entry.
 * Time series is loaded before overview, so a failure (e.g. rate limit) never
 * costs a second upstream call for the same symbol.
 */

import type { z } from "zod";
import type { MarketCacheStore } from "cached-db/client";
import type {
  CompanyOverview,
  DailyBar,
  DataClass,
  FetchResult,
  PortfolioErrorRow,
  PortfolioRow,
  PortfolioSuccessRow,
  RetrievalError,
} from "common/portfolio";
import type { UpstreamClient } from "./alphaVantage.js";
import { assessFreshness, todayCalendarDate } from "./freshness.js";
import {
  OverviewPayloadSchema,
  TimeSeriesPayloadSchema,
  normalizeOverview,
  parseDailyBars,
  weekChange52,
} from "./marketData.js";
import { normalizeSymbol, validateSymbol } from "./symbol.js";

export type QuoteRecord = {
  symbol: string;
  bars: DailyBar[];
  latestClose: number;
  latestCloseDate: string;
  weekChange52: number | null;
  overview: CompanyOverview;
};

export type RetrievalDeps = {
  cache: MarketCacheStore;
  upstream: UpstreamClient;
  /** Calendar date (YYYY-MM-DD) used for freshness and cache writes. */
  today?: () => string;
};

export interface QuoteRetriever {
  loadQuote(rawSymbol: string): Promise<FetchResult<QuoteRecord>>;
  retrieve(rawSymbol: string, shares: number): Promise<PortfolioRow>;
  /** Cached daily bars only, most-recent-first; null when nothing is cached. Never fetches. */
  getHistory(rawSymbol: string): Promise<FetchResult<DailyBar[] | null>>;
}

export function toRow(quote: QuoteRecord, shares: number): PortfolioSuccessRow {
  return {
    status: "ok",
    symbol: quote.symbol,
    name: quote.overview.name,
    assetType: quote.overview.assetType,
    sector: quote.overview.sector,
    industry: quote.overview.industry,
    shares,
    latestClose: quote.latestClose,
    latestCloseDate: quote.latestCloseDate,
    totalValue: shares * quote.latestClose,
    weekChange52: quote.weekChange52,
    overview: quote.overview,
  };
}

export function errorRow(rawSymbol: string, error: RetrievalError): PortfolioErrorRow {
  return { status: "error", symbol: normalizeSymbol(rawSymbol), error };
}

export function unexpectedError(err: unknown): RetrievalError {
  return {
    kind: "UpstreamError",
    message: err instanceof Error ? err.message : String(err),
  };
}

export function createQuoteRetriever(deps: RetrievalDeps): QuoteRetriever {
  const { cache, upstream } = deps;
  const today = deps.today ?? todayCalendarDate;

  async function readCache(symbol: string, dataClass: DataClass) {
    try {
      return await cache.get(symbol, dataClass);
    } catch (err) {
      console.warn("[backend] cache read failed for", dataClass, symbol, err instanceof Error ? err.message : err);
      return null;
    }
  }

  /**
   * `unusable` returns the error for a payload that parses but cannot be used.
   * Such a payload is never written, and a cached one is refetched.
   */
  async function loadDataClass<T>(
    symbol: string,
    dataClass: DataClass,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fetchFresh: (symbol: string) => Promise<FetchResult<T>>,
    date: string,
    unusable: (payload: T) => RetrievalError | null = () => null
  ): Promise<FetchResult<T>> {
    const cached = await readCache(symbol, dataClass);
    if (cached && assessFreshness(cached.fetchedOn, date, dataClass) === "FRESH") {
      const parsed = schema.safeParse(cached.payload);
      if (parsed.success && unusable(parsed.data) == null) {
        console.log("[backend] cache HIT", dataClass, symbol, "fetched", cached.fetchedOn);
        return { success: true, data: parsed.data };
      }
      console.warn("[backend] cached", dataClass, "for", symbol, "is unreadable; refetching");
    }

    console.log("[backend] cache MISS", dataClass, symbol, "- calling Alpha Vantage");
    const fetched = await fetchFresh(symbol);
    if (!fetched.success) return fetched;
    const problem = unusable(fetched.data);
    if (problem) return { success: false, error: problem };

    try {
      await cache.put(symbol, dataClass, fetched.data, date);
    } catch (err) {
      console.warn("[backend] cache write failed for", dataClass, symbol, err instanceof Error ? err.message : err);
    }
    return fetched;
  }

  async function loadQuote(rawSymbol: string): Promise<FetchResult<QuoteRecord>> {
    const validated = validateSymbol(rawSymbol);
    if (!validated.success) return validated;
    const symbol = validated.data;
    const date = today();

    const noPrices: RetrievalError = {
      kind: "MalformedResponse",
      message: `No daily prices returned for ${symbol}`,
    };
    const series = await loadDataClass(
      symbol,
      "timeSeries",
      TimeSeriesPayloadSchema,
      (s) => upstream.fetchTimeSeries(s),
      date,
      (payload) => (parseDailyBars(payload).length === 0 ? noPrices : null)
    );
    if (!series.success) return series;

    const bars = parseDailyBars(series.data);
    const latest = bars[0];
    if (!latest) return { success: false, error: noPrices };

    const overview = await loadDataClass(
      symbol,
      "overview",
      OverviewPayloadSchema,
      (s) => upstream.fetchOverview(s),
      date
    );
    if (!overview.success) return overview;

    return {
      success: true,
      data: {
        symbol,
        bars,
        latestClose: latest.close,
        latestCloseDate: latest.date,
        weekChange52: weekChange52(bars),
        overview: normalizeOverview(overview.data, symbol),
      },
    };
  }

  return {
    loadQuote,

    async retrieve(rawSymbol, shares) {
      try {
        const quote = await loadQuote(rawSymbol);
        return quote.success ? toRow(quote.data, shares) : errorRow(rawSymbol, quote.error);
      } catch (err) {
        console.error("[backend] retrieval failed for", rawSymbol, err);
        return errorRow(rawSymbol, unexpectedError(err));
      }
    },

    async getHistory(rawSymbol) {
      const validated = validateSymbol(rawSymbol);
      if (!validated.success) return validated;
      const cached = await cache.get(validated.data, "timeSeries");
      if (!cached) return { success: true, data: null };
      const parsed = TimeSeriesPayloadSchema.safeParse(cached.payload);
      if (!parsed.success) return { success: true, data: null };
      return { success: true, data: parseDailyBars(parsed.data) };
    },
  };
}
