/**
 * Alpha Vantage client: TIME_SERIES_DAILY and OVERVIEW.
 *
 * Alpha Vantage answers errors with HTTP 200 and a JSON body, so failures are
 * classified from the body:
 *   - "Information"/"Note" mentioning a rate limit → RateLimitExceeded (daily quota; never retried here)
 *   - "Error Message", or any other notice        → UpstreamError
 *   - anything else that isn't the expected shape  → MalformedResponse
 *     (a daily series without a single numeric close included)
 * Transport failures (non-200, network, timeout) are UpstreamError too.
 */

import axios, { type AxiosInstance } from "axios";
import type { DataClass, FetchResult, RetrievalError } from "common/portfolio";
import {
  OverviewPayloadSchema,
  TimeSeriesPayloadSchema,
  parseDailyBars,
  type OverviewPayload,
  type TimeSeriesPayload,
} from "./marketData.js";
import { noopResponseLog, type ResponseLog } from "./responseLog.js";

export interface UpstreamClient {
  fetchTimeSeries(symbol: string): Promise<FetchResult<TimeSeriesPayload>>;
  fetchOverview(symbol: string): Promise<FetchResult<OverviewPayload>>;
}

export type AlphaVantageOptions = {
  apiKey: string;
  baseUrl: string;
  outputSize: "compact" | "full";
  timeoutMs: number;
  responseLog?: ResponseLog;
  http?: Pick<AxiosInstance, "get">;
};

const RATE_LIMIT_PATTERN = /rate limit|call frequency|requests per day/i;

type ProviderFunction = "TIME_SERIES_DAILY" | "OVERVIEW";

const KIND_BY_FUNCTION: Record<ProviderFunction, DataClass> = {
  TIME_SERIES_DAILY: "timeSeries",
  OVERVIEW: "overview",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

/** Returns the provider-level error carried by a response body, if any. */
export function classifyErrorShape(body: Record<string, unknown>): RetrievalError | null {
  const notices = [nonEmptyString(body.Information), nonEmptyString(body.Note)].filter(
    (n): n is string => n != null
  );
  const rateLimit = notices.find((n) => RATE_LIMIT_PATTERN.test(n));
  if (rateLimit) return { kind: "RateLimitExceeded", message: rateLimit };

  const errorMessage = nonEmptyString(body["Error Message"]);
  if (errorMessage) return { kind: "UpstreamError", message: errorMessage };

  const notice = notices[0];
  if (notice) return { kind: "UpstreamError", message: notice };
  return null;
}

function malformed(fn: ProviderFunction): RetrievalError {
  return {
    kind: "MalformedResponse",
    message: `Unexpected response format from Alpha Vantage (${fn})`,
  };
}

export function createAlphaVantageClient(options: AlphaVantageOptions): UpstreamClient {
  const { apiKey, baseUrl, outputSize, timeoutMs } = options;
  const responseLog = options.responseLog ?? noopResponseLog;
  const http = options.http ?? axios.create({ headers: { Accept: "application/json" } });

  function describeRequestError(err: unknown): string {
    if (axios.isAxiosError(err)) {
      if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
        return `Alpha Vantage request timed out after ${timeoutMs}ms`;
      }
      if (err.response) {
        return `Alpha Vantage responded with HTTP ${err.response.status}`;
      }
      return `Alpha Vantage request failed: ${err.message}`;
    }
    return `Alpha Vantage request failed: ${err instanceof Error ? err.message : String(err)}`;
  }

  async function query(
    fn: ProviderFunction,
    symbol: string
  ): Promise<FetchResult<Record<string, unknown>>> {
    const kind = KIND_BY_FUNCTION[fn];
    const params: Record<string, string> = { function: fn, symbol, apikey: apiKey };
    if (fn === "TIME_SERIES_DAILY") params.outputsize = outputSize;

    let body: unknown;
    try {
      const { data } = await http.get<unknown>(baseUrl, {
        params,
        timeout: timeoutMs,
        validateStatus: (s) => s === 200,
      });
      body = data;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        responseLog.record(kind, symbol, err.response.data);
      }
      const message = describeRequestError(err);
      console.warn("[alpha-vantage]", fn, symbol, message);
      return { success: false, error: { kind: "UpstreamError", message } };
    }

    responseLog.record(kind, symbol, body);

    if (!isRecord(body)) {
      console.warn("[alpha-vantage]", fn, symbol, "non-object response body");
      return { success: false, error: malformed(fn) };
    }
    const providerError = classifyErrorShape(body);
    if (providerError) {
      console.warn("[alpha-vantage]", fn, symbol, `${providerError.kind}:`, providerError.message);
      return { success: false, error: providerError };
    }
    return { success: true, data: body };
  }

  return {
    async fetchTimeSeries(symbol) {
      const result = await query("TIME_SERIES_DAILY", symbol);
      if (!result.success) return result;
      const parsed = TimeSeriesPayloadSchema.safeParse(result.data);
      if (!parsed.success) {
        console.warn("[alpha-vantage] TIME_SERIES_DAILY", symbol, "unexpected shape");
        return { success: false, error: malformed("TIME_SERIES_DAILY") };
      }
      if (parseDailyBars(parsed.data).length === 0) {
        console.warn("[alpha-vantage] TIME_SERIES_DAILY", symbol, "no usable daily bars");
        return { success: false, error: malformed("TIME_SERIES_DAILY") };
      }
      console.log("[alpha-vantage] TIME_SERIES_DAILY", symbol, "ok");
      return { success: true, data: parsed.data };
    },

    async fetchOverview(symbol) {
      const result = await query("OVERVIEW", symbol);
      if (!result.success) return result;
      // Missing attributes are not an error: an unknown symbol comes back as {}.
      console.log("[alpha-vantage] OVERVIEW", symbol, "ok");
      return { success: true, data: OverviewPayloadSchema.parse(result.data) };
    },
  };
}
