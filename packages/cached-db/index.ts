/**
 * Durable Redis cache for per-symbol market data.
 * Use in backend-server via: import { ... } from "cached-db/client"
 *
 * Two independent namespaces per symbol:
 * - market:timeseries:{SYMBOL}  hash, field = fetch date (YYYY-MM-DD), value = raw provider JSON.
 *   One field per calendar day actually fetched; never pruned.
 * - market:overview:{SYMBOL}    hash { data, lastUpdated }, overwritten on refresh.
 *
 * Every write is a single HSET, so readers see either the previous entry or the new one.
 * Durability across restarts comes from Redis persistence (RDB/AOF), not from this process.
 *
 * Set REDIS_URL in your app .env:
 *   REDIS_URL="redis://127.0.0.1:6379"
 */

import { Redis } from "ioredis";
import type { DataClass } from "common/portfolio";

export type { DataClass };

export type CacheEntry = {
  payload: unknown;
  /** Calendar date the payload was fetched, YYYY-MM-DD. */
  fetchedOn: string;
};

export interface MarketCacheStore {
  get(symbol: string, dataClass: DataClass): Promise<CacheEntry | null>;
  put(
    symbol: string,
    dataClass: DataClass,
    payload: unknown,
    fetchedOn: string
  ): Promise<void>;
}

/** The handful of Redis hash commands the store needs. */
export interface CacheCommands {
  hget(key: string, field: string): Promise<string | null>;
  hmget(key: string, ...fields: string[]): Promise<(string | null)[]>;
  hkeys(key: string): Promise<string[]>;
  hset(key: string, values: Record<string, string>): Promise<number>;
}

let redis: Redis | null = null;

let lastRedisErrorLog = 0;
const REDIS_ERROR_LOG_INTERVAL_MS = 15_000;

export function getRedis(url: string): Redis {
  if (!redis) {
    redis = new Redis(url, { maxRetriesPerRequest: 3 });
    redis.on("error", (err: Error) => {
      const now = Date.now();
      if (now - lastRedisErrorLog >= REDIS_ERROR_LOG_INTERVAL_MS) {
        lastRedisErrorLog = now;
        console.warn(
          "[cached-db] Redis:",
          err.message,
          "- Is Redis running? Use REDIS_URL=redis://127.0.0.1:6379 if localhost fails."
        );
      }
    });
  }
  return redis;
}

export async function closeRedis(): Promise<void> {
  if (!redis) return;
  const client = redis;
  redis = null;
  await client.quit();
}

export function redisCommands(client: Redis): CacheCommands {
  return {
    hget: (key, field) => client.hget(key, field),
    hmget: (key, ...fields) => client.hmget(key, ...fields),
    hkeys: (key) => client.hkeys(key),
    hset: (key, values) => client.hset(key, values),
  };
}

const timeSeriesKey = (symbol: string) => `market:timeseries:${symbol}`;
const overviewKey = (symbol: string) => `market:overview:${symbol}`;

function parseStored(raw: string | null): unknown | undefined {
  if (raw == null) return undefined;
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return undefined;
  }
}

export function createMarketCacheStore(client: CacheCommands): MarketCacheStore {
  async function getTimeSeries(symbol: string): Promise<CacheEntry | null> {
    const dates = await client.hkeys(timeSeriesKey(symbol));
    if (dates.length === 0) return null;
    // ISO dates sort lexically.
    const latest = dates.reduce((a, b) => (b > a ? b : a));
    const payload = parseStored(await client.hget(timeSeriesKey(symbol), latest));
    if (payload === undefined) return null;
    return { payload, fetchedOn: latest };
  }

  async function getOverview(symbol: string): Promise<CacheEntry | null> {
    const [raw = null, lastUpdated = null] = await client.hmget(
      overviewKey(symbol),
      "data",
      "lastUpdated"
    );
    const payload = parseStored(raw);
    if (payload === undefined || !lastUpdated) return null;
    return { payload, fetchedOn: lastUpdated };
  }

  return {
    get(symbol, dataClass) {
      return dataClass === "timeSeries" ? getTimeSeries(symbol) : getOverview(symbol);
    },

    async put(symbol, dataClass, payload, fetchedOn) {
      const data = JSON.stringify(payload);
      if (dataClass === "timeSeries") {
        await client.hset(timeSeriesKey(symbol), { [fetchedOn]: data });
      } else {
        await client.hset(overviewKey(symbol), { data, lastUpdated: fetchedOn });
      }
    },
  };
}
