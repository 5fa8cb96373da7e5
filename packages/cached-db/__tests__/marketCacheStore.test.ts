import { beforeEach, describe, expect, it } from "vitest";
import { createMarketCacheStore, type CacheCommands } from "../index.js";

/** Hash commands over plain Maps, enough to stand in for Redis. */
class MemoryHashes implements CacheCommands {
  readonly hashes = new Map<string, Map<string, string>>();

  private hash(key: string): Map<string, string> {
    let h = this.hashes.get(key);
    if (!h) {
      h = new Map();
      this.hashes.set(key, h);
    }
    return h;
  }

  async hget(key: string, field: string) {
    return this.hashes.get(key)?.get(field) ?? null;
  }

  async hmget(key: string, ...fields: string[]) {
    return fields.map((f) => this.hashes.get(key)?.get(f) ?? null);
  }

  async hkeys(key: string) {
    return [...(this.hashes.get(key)?.keys() ?? [])];
  }

  async hset(key: string, values: Record<string, string>) {
    const h = this.hash(key);
    let added = 0;
    for (const [field, value] of Object.entries(values)) {
      if (!h.has(field)) added++;
      h.set(field, value);
    }
    return added;
  }
}

let redis: MemoryHashes;

beforeEach(() => {
  redis = new MemoryHashes();
});

describe("time series entries", () => {
  it("returns null for a symbol never fetched", async () => {
    const store = createMarketCacheStore(redis);
    expect(await store.get("AAPL", "timeSeries")).toBeNull();
  });

  it("keeps one field per fetch date and reads the latest", async () => {
    const store = createMarketCacheStore(redis);

    await store.put("AAPL", "timeSeries", { day: 1 }, "2024-03-14");
    await store.put("AAPL", "timeSeries", { day: 2 }, "2024-03-15");
    await store.put("AAPL", "timeSeries", { day: 0 }, "2024-03-09");

    expect(await redis.hkeys("market:timeseries:AAPL")).toEqual([
      "2024-03-14",
      "2024-03-15",
      "2024-03-09",
    ]);
    expect(await store.get("AAPL", "timeSeries")).toEqual({
      payload: { day: 2 },
      fetchedOn: "2024-03-15",
    });
  });

  it("overwrites a same-day fetch", async () => {
    const store = createMarketCacheStore(redis);

    await store.put("AAPL", "timeSeries", { v: "old" }, "2024-03-15");
    await store.put("AAPL", "timeSeries", { v: "new" }, "2024-03-15");

    expect(await store.get("AAPL", "timeSeries")).toEqual({
      payload: { v: "new" },
      fetchedOn: "2024-03-15",
    });
  });

  it("treats an unparseable stored value as absent", async () => {
    await redis.hset("market:timeseries:AAPL", { "2024-03-15": "{not json" });
    const store = createMarketCacheStore(redis);

    expect(await store.get("AAPL", "timeSeries")).toBeNull();
  });
});

describe("overview entries", () => {
  it("writes data and lastUpdated together and reads them back", async () => {
    const store = createMarketCacheStore(redis);

    await store.put("MSFT", "overview", { Name: "Microsoft" }, "2024-03-10");

    expect(redis.hashes.get("market:overview:MSFT")).toEqual(
      new Map([
        ["data", JSON.stringify({ Name: "Microsoft" })],
        ["lastUpdated", "2024-03-10"],
      ])
    );
    expect(await store.get("MSFT", "overview")).toEqual({
      payload: { Name: "Microsoft" },
      fetchedOn: "2024-03-10",
    });
  });

  it("replaces the previous overview on refresh", async () => {
    const store = createMarketCacheStore(redis);

    await store.put("MSFT", "overview", { Name: "Old" }, "2024-03-01");
    await store.put("MSFT", "overview", { Name: "New" }, "2024-03-10");

    expect(await store.get("MSFT", "overview")).toEqual({
      payload: { Name: "New" },
      fetchedOn: "2024-03-10",
    });
  });

  it("is absent when lastUpdated is missing", async () => {
    await redis.hset("market:overview:MSFT", { data: "{}" });
    const store = createMarketCacheStore(redis);

    expect(await store.get("MSFT", "overview")).toBeNull();
  });

  it("keeps data classes independent", async () => {
    const store = createMarketCacheStore(redis);

    await store.put("AAPL", "overview", { Name: "Apple" }, "2024-03-15");

    expect(await store.get("AAPL", "timeSeries")).toBeNull();
    expect(await store.get("GOOGL", "overview")).toBeNull();
  });
});
