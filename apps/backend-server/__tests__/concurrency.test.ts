import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "../lib/concurrency.js";

const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("mapWithConcurrency", () => {
  it("keeps input order when tasks finish out of order", async () => {
    const results = await mapWithConcurrency([30, 5, 15, 0], 4, async (ms, i) => {
      await delay(ms);
      return `${i}:${ms}`;
    });
    expect(results).toEqual(["0:30", "1:5", "2:15", "3:0"]);
  });

  it("never runs more than the limit at once", async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });
    expect(peak).toBe(3);
  });

  it("handles an empty list and a nonsensical limit", async () => {
    expect(await mapWithConcurrency([], 3, async (x: number) => x)).toEqual([]);
    expect(await mapWithConcurrency([1, 2], 0, async (x) => x * 2)).toEqual([2, 4]);
  });
});
