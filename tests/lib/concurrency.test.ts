import { describe, it, expect } from "vitest";
import { mapWithConcurrency } from "@/lib/concurrency.js";

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("keeps input order when tasks finish out of order", async () => {
    const result = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });
    expect(result).toEqual(["0:30", "1:10", "2:20"]);
  });

  it("never exceeds the limit", async () => {
    let inFlight = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 2, async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
    });
    expect(peak).toBe(2);
  });

  it("returns an empty list for no items", async () => {
    const result = await mapWithConcurrency([], 4, async (x: number) => x);
    expect(result).toEqual([]);
  });

  it("rejects when a task rejects", async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async (x) => {
        if (x === 2) throw new Error("boom");
        return x;
      })
    ).rejects.toThrow("boom");
  });
});
