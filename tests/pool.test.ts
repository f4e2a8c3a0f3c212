import { describe, expect, it } from "vitest";
import { mapPool } from "@/lib/pool";

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("mapPool", () => {
  it("keeps input order regardless of completion order", async () => {
    const results = await mapPool([30, 0, 15], 3, async (ms, index) => {
      await tick(ms);
      return `item-${index}`;
    });
    expect(results).toEqual(["item-0", "item-1", "item-2"]);
  });

  it("never runs more than the given number of workers", async () => {
    let active = 0;
    let peak = 0;
    await mapPool([1, 2, 3, 4, 5, 6], 2, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await tick(5);
      active -= 1;
    });
    expect(peak).toBe(2);
  });

  it("stops starting items once the signal aborts", async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const results = await mapPool(
      [0, 1, 2, 3],
      1,
      async (item) => {
        started.push(item);
        if (item === 1) controller.abort();
        return item * 10;
      },
      controller.signal
    );
    expect(started).toEqual([0, 1]);
    expect(results).toEqual([0, 10, undefined, undefined]);
  });

  it("returns an empty array for no items", async () => {
    expect(await mapPool([], 4, async () => 1)).toEqual([]);
  });
});
