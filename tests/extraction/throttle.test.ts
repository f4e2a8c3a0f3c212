import { describe, expect, it } from "vitest";
import { Throttle } from "@/lib/extraction";

function fakeClock(start = 1000) {
  let now = start;
  const sleeps: number[] = [];
  return {
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
    advance: (ms: number) => {
      now += ms;
    },
    sleeps,
  };
}

describe("Throttle", () => {
  it("lets the first call through immediately", async () => {
    const clock = fakeClock();
    const throttle = new Throttle(1000, clock.now, clock.sleep);
    await throttle.wait();
    expect(clock.sleeps).toEqual([]);
  });

  it("spaces consecutive call starts by the minimum interval", async () => {
    const clock = fakeClock();
    const throttle = new Throttle(1000, clock.now, clock.sleep);
    await throttle.wait();
    clock.advance(300);
    await throttle.wait();
    await throttle.wait();
    expect(clock.sleeps).toEqual([700, 1000]);
  });

  it("reserves distinct slots for concurrent waiters", async () => {
    const clock = fakeClock();
    const throttle = new Throttle(500, clock.now, async (ms) => {
      clock.sleeps.push(ms);
    });
    await Promise.all([throttle.wait(), throttle.wait(), throttle.wait()]);
    expect(clock.sleeps).toEqual([500, 1000]);
  });

  it("does not wait once the interval has passed", async () => {
    const clock = fakeClock();
    const throttle = new Throttle(1000, clock.now, clock.sleep);
    await throttle.wait();
    clock.advance(2500);
    await throttle.wait();
    expect(clock.sleeps).toEqual([]);
  });
});
