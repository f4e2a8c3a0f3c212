import { setTimeout as delay } from "node:timers/promises";

type Clock = () => number;
type Sleep = (ms: number) => Promise<unknown>;

// Spaces out call starts across every worker sharing the instance.
export class Throttle {
  private nextSlot = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: Clock = Date.now,
    private readonly sleep: Sleep = delay
  ) {}

  async wait(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }
}
