import { RateBudgetStore, RateWindow } from './rate-budget.store';

const SWEEP_INTERVAL_MS = 60_000;

/**
 * Per-process budget table. `hit` never awaits, so each call finishes
 * inside one event-loop turn and concurrent requests for a key are applied
 * in arrival order.
 */
export class MemoryRateBudgetStore implements RateBudgetStore {
  private readonly windows = new Map<string, RateWindow>();
  private lastSweepAt = 0;

  async hit(scope: string, clientKey: string, windowMs: number): Promise<RateWindow> {
    const now = Date.now();
    this.sweep(now);

    const key = `${scope}:${clientKey}`;
    const current = this.windows.get(key);
    const window = current && now < current.resetAtMs ? current : { count: 0, resetAtMs: now + windowMs };
    window.count += 1;
    this.windows.set(key, window);

    return { count: window.count, resetAtMs: window.resetAtMs };
  }

  get size(): number {
    return this.windows.size;
  }

  private sweep(now: number): void {
    if (now - this.lastSweepAt < SWEEP_INTERVAL_MS) {
      return;
    }

    this.lastSweepAt = now;
    for (const [key, window] of this.windows) {
      if (now >= window.resetAtMs) {
        this.windows.delete(key);
      }
    }
  }
}
