/**
 * Sliding-window limiter shared by every outbound model call.
 * `acquire()` resolves once a slot inside the last minute is free.
 */
export class RateLimiter {
  private readonly stamps: number[] = [];

  constructor(
    private readonly requestsPerMinute: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: (ms: number) => Promise<void> = (ms) =>
      new Promise((resolve) => setTimeout(resolve, ms)),
  ) {}

  async acquire(): Promise<void> {
    if (this.requestsPerMinute <= 0) return;

    for (;;) {
      const t = this.now();
      while (this.stamps.length > 0 && t - this.stamps[0] >= 60_000) {
        this.stamps.shift();
      }
      if (this.stamps.length < this.requestsPerMinute) {
        this.stamps.push(t);
        return;
      }
      await this.sleep(60_000 - (t - this.stamps[0]));
    }
  }

  /** Requests still allowed in the current window. */
  remaining(): number {
    if (this.requestsPerMinute <= 0) return Number.POSITIVE_INFINITY;
    const t = this.now();
    const live = this.stamps.filter((s) => t - s < 60_000).length;
    return Math.max(0, this.requestsPerMinute - live);
  }
}
