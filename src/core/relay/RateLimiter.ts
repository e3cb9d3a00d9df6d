const WINDOW_MS = 60_000;

/** Sliding one-minute window per key. Refused calls are not counted. */
export class RateLimiter {
  private readonly timestamps = new Map<string, number[]>();

  constructor(
    private readonly maxPerMinute: number,
    private readonly now: () => number = Date.now
  ) {}

  isAllowed(key: string, now: number = this.now()): boolean {
    const cutoff = now - WINDOW_MS;
    const recent = (this.timestamps.get(key) ?? []).filter((t) => t > cutoff);
    if (recent.length >= this.maxPerMinute) {
      this.timestamps.set(key, recent);
      return false;
    }
    recent.push(now);
    this.timestamps.set(key, recent);
    return true;
  }

  /** Drops keys with no calls inside the window. Returns the number dropped. */
  sweep(now: number = this.now()): number {
    const cutoff = now - WINDOW_MS;
    let dropped = 0;
    for (const [key, times] of this.timestamps) {
      if (!times.some((t) => t > cutoff)) {
        this.timestamps.delete(key);
        dropped++;
      }
    }
    return dropped;
  }
}
