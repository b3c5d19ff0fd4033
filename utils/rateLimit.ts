interface RateLimitEntry {
  count: number;
  start: number;
}

/** Fixed-window request counter per client key. */
export class RateLimiter {
  private entries = new Map<string, RateLimitEntry>();

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number,
  ) {}

  isLimited(key: string, now = Date.now()): boolean {
    const entry = this.entries.get(key);
    if (!entry || now - entry.start > this.windowMs) {
      this.entries.set(key, { start: now, count: 1 });
      return false;
    }
    entry.count++;
    return entry.count > this.maxRequests;
  }

  prune(now = Date.now()): void {
    for (const [key, entry] of this.entries) {
      if (now - entry.start > this.windowMs) this.entries.delete(key);
    }
  }
}
