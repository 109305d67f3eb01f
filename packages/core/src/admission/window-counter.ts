export interface WindowRecord {
  count: number;
  windowStart: number;
}

/**
 * Fixed-window request counter keyed by identity.
 *
 * A record restarts at `now` once `now >= windowStart + windowMs`; the request that
 * triggers the restart is the first one counted in the new window. Keys are kept in
 * least-recently-seen order so the table can be capped without a separate index.
 */
export class FixedWindowCounter {
  private records = new Map<string, WindowRecord>();

  constructor(
    readonly windowMs: number,
    private readonly maxKeys = Number.POSITIVE_INFINITY,
  ) {
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new RangeError(`windowMs must be a positive number, got ${windowMs}`);
    }
  }

  /** Counts one request and returns a snapshot of the window it landed in. */
  increment(key: string, now: number): WindowRecord {
    const existing = this.records.get(key);
    const record: WindowRecord =
      existing && now < existing.windowStart + this.windowMs
        ? existing
        : { count: 0, windowStart: now };

    record.count += 1;

    // Re-insert so iteration order tracks recency.
    this.records.delete(key);
    this.records.set(key, record);
    this.evictOverflow();

    return { ...record };
  }

  peek(key: string, now: number): WindowRecord | null {
    const record = this.records.get(key);
    if (!record || now >= record.windowStart + this.windowMs) return null;
    return { ...record };
  }

  /** Drops every record whose window has ended. Returns how many were removed. */
  sweep(now: number): number {
    let removed = 0;
    for (const [key, record] of this.records) {
      if (now >= record.windowStart + this.windowMs) {
        this.records.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }

  private evictOverflow(): void {
    while (this.records.size > this.maxKeys) {
      const oldest = this.records.keys().next();
      if (oldest.done) return;
      this.records.delete(oldest.value);
    }
  }
}
