import type { QuotaDecision, RateLimitConfig, WindowDecision, WindowGranularity } from "@slidesmith/schemas";
import { FixedWindowCounter } from "./window-counter.js";
import type { Clock } from "./clock.js";
import { SystemClock } from "./clock.js";

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;

export interface RateLimiterOptions extends RateLimitConfig {
  /** Identities tracked per window table before least-recently-seen eviction. */
  maxTrackedIdentities?: number;
  clock?: Clock;
}

interface WindowSlot {
  granularity: WindowGranularity;
  limit: number;
  counter: FixedWindowCounter;
}

export interface RateLimiterStats {
  limits: RateLimitConfig;
  trackedIdentities: Record<WindowGranularity, number>;
}

/**
 * Fixed-window limiter evaluated against a minute and an hour window.
 *
 * Every call counts, including calls that end up denied, so a client that keeps
 * hammering stays locked out until its window rolls over.
 */
export class RateLimiter {
  private readonly clock: Clock;
  private readonly slots: [WindowSlot, WindowSlot];

  constructor(options: RateLimiterOptions) {
    this.clock = options.clock ?? new SystemClock();
    const maxKeys = options.maxTrackedIdentities ?? Number.POSITIVE_INFINITY;
    this.slots = [
      {
        granularity: "minute",
        limit: options.requestsPerMinute,
        counter: new FixedWindowCounter(MINUTE_MS, maxKeys),
      },
      {
        granularity: "hour",
        limit: options.requestsPerHour,
        counter: new FixedWindowCounter(HOUR_MS, maxKeys),
      },
    ];
  }

  get limits(): RateLimitConfig {
    return {
      requestsPerMinute: this.slots[0].limit,
      requestsPerHour: this.slots[1].limit,
    };
  }

  check(identity: string, now: number = this.clock.now()): QuotaDecision {
    const minute = this.evaluate(this.slots[0], identity, now);
    const hour = this.evaluate(this.slots[1], identity, now);
    const binding = bindingWindow(minute, hour);

    return {
      identity,
      allowed: minute.allowed && hour.allowed,
      granularity: binding.granularity,
      limit: binding.limit,
      remaining: binding.remaining,
      retryAfter: binding.retryAfter,
      windows: { minute, hour },
    };
  }

  sweep(now: number = this.clock.now()): number {
    return this.slots.reduce((removed, slot) => removed + slot.counter.sweep(now), 0);
  }

  stats(): RateLimiterStats {
    return {
      limits: this.limits,
      trackedIdentities: {
        minute: this.slots[0].counter.size,
        hour: this.slots[1].counter.size,
      },
    };
  }

  private evaluate(slot: WindowSlot, identity: string, now: number): WindowDecision {
    const { count, windowStart } = slot.counter.increment(identity, now);
    const allowed = count <= slot.limit;
    const resetAt = windowStart + slot.counter.windowMs;

    return {
      granularity: slot.granularity,
      limit: slot.limit,
      count,
      remaining: Math.max(0, slot.limit - count),
      allowed,
      resetAt,
      retryAfter: allowed ? null : Math.max(1, Math.ceil((resetAt - now) / 1000)),
    };
  }
}

/** The window that decides the outcome: the longest wait when denied, else the tightest. */
function bindingWindow(minute: WindowDecision, hour: WindowDecision): WindowDecision {
  if (!minute.allowed || !hour.allowed) {
    if (minute.allowed) return hour;
    if (hour.allowed) return minute;
    return (hour.retryAfter ?? 0) > (minute.retryAfter ?? 0) ? hour : minute;
  }
  return hour.remaining < minute.remaining ? hour : minute;
}
