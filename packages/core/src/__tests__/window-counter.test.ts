import { describe, it, expect } from "vitest";
import { FixedWindowCounter } from "../admission/window-counter.js";

describe("FixedWindowCounter", () => {
  it("starts a window at the first request", () => {
    const counter = new FixedWindowCounter(1_000);
    expect(counter.increment("a", 5_000)).toEqual({ count: 1, windowStart: 5_000 });
  });

  it("accumulates within the window", () => {
    const counter = new FixedWindowCounter(1_000);
    counter.increment("a", 5_000);
    counter.increment("a", 5_400);
    expect(counter.increment("a", 5_999)).toEqual({ count: 3, windowStart: 5_000 });
  });

  it("restarts at the window boundary and counts the triggering request", () => {
    const counter = new FixedWindowCounter(1_000);
    counter.increment("a", 5_000);
    counter.increment("a", 5_500);
    expect(counter.increment("a", 6_000)).toEqual({ count: 1, windowStart: 6_000 });
  });

  it("keeps identities apart", () => {
    const counter = new FixedWindowCounter(1_000);
    counter.increment("a", 0);
    counter.increment("a", 1);
    expect(counter.increment("b", 2).count).toBe(1);
  });

  it("peek does not count and ignores expired windows", () => {
    const counter = new FixedWindowCounter(1_000);
    counter.increment("a", 0);
    expect(counter.peek("a", 500)).toEqual({ count: 1, windowStart: 0 });
    expect(counter.peek("a", 500)).toEqual({ count: 1, windowStart: 0 });
    expect(counter.peek("a", 1_000)).toBeNull();
  });

  it("sweeps expired records only", () => {
    const counter = new FixedWindowCounter(1_000);
    counter.increment("old", 0);
    counter.increment("fresh", 900);
    expect(counter.sweep(1_200)).toBe(1);
    expect(counter.size).toBe(1);
    expect(counter.peek("fresh", 1_200)).toEqual({ count: 1, windowStart: 900 });
  });

  it("evicts the least recently seen identity past the cap", () => {
    const counter = new FixedWindowCounter(60_000, 2);
    counter.increment("a", 0);
    counter.increment("b", 1);
    counter.increment("a", 2);
    counter.increment("c", 3);

    expect(counter.size).toBe(2);
    expect(counter.peek("b", 4)).toBeNull();
    expect(counter.peek("a", 4)?.count).toBe(2);
    expect(counter.peek("c", 4)?.count).toBe(1);
  });

  it("rejects a non-positive window", () => {
    expect(() => new FixedWindowCounter(0)).toThrow(RangeError);
  });
});
