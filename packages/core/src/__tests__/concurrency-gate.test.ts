import { describe, it, expect, vi } from "vitest";
import { ConcurrencyGate } from "../admission/concurrency-gate.js";
import { PermitPool } from "../admission/permit-pool.js";
import { CapacityExceededError, PermitLeakError } from "../admission/errors.js";
import { withTimeout, TimeoutError } from "../utils/timeout.js";

function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("PermitPool", () => {
  it("hands out at most `capacity` permits", () => {
    const pool = new PermitPool(2);
    expect(pool.tryAcquire()).toBe(true);
    expect(pool.tryAcquire()).toBe(true);
    expect(pool.tryAcquire()).toBe(false);
    expect(pool.snapshot()).toEqual({ capacity: 2, available: 0, inFlight: 2, exhausted: true });
  });

  it("refuses a release that was never acquired", () => {
    const pool = new PermitPool(1);
    expect(() => pool.release()).toThrow(PermitLeakError);
  });

  it("rejects a non-integer capacity", () => {
    expect(() => new PermitPool(0)).toThrow(RangeError);
    expect(() => new PermitPool(1.5)).toThrow(RangeError);
  });
});

describe("ConcurrencyGate", () => {
  it("sheds the request past the global cap", () => {
    const gate = new ConcurrencyGate({ maxGlobal: 3, maxPerIdentity: 10 });
    expect(gate.tryAcquire("ip:a").acquired).toBe(true);
    expect(gate.tryAcquire("ip:b").acquired).toBe(true);
    expect(gate.tryAcquire("ip:c").acquired).toBe(true);

    const fourth = gate.tryAcquire("ip:d");
    expect(fourth).toEqual({ acquired: false, scope: "global" });
    expect(gate.inFlight()).toBe(3);
  });

  it("caps each identity independently", () => {
    const gate = new ConcurrencyGate({ maxGlobal: 10, maxPerIdentity: 1 });
    expect(gate.tryAcquire("key:a").acquired).toBe(true);
    expect(gate.tryAcquire("key:a")).toEqual({ acquired: false, scope: "identity" });
    expect(gate.tryAcquire("key:b").acquired).toBe(true);
  });

  it("returns the global permit when the identity pool is full", () => {
    const gate = new ConcurrencyGate({ maxGlobal: 2, maxPerIdentity: 1 });
    gate.tryAcquire("key:a");
    gate.tryAcquire("key:a");
    expect(gate.inFlight()).toBe(1);
    expect(gate.tryAcquire("key:b").acquired).toBe(true);
  });

  it("acquire returns null instead of a denial", () => {
    const gate = new ConcurrencyGate({ maxGlobal: 5, maxPerIdentity: 1 });
    const lease = gate.acquire("ip:a");
    expect(lease?.identity).toBe("ip:a");
    expect(gate.acquire("ip:a")).toBeNull();
    expect(gate.inFlight()).toBe(1);
    lease?.release();
    expect(gate.inFlight()).toBe(0);
  });

  it("releases both permits exactly once", () => {
    const gate = new ConcurrencyGate({ maxGlobal: 2, maxPerIdentity: 2 });
    const result = gate.tryAcquire("key:a");
    if (!result.acquired) throw new Error("expected a lease");

    result.lease.release();
    expect(result.lease.released).toBe(true);
    expect(gate.inFlight()).toBe(0);
    expect(gate.inFlight("key:a")).toBe(0);
    expect(() => result.lease.release()).toThrow(PermitLeakError);
    expect(gate.inFlight()).toBe(0);
  });

  it("run releases after success", async () => {
    const gate = new ConcurrencyGate({ maxGlobal: 1, maxPerIdentity: 1 });
    await expect(gate.run("key:a", () => 42)).resolves.toBe(42);
    expect(gate.inFlight()).toBe(0);
  });

  it("run releases after the operation throws", async () => {
    const gate = new ConcurrencyGate({ maxGlobal: 1, maxPerIdentity: 1 });
    await expect(
      gate.run("key:a", async () => {
        throw new Error("render failed");
      }),
    ).rejects.toThrow("render failed");
    expect(gate.inFlight()).toBe(0);
    expect(gate.inFlight("key:a")).toBe(0);
  });

  it("run releases after the operation times out", async () => {
    const gate = new ConcurrencyGate({ maxGlobal: 1, maxPerIdentity: 1 });
    const never = new Promise<void>(() => {});
    await expect(gate.run("key:a", () => withTimeout(never, 5, "export"))).rejects.toBeInstanceOf(TimeoutError);
    expect(gate.inFlight()).toBe(0);
  });

  it("run rejects without calling the operation when full", async () => {
    const gate = new ConcurrencyGate({ maxGlobal: 5, maxPerIdentity: 1 });
    const gateOpen = deferred();
    const first = gate.run("key:a", () => gateOpen.promise);
    const operation = vi.fn();

    const second = gate.run("key:a", operation);
    await expect(second).rejects.toBeInstanceOf(CapacityExceededError);
    await expect(second).rejects.toMatchObject({ scope: "identity", identity: "key:a" });
    expect(operation).not.toHaveBeenCalled();

    gateOpen.resolve();
    await first;
    expect(gate.inFlight()).toBe(0);
  });

  it("reports pools in the snapshot", () => {
    const gate = new ConcurrencyGate({ maxGlobal: 3, maxPerIdentity: 1 });
    gate.tryAcquire("key:a");

    expect(gate.snapshot()).toEqual({
      global: { capacity: 3, available: 2, inFlight: 1, exhausted: false },
      identities: {
        "key:a": { capacity: 1, available: 0, inFlight: 1, exhausted: true },
      },
      limits: { maxGlobal: 3, maxPerIdentity: 1 },
    });
  });

  it("sweeps only idle identity pools", () => {
    const gate = new ConcurrencyGate({ maxGlobal: 3, maxPerIdentity: 2 });
    const held = gate.tryAcquire("key:busy");
    const done = gate.tryAcquire("key:done");
    if (!done.acquired || !held.acquired) throw new Error("expected leases");
    done.lease.release();

    expect(gate.sweepIdle()).toBe(1);
    expect(Object.keys(gate.snapshot().identities)).toEqual(["key:busy"]);
  });
});
