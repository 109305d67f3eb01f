import type { ConcurrencyConfig, ConcurrencySnapshot, PoolSnapshot } from "@slidesmith/schemas";
import { PermitPool } from "./permit-pool.js";
import { CapacityExceededError, PermitLeakError } from "./errors.js";
import type { CapacityScope } from "./errors.js";
import type { Clock } from "./clock.js";
import { SystemClock } from "./clock.js";

export interface Lease {
  readonly identity: string;
  readonly acquiredAt: number;
  readonly released: boolean;
  release(): void;
}

export type AcquireResult =
  | { acquired: true; lease: Lease }
  | { acquired: false; scope: CapacityScope };

export interface ConcurrencyGateOptions extends ConcurrencyConfig {
  clock?: Clock;
}

class PermitLease implements Lease {
  private done = false;

  constructor(
    readonly identity: string,
    readonly acquiredAt: number,
    private readonly globalPool: PermitPool,
    private readonly identityPool: PermitPool,
  ) {}

  get released(): boolean {
    return this.done;
  }

  release(): void {
    if (this.done) {
      throw new PermitLeakError(`lease for ${this.identity} released twice`);
    }
    this.done = true;
    this.identityPool.release();
    this.globalPool.release();
  }
}

/**
 * Two-tier admission gate: one global permit pool plus one pool per identity.
 *
 * Acquisition never waits. A caller either gets both permits or neither.
 */
export class ConcurrencyGate {
  private readonly clock: Clock;
  private readonly globalPool: PermitPool;
  private readonly identityPools = new Map<string, PermitPool>();

  constructor(private readonly options: ConcurrencyGateOptions) {
    this.clock = options.clock ?? new SystemClock();
    this.globalPool = new PermitPool(options.maxGlobal);
  }

  get limits(): ConcurrencyConfig {
    return { maxGlobal: this.options.maxGlobal, maxPerIdentity: this.options.maxPerIdentity };
  }

  tryAcquire(identity: string): AcquireResult {
    if (!this.globalPool.tryAcquire()) {
      return { acquired: false, scope: "global" };
    }

    const identityPool = this.poolFor(identity);
    if (!identityPool.tryAcquire()) {
      this.globalPool.release();
      return { acquired: false, scope: "identity" };
    }

    return {
      acquired: true,
      lease: new PermitLease(identity, this.clock.now(), this.globalPool, identityPool),
    };
  }

  /** Like {@link tryAcquire}, without the denying scope. */
  acquire(identity: string): Lease | null {
    const result = this.tryAcquire(identity);
    return result.acquired ? result.lease : null;
  }

  /**
   * Runs `operation` while holding a lease. The lease is returned on every exit path;
   * errors from the operation propagate after release.
   */
  async run<T>(identity: string, operation: (lease: Lease) => Promise<T> | T): Promise<T> {
    const result = this.tryAcquire(identity);
    if (!result.acquired) {
      throw new CapacityExceededError(identity, result.scope);
    }
    try {
      return await operation(result.lease);
    } finally {
      result.lease.release();
    }
  }

  inFlight(identity?: string): number {
    if (identity === undefined) return this.globalPool.inFlight;
    return this.identityPools.get(identity)?.inFlight ?? 0;
  }

  /** Forgets per-identity pools with every permit returned. Returns how many were dropped. */
  sweepIdle(): number {
    let removed = 0;
    for (const [identity, pool] of this.identityPools) {
      if (pool.idle) {
        this.identityPools.delete(identity);
        removed++;
      }
    }
    return removed;
  }

  snapshot(): ConcurrencySnapshot {
    const identities: Record<string, PoolSnapshot> = {};
    for (const [identity, pool] of this.identityPools) {
      identities[identity] = pool.snapshot();
    }
    return {
      global: this.globalPool.snapshot(),
      identities,
      limits: this.limits,
    };
  }

  private poolFor(identity: string): PermitPool {
    let pool = this.identityPools.get(identity);
    if (!pool) {
      pool = new PermitPool(this.options.maxPerIdentity);
      this.identityPools.set(identity, pool);
    }
    return pool;
  }
}
