import type { PoolSnapshot } from "@slidesmith/schemas";
import { PermitLeakError } from "./errors.js";

/** Non-blocking counting semaphore. */
export class PermitPool {
  private available: number;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  tryAcquire(): boolean {
    if (this.available === 0) return false;
    this.available -= 1;
    return true;
  }

  release(): void {
    if (this.available >= this.capacity) {
      throw new PermitLeakError(`release would exceed pool capacity of ${this.capacity}`);
    }
    this.available += 1;
  }

  get inFlight(): number {
    return this.capacity - this.available;
  }

  get idle(): boolean {
    return this.available === this.capacity;
  }

  snapshot(): PoolSnapshot {
    return {
      capacity: this.capacity,
      available: this.available,
      inFlight: this.inFlight,
      exhausted: this.available === 0,
    };
  }
}
