import type { QuotaDecision } from "@slidesmith/schemas";

/** The caller has used up a minute or hour window. Retry after `retryAfter` seconds. */
export class QuotaExceededError extends Error {
  constructor(public readonly decision: QuotaDecision) {
    super(`Rate limit exceeded for ${decision.identity}: limit ${decision.limit}, retry after ${decision.retryAfter ?? 0}s`);
    this.name = "QuotaExceededError";
  }

  get retryAfter(): number {
    return this.decision.retryAfter ?? 1;
  }
}

export type CapacityScope = "global" | "identity";

/** No permit is free right now. The gate sheds load instead of queueing. */
export class CapacityExceededError extends Error {
  constructor(
    public readonly identity: string,
    public readonly scope: CapacityScope,
    public readonly quota?: QuotaDecision,
  ) {
    super(
      scope === "global"
        ? "Too many concurrent requests. Please try again later."
        : `Too many concurrent requests for ${identity}. Please try again later.`,
    );
    this.name = "CapacityExceededError";
  }
}

/** A permit was returned that was never taken, or a lease was released twice. */
export class PermitLeakError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PermitLeakError";
  }
}
