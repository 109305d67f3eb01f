export { SystemClock, ManualClock } from "./clock.js";
export type { Clock } from "./clock.js";
export { QuotaExceededError, CapacityExceededError, PermitLeakError } from "./errors.js";
export type { CapacityScope } from "./errors.js";
export { FixedWindowCounter } from "./window-counter.js";
export type { WindowRecord } from "./window-counter.js";
export { RateLimiter, MINUTE_MS, HOUR_MS } from "./rate-limiter.js";
export type { RateLimiterOptions, RateLimiterStats } from "./rate-limiter.js";
export { PermitPool } from "./permit-pool.js";
export { ConcurrencyGate } from "./concurrency-gate.js";
export type { Lease, AcquireResult, ConcurrencyGateOptions } from "./concurrency-gate.js";
export { resolveIdentity, keyIdentity, UNKNOWN_IDENTITY } from "./identity.js";
export type { IdentitySource } from "./identity.js";
export { AdmissionController, createAdmissionContext } from "./controller.js";
export type {
  AdmissionContext,
  AdmissionTicket,
  AdmitOptions,
  AdmissionControllerDeps,
  SweepResult,
} from "./controller.js";
