import type { AdmissionConfig, ConcurrencySnapshot, QuotaDecision } from "@slidesmith/schemas";
import { DEFAULT_ADMISSION_CONFIG } from "@slidesmith/schemas";
import { RateLimiter } from "./rate-limiter.js";
import type { RateLimiterStats } from "./rate-limiter.js";
import { ConcurrencyGate } from "./concurrency-gate.js";
import type { Lease } from "./concurrency-gate.js";
import { CapacityExceededError, QuotaExceededError } from "./errors.js";
import type { Clock } from "./clock.js";
import { SystemClock } from "./clock.js";
import type { AdmissionMetrics } from "../telemetry/metrics.js";
import { createInMemoryMetrics } from "../telemetry/metrics.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

/**
 * Process-wide admission state. Built once per server (or per test) and handed to the
 * controller; nothing else holds the window or permit tables.
 */
export interface AdmissionContext {
  config: AdmissionConfig;
  clock: Clock;
  rateLimiter: RateLimiter;
  gate: ConcurrencyGate;
}

export function createAdmissionContext(
  config: AdmissionConfig = DEFAULT_ADMISSION_CONFIG,
  clock: Clock = new SystemClock(),
): AdmissionContext {
  return {
    config,
    clock,
    rateLimiter: new RateLimiter({
      ...config.rateLimit,
      maxTrackedIdentities: config.maxTrackedIdentities,
      clock,
    }),
    gate: new ConcurrencyGate({ ...config.concurrency, clock }),
  };
}

export interface AdmissionTicket {
  identity: string;
  quota: QuotaDecision;
  lease: Lease;
}

export interface AdmitOptions {
  /** Metric label for the protected operation. */
  route?: string;
}

export interface SweepResult {
  windows: number;
  pools: number;
}

export interface AdmissionControllerDeps {
  metrics?: AdmissionMetrics;
  logger?: Logger;
}

/**
 * Rate limit, then concurrency gate, then the protected operation.
 *
 * Denials surface as QuotaExceededError or CapacityExceededError before the operation
 * is called. Errors thrown by the operation propagate after its lease is returned.
 */
export class AdmissionController {
  private readonly metrics: AdmissionMetrics;
  private readonly logger: Logger;

  constructor(
    private readonly context: AdmissionContext,
    deps: AdmissionControllerDeps = {},
  ) {
    this.metrics = deps.metrics ?? createInMemoryMetrics();
    this.logger = deps.logger ?? silentLogger;
  }

  get config(): AdmissionConfig {
    return this.context.config;
  }

  checkQuota(identity: string, options: AdmitOptions = {}): QuotaDecision {
    const decision = this.context.rateLimiter.check(identity, this.context.clock.now());
    if (!decision.allowed) {
      this.metrics.quotaDenied.inc({ route: options.route ?? "unknown" });
      this.logger.info(
        { identity, limit: decision.limit, retryAfter: decision.retryAfter, route: options.route },
        "Rate limit exceeded",
      );
    }
    return decision;
  }

  async admit<T>(
    identity: string,
    operation: (ticket: AdmissionTicket) => Promise<T> | T,
    options: AdmitOptions = {},
  ): Promise<T> {
    const quota = this.checkQuota(identity, options);
    if (!quota.allowed) {
      throw new QuotaExceededError(quota);
    }
    return this.runWithCapacity(identity, quota, operation, options);
  }

  /** Concurrency half of {@link admit}, for callers that already checked the quota. */
  async runWithCapacity<T>(
    identity: string,
    quota: QuotaDecision,
    operation: (ticket: AdmissionTicket) => Promise<T> | T,
    options: AdmitOptions = {},
  ): Promise<T> {
    const labels = { route: options.route ?? "unknown" };
    const { gate, clock } = this.context;

    const result = gate.tryAcquire(identity);
    if (!result.acquired) {
      this.metrics.capacityDenied.inc(labels);
      this.logger.warn(
        { identity, scope: result.scope, route: options.route, inFlight: gate.inFlight() },
        "Concurrency limit reached, shedding request",
      );
      throw new CapacityExceededError(identity, result.scope, quota);
    }

    const { lease } = result;
    const startedAt = clock.now();
    this.metrics.admitted.inc(labels);
    this.metrics.leasesInFlight.set(gate.inFlight());

    try {
      return await operation({ identity, quota, lease });
    } finally {
      lease.release();
      this.metrics.leasesInFlight.set(gate.inFlight());
      this.metrics.operationLatencyMs.observe(labels, clock.now() - startedAt);
    }
  }

  concurrencySnapshot(): ConcurrencySnapshot {
    return this.context.gate.snapshot();
  }

  rateLimitStats(): RateLimiterStats {
    return this.context.rateLimiter.stats();
  }

  /** Drops expired windows and idle per-identity pools. */
  sweep(): SweepResult {
    const now = this.context.clock.now();
    return {
      windows: this.context.rateLimiter.sweep(now),
      pools: this.context.gate.sweepIdle(),
    };
  }
}
