import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";
import type { ConcurrencyConfig, QuotaDecision } from "@slidesmith/schemas";
import type { AdmissionController, AdmissionTicket, CapacityExceededError } from "@slidesmith/core";

/**
 * - `protected`: rate limited, and the handler holds a concurrency lease around its work.
 * - `rate-limited`: rate limited only. Default for everything under /api/v1.
 * - `exempt`: neither. Default outside /api/v1.
 */
export type AdmissionMode = "protected" | "rate-limited" | "exempt";

declare module "fastify" {
  interface FastifyContextConfig {
    admission?: AdmissionMode;
  }
  interface FastifyInstance {
    admission: AdmissionController;
  }
  interface FastifyRequest {
    /** Rate limit decision taken in onRequest; null on exempt routes. */
    quota: QuotaDecision | null;
  }
}

const RATE_LIMITED_PREFIX = "/api/v1/";

export function admissionModeFor(request: FastifyRequest): AdmissionMode {
  const configured = request.routeOptions.config.admission;
  if (configured) return configured;
  return request.url.startsWith(RATE_LIMITED_PREFIX) ? "rate-limited" : "exempt";
}

/** Metric label: method plus the route pattern, never the raw URL. */
export function routeLabel(request: FastifyRequest): string {
  return `${request.method} ${request.routeOptions.url ?? "unmatched"}`;
}

export function setRateLimitHeaders(reply: FastifyReply, decision: QuotaDecision): void {
  const { minute, hour } = decision.windows;
  reply.header("X-RateLimit-Minute-Limit", String(minute.limit));
  reply.header("X-RateLimit-Minute-Remaining", String(minute.remaining));
  reply.header("X-RateLimit-Hour-Limit", String(hour.limit));
  reply.header("X-RateLimit-Hour-Remaining", String(hour.remaining));
}

export function setConcurrencyHeaders(reply: FastifyReply, identity: string, limits: ConcurrencyConfig): void {
  reply.header("X-Concurrency-User-ID", identity);
  reply.header("X-Concurrency-Global-Limit", String(limits.maxGlobal));
  reply.header("X-Concurrency-User-Limit", String(limits.maxPerIdentity));
}

export function sendQuotaExceeded(reply: FastifyReply, decision: QuotaDecision) {
  const retryAfter = decision.retryAfter ?? 1;
  setRateLimitHeaders(reply, decision);
  return reply
    .code(429)
    .header("Retry-After", String(retryAfter))
    .send({
      error: "Rate limit exceeded",
      message: `Too many requests. Limit: ${decision.limit} per ${decision.granularity}`,
      retry_after: retryAfter,
    });
}

export function sendCapacityExceeded(reply: FastifyReply, error: CapacityExceededError, limits: ConcurrencyConfig) {
  if (error.quota) {
    setRateLimitHeaders(reply, error.quota);
  }
  setConcurrencyHeaders(reply, error.identity, limits);
  return reply.code(503).send({
    error: "Service temporarily unavailable",
    message: "Too many concurrent requests. Please try again later.",
  });
}

/**
 * Runs `operation` under a concurrency lease for the caller.
 *
 * Reuses the quota decision the admission hook already took, so a protected request is
 * counted against its windows exactly once. Throws CapacityExceededError without calling
 * `operation` when no permit is free.
 */
export function withCapacity<T>(
  request: FastifyRequest,
  operation: (ticket: AdmissionTicket) => Promise<T> | T,
): Promise<T> {
  const controller = request.server.admission;
  const options = { route: routeLabel(request) };
  return request.quota
    ? controller.runWithCapacity(request.identity, request.quota, operation, options)
    : controller.admit(request.identity, operation, options);
}

export interface AdmissionPluginOptions {
  controller: AdmissionController;
}

/**
 * Rate limiting for every non-exempt route, checked in onRequest before the body is parsed.
 * Must be registered after the auth middleware, which resolves `request.identity`.
 */
const admissionPlugin: FastifyPluginAsync<AdmissionPluginOptions> = async (app, { controller }) => {
  app.decorate("admission", controller);
  app.decorateRequest("quota", null);

  app.addHook("onRequest", async (request, reply) => {
    const mode = admissionModeFor(request);
    if (mode === "exempt") return;

    const decision = controller.checkQuota(request.identity, { route: routeLabel(request) });
    request.quota = decision;

    setRateLimitHeaders(reply, decision);
    if (mode === "protected") {
      setConcurrencyHeaders(reply, request.identity, controller.config.concurrency);
    }
    if (!decision.allowed) {
      return sendQuotaExceeded(reply, decision);
    }
  });
};

export const admissionMiddleware = fp(admissionPlugin, {
  name: "admission-middleware",
  dependencies: ["auth-middleware"],
});
