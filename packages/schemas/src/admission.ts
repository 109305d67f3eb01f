import { z } from "zod";

export const WindowGranularitySchema = z.enum(["minute", "hour"]);
export type WindowGranularity = z.infer<typeof WindowGranularitySchema>;

export const RateLimitConfigSchema = z.object({
  requestsPerMinute: z.number().int().positive(),
  requestsPerHour: z.number().int().positive(),
});
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;

export const ConcurrencyConfigSchema = z.object({
  maxGlobal: z.number().int().positive(),
  maxPerIdentity: z.number().int().positive(),
});
export type ConcurrencyConfig = z.infer<typeof ConcurrencyConfigSchema>;

export const AdmissionConfigSchema = z.object({
  rateLimit: RateLimitConfigSchema,
  concurrency: ConcurrencyConfigSchema,
  /** Cap on identities tracked by the window table before least-recently-seen eviction. */
  maxTrackedIdentities: z.number().int().positive(),
});
export type AdmissionConfig = z.infer<typeof AdmissionConfigSchema>;

export const DEFAULT_ADMISSION_CONFIG: AdmissionConfig = {
  rateLimit: { requestsPerMinute: 60, requestsPerHour: 1000 },
  concurrency: { maxGlobal: 100, maxPerIdentity: 10 },
  maxTrackedIdentities: 10_000,
};

export interface WindowDecision {
  granularity: WindowGranularity;
  limit: number;
  count: number;
  remaining: number;
  allowed: boolean;
  /** Epoch ms at which the current window ends. */
  resetAt: number;
  /** Whole seconds until the window resets; null while allowed. */
  retryAfter: number | null;
}

export interface QuotaDecision {
  identity: string;
  allowed: boolean;
  /** Window that decided the outcome: the denying one, else the one with least room. */
  granularity: WindowGranularity;
  limit: number;
  remaining: number;
  retryAfter: number | null;
  windows: Record<WindowGranularity, WindowDecision>;
}

export interface PoolSnapshot {
  capacity: number;
  available: number;
  inFlight: number;
  exhausted: boolean;
}

export interface ConcurrencySnapshot {
  global: PoolSnapshot;
  identities: Record<string, PoolSnapshot>;
  limits: ConcurrencyConfig;
}
