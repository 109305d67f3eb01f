import { z } from "zod";
import type { AdmissionConfig } from "@slidesmith/schemas";
import { AdmissionConfigSchema } from "@slidesmith/schemas";

/** Blank variables count as unset. */
const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  PORT: positiveInt(3000),
  HOST: z.preprocess(blankToUndefined, z.string().default("0.0.0.0")),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  ),
  CORS_ORIGIN: optionalString,
  API_KEYS: optionalString,
  RATE_LIMIT_PER_MINUTE: positiveInt(60),
  RATE_LIMIT_PER_HOUR: positiveInt(1000),
  MAX_CONCURRENT_REQUESTS: positiveInt(100),
  MAX_CONCURRENT_PER_USER: positiveInt(10),
  ADMISSION_MAX_IDENTITIES: positiveInt(10_000),
  ADMISSION_SWEEP_INTERVAL_MS: positiveInt(60_000),
  DATABASE_PATH: optionalString,
  REDIS_URL: optionalString,
  GENERATION_CACHE_TTL_MS: positiveInt(30 * 60 * 1000),
  GENERATION_CACHE_MAX_ENTRIES: positiveInt(200),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-3.5-turbo")),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  EXPORT_TIMEOUT_MS: positiveInt(30_000),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  /** `true` reflects any origin. */
  corsOrigins: string[] | true;
  /** Empty: keys are accepted unverified and only used as identities. */
  apiKeys: string[];
  admission: AdmissionConfig;
  admissionSweepIntervalMs: number;
  databasePath: string | null;
  redisUrl: string | null;
  generationCache: { ttlMs: number; maxEntries: number };
  openai: { apiKey: string; model: string; baseUrl: string | null } | null;
  exportTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

function splitList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const e = parsed.data;

  const admission = AdmissionConfigSchema.parse({
    rateLimit: { requestsPerMinute: e.RATE_LIMIT_PER_MINUTE, requestsPerHour: e.RATE_LIMIT_PER_HOUR },
    concurrency: { maxGlobal: e.MAX_CONCURRENT_REQUESTS, maxPerIdentity: e.MAX_CONCURRENT_PER_USER },
    maxTrackedIdentities: e.ADMISSION_MAX_IDENTITIES,
  });

  const corsOrigins = splitList(e.CORS_ORIGIN);

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : true,
    apiKeys: splitList(e.API_KEYS),
    admission,
    admissionSweepIntervalMs: e.ADMISSION_SWEEP_INTERVAL_MS,
    databasePath: e.DATABASE_PATH ?? null,
    redisUrl: e.REDIS_URL ?? null,
    generationCache: { ttlMs: e.GENERATION_CACHE_TTL_MS, maxEntries: e.GENERATION_CACHE_MAX_ENTRIES },
    openai: e.OPENAI_API_KEY
      ? { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, baseUrl: e.OPENAI_BASE_URL ?? null }
      : null,
    exportTimeoutMs: e.EXPORT_TIMEOUT_MS,
  };
}
