import Redis from "ioredis";
import { InMemoryGenerationCache } from "@slidesmith/core";
import type { Clock, GenerationCache } from "@slidesmith/core";
import { RedisGenerationCache } from "./redis.js";

export { RedisGenerationCache } from "./redis.js";
export type { GenerationCacheRedis } from "./redis.js";

export interface GenerationCacheSetup {
  cache: GenerationCache;
  /** Closes the Redis connection, if one was opened. */
  close: () => Promise<void>;
}

export function createGenerationCache(options: {
  redisUrl: string | null;
  ttlMs: number;
  maxEntries: number;
  clock?: Clock;
}): GenerationCacheSetup {
  if (options.redisUrl) {
    const redis = new Redis(options.redisUrl);
    return {
      cache: new RedisGenerationCache(redis, options.ttlMs),
      close: async () => {
        await redis.quit();
      },
    };
  }
  return {
    cache: new InMemoryGenerationCache({ ttlMs: options.ttlMs, maxEntries: options.maxEntries, clock: options.clock }),
    close: async () => {},
  };
}
