import { z } from "zod";
import { SlideSchema } from "@slidesmith/schemas";
import type { Slide } from "@slidesmith/schemas";
import type { GenerationCache, GenerationCacheStats } from "@slidesmith/core";

const KEY_PREFIX = "slides:";
const SCAN_BATCH = 100;

const CachedSlidesSchema = z.array(SlideSchema);

/** The part of an ioredis client the cache uses. */
export interface GenerationCacheRedis {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(cursor: string, match: "MATCH", pattern: string, count: "COUNT", batch: number): Promise<[string, string[]]>;
}

/**
 * Generated decks shared across API instances. Expiry is left to Redis (PX); entries that
 * fail to parse are treated as misses.
 */
export class RedisGenerationCache implements GenerationCache {
  constructor(
    private redis: GenerationCacheRedis,
    private readonly ttlMs: number,
  ) {}

  async get(key: string): Promise<Slide[] | null> {
    const raw = await this.redis.get(`${KEY_PREFIX}${key}`);
    if (!raw) return null;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = CachedSlidesSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
  }

  async set(key: string, slides: Slide[], ttlMs = this.ttlMs): Promise<void> {
    await this.redis.set(`${KEY_PREFIX}${key}`, JSON.stringify(slides), "PX", ttlMs);
  }

  async clear(): Promise<number> {
    const keys = await this.scanKeys();
    let removed = 0;
    for (let i = 0; i < keys.length; i += SCAN_BATCH) {
      removed += await this.redis.del(...keys.slice(i, i + SCAN_BATCH));
    }
    return removed;
  }

  async stats(): Promise<GenerationCacheStats> {
    const keys = await this.scanKeys();
    return { backend: "redis", size: keys.length, maxEntries: null, ttlMs: this.ttlMs };
  }

  // SCAN may repeat a key across pages.
  private async scanKeys(): Promise<string[]> {
    const keys = new Set<string>();
    let cursor = "0";
    do {
      const [next, page] = await this.redis.scan(cursor, "MATCH", `${KEY_PREFIX}*`, "COUNT", SCAN_BATCH);
      cursor = next;
      for (const key of page) keys.add(key);
    } while (cursor !== "0");
    return [...keys];
  }
}
