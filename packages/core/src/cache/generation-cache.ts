import { createHash } from "node:crypto";
import type { Slide } from "@slidesmith/schemas";
import type { Clock } from "../admission/clock.js";
import { SystemClock } from "../admission/clock.js";

export const DEFAULT_GENERATION_TTL_MS = 30 * 60 * 1000;
export const DEFAULT_GENERATION_MAX_ENTRIES = 200;

export interface GenerationCacheStats {
  backend: string;
  size: number;
  maxEntries: number | null;
  ttlMs: number;
}

/** Stores generated decks so identical requests skip the content generator. */
export interface GenerationCache {
  get(key: string): Promise<Slide[] | null>;
  set(key: string, slides: Slide[], ttlMs?: number): Promise<void>;
  /** Returns how many entries were dropped. */
  clear(): Promise<number>;
  stats(): Promise<GenerationCacheStats>;
}

export interface GenerationKeyInput {
  generator: string;
  topic: string;
  numSlides: number;
  customContent?: string | null;
}

export function generationCacheKey(input: GenerationKeyInput): string {
  const material = JSON.stringify([input.generator, input.topic, input.numSlides, input.customContent ?? null]);
  return createHash("sha256").update(material).digest("hex");
}

export interface InMemoryGenerationCacheOptions {
  ttlMs?: number;
  maxEntries?: number;
  clock?: Clock;
}

export class InMemoryGenerationCache implements GenerationCache {
  private entries = new Map<string, { slides: Slide[]; expiresAt: number }>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: Clock;

  constructor(options: InMemoryGenerationCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_GENERATION_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_GENERATION_MAX_ENTRIES;
    this.clock = options.clock ?? new SystemClock();
  }

  async get(key: string): Promise<Slide[] | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock.now()) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(entry.slides);
  }

  async set(key: string, slides: Slide[], ttlMs = this.ttlMs): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, { slides: structuredClone(slides), expiresAt: this.clock.now() + ttlMs });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  async clear(): Promise<number> {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  async stats(): Promise<GenerationCacheStats> {
    const now = this.clock.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
    return { backend: "memory", size: this.entries.size, maxEntries: this.maxEntries, ttlMs: this.ttlMs };
  }
}
