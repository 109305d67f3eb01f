export {
  InMemoryGenerationCache,
  generationCacheKey,
  DEFAULT_GENERATION_TTL_MS,
  DEFAULT_GENERATION_MAX_ENTRIES,
} from "./generation-cache.js";
export type {
  GenerationCache,
  GenerationCacheStats,
  GenerationKeyInput,
  InMemoryGenerationCacheOptions,
} from "./generation-cache.js";
