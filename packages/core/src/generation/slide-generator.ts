import type { Slide } from "@slidesmith/schemas";
import type { SlideContentGenerator } from "./types.js";
import type { GenerationCache } from "../cache/generation-cache.js";
import { generationCacheKey } from "../cache/generation-cache.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

export interface SlideGeneratorOptions {
  cache: GenerationCache;
  generator: SlideContentGenerator;
  /** Overrides the cache's own TTL for generated decks. */
  cacheTtlMs?: number;
  now?: () => Date;
  logger?: Logger;
}

const TITLE_DATE_FORMAT = new Intl.DateTimeFormat("en-US", {
  month: "long",
  day: "2-digit",
  year: "numeric",
  timeZone: "UTC",
});

export function formatGeneratedOn(date: Date): string {
  return `Generated on ${TITLE_DATE_FORMAT.format(date)}`;
}

/**
 * Builds a full deck: a title slide followed by `numSlides - 1` content slides from the
 * active generator. Results are cached per generator, topic, count and custom content.
 */
export class SlideGenerator {
  private generator: SlideContentGenerator;
  private readonly cache: GenerationCache;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(private readonly options: SlideGeneratorOptions) {
    this.generator = options.generator;
    this.cache = options.cache;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  get generatorName(): string {
    return this.generator.name;
  }

  /** Swaps the content generator. Decks already cached for the previous one stay cached under its name. */
  useGenerator(generator: SlideContentGenerator): void {
    this.logger.info({ from: this.generator.name, to: generator.name }, "Switched slide content generator");
    this.generator = generator;
  }

  async generate(topic: string, numSlides: number, customContent?: string | null): Promise<Slide[]> {
    const key = generationCacheKey({
      generator: this.generator.name,
      topic,
      numSlides,
      customContent,
    });

    const cached = await this.readCache(key);
    if (cached) return cached;

    const titleSlide: Slide = {
      slideType: "title",
      title: topic,
      content: [formatGeneratedOn(this.now())],
      imageSuggestion: null,
      citations: [],
    };
    const body = numSlides > 1 ? await this.generator.generateSlides(topic, numSlides - 1, customContent) : [];
    const slides = [titleSlide, ...body];

    await this.writeCache(key, slides);
    return slides;
  }

  // Cache failures are logged and generation carries on without it.
  private async readCache(key: string): Promise<Slide[] | null> {
    try {
      return await this.cache.get(key);
    } catch (err) {
      this.logger.warn({ err: err instanceof Error ? err.message : String(err) }, "Generation cache read failed");
      return null;
    }
  }

  private async writeCache(key: string, slides: Slide[]): Promise<void> {
    try {
      await this.cache.set(key, slides, this.options.cacheTtlMs);
    } catch (err) {
      this.logger.warn({ err: err instanceof Error ? err.message : String(err) }, "Generation cache write failed");
    }
  }
}
