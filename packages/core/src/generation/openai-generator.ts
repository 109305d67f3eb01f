import { z } from "zod";
import type { Slide } from "@slidesmith/schemas";
import { SlideTypeSchema } from "@slidesmith/schemas";
import type { SlideContentGenerator } from "./types.js";
import { GenerationError } from "./types.js";
import { DummySlideGenerator } from "./dummy-generator.js";
import { buildDraftPrompt, buildFormatPrompt } from "./prompts.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

export const DEFAULT_OPENAI_MODEL = "gpt-3.5-turbo";
const DEFAULT_MAX_TOKENS = 1500;
const DRAFT_TEMPERATURE = 0.7;
const FORMAT_TEMPERATURE = 0.3;

export interface OpenAIGeneratorConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  maxTokens?: number;
  /** Injected in tests; defaults to the global fetch. */
  fetch?: typeof fetch;
  logger?: Logger;
  fallback?: SlideContentGenerator;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const GeneratedSlideSchema = z.object({
  slide_type: SlideTypeSchema.exclude(["title"]).catch("bullet_points"),
  title: z.string().default("Untitled Slide"),
  content: z.array(z.string()).catch([]),
  image_suggestion: z.string().nullable().default(null),
  citations: z.array(z.string()).catch([]),
});

const GeneratedDeckSchema = z.object({ slides: z.array(GeneratedSlideSchema) });

/**
 * Chat Completions backed generator. Drafts the outline in one call and asks for JSON
 * in a second; any failure along the way falls back to placeholder content.
 */
export class OpenAISlideGenerator implements SlideContentGenerator {
  readonly name: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private readonly fallback: SlideContentGenerator;

  constructor(private readonly config: OpenAIGeneratorConfig) {
    this.model = config.model ?? DEFAULT_OPENAI_MODEL;
    this.baseUrl = (config.baseUrl ?? "https://api.openai.com").replace(/\/+$/, "");
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = config.logger ?? silentLogger;
    this.fallback = config.fallback ?? new DummySlideGenerator();
    this.name = `openai-${this.model}`;
  }

  async generateSlides(topic: string, count: number, customContent?: string | null): Promise<Slide[]> {
    try {
      const draft = await this.complete(
        buildDraftPrompt(topic, count, ["bullet_points", "two_column", "content_with_image"], customContent),
        DRAFT_TEMPERATURE,
      );
      const formatted = await this.complete(buildFormatPrompt(topic, draft), FORMAT_TEMPERATURE);
      return parseGeneratedSlides(formatted, count);
    } catch (err) {
      this.logger.warn(
        { err: err instanceof Error ? err.message : String(err), generator: this.name, topic },
        "LLM generation failed, falling back to placeholder content",
      );
      return this.fallback.generateSlides(topic, count, customContent);
    }
  }

  private async complete(prompt: string, temperature: number): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature,
      }),
    });

    if (!response.ok) {
      throw new GenerationError(`OpenAI API error: ${response.status} ${response.statusText}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GenerationError("Unexpected response shape from OpenAI", { cause: parsed.error });
    }
    return (parsed.data.choices[0]?.message.content ?? "").trim();
  }
}

/** Parses the formatting call's reply, tolerating a ```json fence around it. */
export function parseGeneratedSlides(raw: string, count: number): Slide[] {
  const body = raw
    .trim()
    .replace(/^```(?:json)?\s*/, "")
    .replace(/\s*```$/, "");

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new GenerationError("LLM reply was not valid JSON", { cause: err });
  }

  const deck = GeneratedDeckSchema.safeParse(json);
  if (!deck.success) {
    throw new GenerationError("LLM reply did not match the slide format", { cause: deck.error });
  }
  if (deck.data.slides.length === 0) {
    throw new GenerationError("LLM reply contained no slides");
  }

  return deck.data.slides.slice(0, count).map((slide) => ({
    slideType: slide.slide_type,
    title: slide.title,
    content: slide.content,
    imageSuggestion: slide.image_suggestion,
    citations: slide.citations,
  }));
}
