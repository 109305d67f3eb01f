import { describe, it, expect, vi } from "vitest";
import type { Slide } from "@slidesmith/schemas";
import { DummySlideGenerator } from "../generation/dummy-generator.js";
import { OpenAISlideGenerator, parseGeneratedSlides } from "../generation/openai-generator.js";
import { SlideGenerator, formatGeneratedOn } from "../generation/slide-generator.js";
import { GenerationError } from "../generation/types.js";
import type { SlideContentGenerator } from "../generation/types.js";
import { InMemoryGenerationCache } from "../cache/generation-cache.js";
import type { Logger } from "../logger.js";

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function chatReply(content: string, status = 200): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("DummySlideGenerator", () => {
  it("cycles bullet, two-column and image slides", async () => {
    const slides = await new DummySlideGenerator().generateSlides("Tide pools", 4);

    expect(slides.map((s) => s.slideType)).toEqual([
      "bullet_points",
      "two_column",
      "content_with_image",
      "bullet_points",
    ]);
    expect(slides.map((s) => s.title)).toEqual(["Key Point 1", "Comparison 2", "Visual 3", "Key Point 4"]);
  });

  it("fills placeholder content and two citations", async () => {
    const [bullets, columns, visual] = await new DummySlideGenerator().generateSlides("Tide pools", 3);

    expect(bullets?.content).toEqual([
      "Important aspect of Tide pools",
      "Supporting detail for Key Point 1",
      "Additional information about Tide pools",
      "Conclusion for Key Point 1",
    ]);
    expect(bullets?.citations).toEqual(["Research paper on Tide pools", "Industry report on Tide pools"]);
    expect(columns?.content[0]).toBe("Column 1: Feature of Tide pools");
    expect(visual?.imageSuggestion).toBe("Image related to Tide pools - Visual 3");
  });

  it("works the custom content into every slide type", async () => {
    const custom = "Focus on the intertidal zone along rocky northern coastlines in winter";
    const [bullets, columns, visual] = await new DummySlideGenerator().generateSlides("Tide pools", 3, custom);

    expect(bullets?.content.at(-1)).toBe(`Custom content: ${custom.slice(0, 50)}...`);
    expect(columns?.content.slice(-2)).toEqual(["Column 1: Custom aspect", "Column 2: Custom benefit"]);
    expect(visual?.content).toHaveLength(4);
  });
});

describe("parseGeneratedSlides", () => {
  it("strips a json fence and maps snake_case fields", () => {
    const raw = '```json\n{"slides":[{"slide_type":"content_with_image","title":"Map","content":["a"],"image_suggestion":"A map","citations":["Atlas"]}]}\n```';
    expect(parseGeneratedSlides(raw, 5)).toEqual([
      {
        slideType: "content_with_image",
        title: "Map",
        content: ["a"],
        imageSuggestion: "A map",
        citations: ["Atlas"],
      },
    ]);
  });

  it("repairs unknown types and malformed content", () => {
    const raw = JSON.stringify({ slides: [{ slide_type: "three_column", content: "not a list" }] });
    expect(parseGeneratedSlides(raw, 1)).toEqual([
      { slideType: "bullet_points", title: "Untitled Slide", content: [], imageSuggestion: null, citations: [] },
    ]);
  });

  it("trims extra slides to the requested count", () => {
    const raw = JSON.stringify({ slides: [{ title: "a" }, { title: "b" }, { title: "c" }] });
    expect(parseGeneratedSlides(raw, 2).map((s) => s.title)).toEqual(["a", "b"]);
  });

  it("rejects a reply that is not JSON", () => {
    expect(() => parseGeneratedSlides("Here are your slides!", 2)).toThrow(GenerationError);
  });

  it("rejects an empty deck", () => {
    expect(() => parseGeneratedSlides('{"slides":[]}', 2)).toThrow("no slides");
  });
});

describe("OpenAISlideGenerator", () => {
  it("drafts, then formats, then parses", async () => {
    const requests: Array<{ url: string; body: { temperature: number; model: string } }> = [];
    const replies = [
      chatReply("1. Bullet slide about tide pools"),
      chatReply('```json\n{"slides":[{"slide_type":"bullet_points","title":"Life in the pool","content":["Anemones"],"citations":[]}]}\n```'),
    ];
    const fakeFetch: typeof fetch = async (input, init) => {
      requests.push({ url: String(input), body: JSON.parse(String(init?.body)) });
      const reply = replies.shift();
      if (!reply) throw new Error("unexpected call");
      return reply;
    };

    const generator = new OpenAISlideGenerator({
      apiKey: "test-secret",
      baseUrl: "http://llm.test/",
      fetch: fakeFetch,
    });
    const slides = await generator.generateSlides("Tide pools", 1);

    expect(slides).toEqual([
      {
        slideType: "bullet_points",
        title: "Life in the pool",
        content: ["Anemones"],
        imageSuggestion: null,
        citations: [],
      },
    ]);
    expect(requests.map((r) => r.url)).toEqual([
      "http://llm.test/v1/chat/completions",
      "http://llm.test/v1/chat/completions",
    ]);
    expect(requests.map((r) => r.body.temperature)).toEqual([0.7, 0.3]);
    expect(requests[0]?.body.model).toBe("gpt-3.5-turbo");
    expect(generator.name).toBe("openai-gpt-3.5-turbo");
  });

  it("falls back to the fallback generator when the API fails", async () => {
    const logger = fakeLogger();
    const fakeFetch: typeof fetch = async () => chatReply("", 500);
    const generator = new OpenAISlideGenerator({ apiKey: "test-secret", fetch: fakeFetch, logger });

    const slides = await generator.generateSlides("Tide pools", 2);

    expect(slides).toEqual(await new DummySlideGenerator().generateSlides("Tide pools", 2));
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("falls back when the network call throws", async () => {
    const fallback: SlideContentGenerator = {
      name: "stub",
      generateSlides: vi.fn(async () => []),
    };
    const fakeFetch: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const generator = new OpenAISlideGenerator({ apiKey: "test-secret", fetch: fakeFetch, fallback });

    await expect(generator.generateSlides("Tide pools", 3, "extra")).resolves.toEqual([]);
    expect(fallback.generateSlides).toHaveBeenCalledWith("Tide pools", 3, "extra");
  });
});

describe("SlideGenerator", () => {
  const fixedNow = () => new Date("2026-03-05T12:00:00Z");

  it("formats the title slide date", () => {
    expect(formatGeneratedOn(fixedNow())).toBe("Generated on March 05, 2026");
  });

  it("prepends a title slide to numSlides - 1 content slides", async () => {
    const generator = new SlideGenerator({
      cache: new InMemoryGenerationCache(),
      generator: new DummySlideGenerator(),
      now: fixedNow,
    });

    const slides = await generator.generate("Tide pools", 3);

    expect(slides).toHaveLength(3);
    expect(slides[0]).toEqual({
      slideType: "title",
      title: "Tide pools",
      content: ["Generated on March 05, 2026"],
      imageSuggestion: null,
      citations: [],
    });
    expect(slides[1]?.title).toBe("Key Point 1");
  });

  it("skips the content generator for a single slide", async () => {
    const content: SlideContentGenerator = { name: "spy", generateSlides: vi.fn(async () => []) };
    const generator = new SlideGenerator({ cache: new InMemoryGenerationCache(), generator: content, now: fixedNow });

    const slides = await generator.generate("Tide pools", 1);

    expect(slides.map((s) => s.slideType)).toEqual(["title"]);
    expect(content.generateSlides).not.toHaveBeenCalled();
  });

  it("serves repeated requests from the cache", async () => {
    const slide: Slide = { slideType: "bullet_points", title: "x", content: [], imageSuggestion: null, citations: [] };
    const content: SlideContentGenerator = { name: "spy", generateSlides: vi.fn(async () => [slide]) };
    const generator = new SlideGenerator({ cache: new InMemoryGenerationCache(), generator: content, now: fixedNow });

    const first = await generator.generate("Tide pools", 2);
    const second = await generator.generate("Tide pools", 2);

    expect(second).toEqual(first);
    expect(content.generateSlides).toHaveBeenCalledTimes(1);

    await generator.generate("Tide pools", 2, "different context");
    expect(content.generateSlides).toHaveBeenCalledTimes(2);
  });

  it("switches generators at runtime", async () => {
    const generator = new SlideGenerator({
      cache: new InMemoryGenerationCache(),
      generator: new DummySlideGenerator(),
    });
    const replacement: SlideContentGenerator = { name: "replacement", generateSlides: vi.fn(async () => []) };

    generator.useGenerator(replacement);
    await generator.generate("Tide pools", 3);

    expect(generator.generatorName).toBe("replacement");
    expect(replacement.generateSlides).toHaveBeenCalledWith("Tide pools", 2, undefined);
  });

  it("keeps generating when the cache is unavailable", async () => {
    const logger = fakeLogger();
    const cache = new InMemoryGenerationCache();
    vi.spyOn(cache, "get").mockRejectedValue(new Error("connection refused"));
    const generator = new SlideGenerator({ cache, generator: new DummySlideGenerator(), logger });

    await expect(generator.generate("Tide pools", 2)).resolves.toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledWith({ err: "connection refused" }, "Generation cache read failed");
  });
});
