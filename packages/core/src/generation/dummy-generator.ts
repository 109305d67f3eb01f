import type { Slide, SlideType } from "@slidesmith/schemas";
import type { SlideContentGenerator } from "./types.js";

const ROTATION: SlideType[] = ["bullet_points", "two_column", "content_with_image"];

/**
 * Deterministic placeholder content. Used when no LLM is configured and as the
 * fallback when an LLM call fails.
 */
export class DummySlideGenerator implements SlideContentGenerator {
  readonly name = "dummy";

  async generateSlides(topic: string, count: number, customContent?: string | null): Promise<Slide[]> {
    const slides: Slide[] = [];
    for (let i = 0; i < count; i++) {
      const number = i + 1;
      const type = ROTATION[i % ROTATION.length] ?? "bullet_points";
      slides.push(this.build(type, topic, number, customContent ?? null));
    }
    return slides;
  }

  private build(type: SlideType, topic: string, number: number, customContent: string | null): Slide {
    const citations = [`Research paper on ${topic}`, `Industry report on ${topic}`];
    const excerpt = customContent ? `Custom content: ${customContent.slice(0, 50)}...` : null;

    switch (type) {
      case "two_column": {
        const title = `Comparison ${number}`;
        const content = [
          `Column 1: Feature of ${topic}`,
          `Column 2: Benefit of ${topic}`,
          `Column 1: Advantage of ${topic}`,
          `Column 2: Result of ${topic}`,
        ];
        if (customContent) content.push("Column 1: Custom aspect", "Column 2: Custom benefit");
        return { slideType: type, title, content, imageSuggestion: null, citations };
      }
      case "content_with_image": {
        const title = `Visual ${number}`;
        const content = [
          `Main content about ${topic}`,
          `Supporting text for ${title}`,
          "Additional context and details",
        ];
        if (excerpt) content.push(excerpt);
        return {
          slideType: type,
          title,
          content,
          imageSuggestion: `Image related to ${topic} - ${title}`,
          citations,
        };
      }
      default: {
        const title = `Key Point ${number}`;
        const content = [
          `Important aspect of ${topic}`,
          `Supporting detail for ${title}`,
          `Additional information about ${topic}`,
          `Conclusion for ${title}`,
        ];
        if (excerpt) content.push(excerpt);
        return { slideType: "bullet_points", title, content, imageSuggestion: null, citations };
      }
    }
  }
}
