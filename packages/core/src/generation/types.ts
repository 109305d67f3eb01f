import type { Slide } from "@slidesmith/schemas";

/** Produces the content slides of a deck. The title slide is added by SlideGenerator. */
export interface SlideContentGenerator {
  readonly name: string;
  generateSlides(topic: string, count: number, customContent?: string | null): Promise<Slide[]>;
}

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}
