export { GenerationError } from "./types.js";
export type { SlideContentGenerator } from "./types.js";
export { DummySlideGenerator } from "./dummy-generator.js";
export { OpenAISlideGenerator, parseGeneratedSlides, DEFAULT_OPENAI_MODEL } from "./openai-generator.js";
export type { OpenAIGeneratorConfig } from "./openai-generator.js";
export { SlideGenerator, formatGeneratedOn } from "./slide-generator.js";
export type { SlideGeneratorOptions } from "./slide-generator.js";
