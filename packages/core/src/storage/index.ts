export { PresentationNotFoundError } from "./interfaces.js";
export type { PresentationStore, ListPresentationsOptions } from "./interfaces.js";
export { InMemoryPresentationStore } from "./in-memory.js";
