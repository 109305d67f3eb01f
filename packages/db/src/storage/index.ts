export { SqlitePresentationStore } from "./sqlite-presentation-store.js";
export { createPresentationStore } from "./factory.js";
export type { PresentationStoreSetup } from "./factory.js";
