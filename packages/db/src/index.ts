export { openDatabase } from "./database.js";
export type { SqliteDatabase } from "./database.js";
export { SqlitePresentationStore, createPresentationStore } from "./storage/index.js";
export type { PresentationStoreSetup } from "./storage/index.js";
