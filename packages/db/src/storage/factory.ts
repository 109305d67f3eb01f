import type { PresentationStore } from "@slidesmith/core";
import { InMemoryPresentationStore } from "@slidesmith/core";
import { openDatabase } from "../database.js";
import { SqlitePresentationStore } from "./sqlite-presentation-store.js";

export interface PresentationStoreSetup {
  store: PresentationStore;
  backend: "sqlite" | "memory";
  close: () => void;
}

/** SQLite when a path is configured, otherwise process memory. */
export function createPresentationStore(databasePath?: string | null): PresentationStoreSetup {
  if (databasePath) {
    const db = openDatabase(databasePath);
    return { store: new SqlitePresentationStore(db), backend: "sqlite", close: () => db.close() };
  }
  return { store: new InMemoryPresentationStore(), backend: "memory", close: () => {} };
}
