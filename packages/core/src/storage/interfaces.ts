import type { Presentation } from "@slidesmith/schemas";

export interface ListPresentationsOptions {
  limit?: number;
  offset?: number;
}

export interface PresentationStore {
  /** Inserts or replaces by id. */
  save(presentation: Presentation): Promise<void>;
  getById(id: string): Promise<Presentation | null>;
  delete(id: string): Promise<boolean>;
  /** Newest first. */
  list(options?: ListPresentationsOptions): Promise<Presentation[]>;
  /** Case-insensitive substring match on the topic, newest first. */
  search(topic: string): Promise<Presentation[]>;
  count(): Promise<number>;
}

export class PresentationNotFoundError extends Error {
  constructor(public readonly id: string) {
    super(`Presentation not found: ${id}`);
    this.name = "PresentationNotFoundError";
  }
}
