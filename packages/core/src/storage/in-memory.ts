import type { Presentation } from "@slidesmith/schemas";
import type { ListPresentationsOptions, PresentationStore } from "./interfaces.js";

export class InMemoryPresentationStore implements PresentationStore {
  private store = new Map<string, Presentation>();

  async save(presentation: Presentation): Promise<void> {
    this.store.set(presentation.id, structuredClone(presentation));
  }

  async getById(id: string): Promise<Presentation | null> {
    const presentation = this.store.get(id);
    return presentation ? structuredClone(presentation) : null;
  }

  async delete(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  async list(options: ListPresentationsOptions = {}): Promise<Presentation[]> {
    const offset = options.offset ?? 0;
    const sorted = this.newestFirst();
    const page = options.limit === undefined ? sorted.slice(offset) : sorted.slice(offset, offset + options.limit);
    return page.map((p) => structuredClone(p));
  }

  async search(topic: string): Promise<Presentation[]> {
    const needle = topic.toLowerCase();
    return this.newestFirst()
      .filter((p) => p.topic.toLowerCase().includes(needle))
      .map((p) => structuredClone(p));
  }

  async count(): Promise<number> {
    return this.store.size;
  }

  private newestFirst(): Presentation[] {
    // Reverse insertion order first so ties on createdAt put the latest save on top.
    return [...this.store.values()].reverse().sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }
}
