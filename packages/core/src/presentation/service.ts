import { randomUUID } from "node:crypto";
import type { Presentation, PresentationConfig, PresentationCreate } from "@slidesmith/schemas";
import type { PresentationStore, ListPresentationsOptions } from "../storage/interfaces.js";
import { PresentationNotFoundError } from "../storage/interfaces.js";
import type { SlideGenerator } from "../generation/slide-generator.js";
import { GenerationError } from "../generation/types.js";
import type { DeckExporter } from "../export/types.js";
import { withTimeout, TimeoutError } from "../utils/timeout.js";
import { DEFAULT_ASPECT_RATIO } from "./aspect-ratios.js";
import { DEFAULT_THEME, getTheme } from "./themes.js";

export const DEFAULT_EXPORT_TIMEOUT_MS = 30_000;

export interface PresentationServiceDeps {
  store: PresentationStore;
  generator: SlideGenerator;
  exporter: DeckExporter;
  exportTimeoutMs?: number;
  now?: () => Date;
  idFactory?: () => string;
}

export interface ExportedDeck {
  presentation: Presentation;
  filename: string;
  contentType: string;
  data: Buffer;
}

export class PresentationService {
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(private readonly deps: PresentationServiceDeps) {
    this.now = deps.now ?? (() => new Date());
    this.idFactory = deps.idFactory ?? (() => `pres_${randomUUID()}`);
  }

  async create(input: PresentationCreate): Promise<Presentation> {
    const slides = await this.deps.generator.generate(input.topic, input.numSlides, input.customContent);
    const theme = getTheme(DEFAULT_THEME);
    const timestamp = this.now().toISOString();

    const presentation: Presentation = {
      id: this.idFactory(),
      topic: input.topic,
      numSlides: input.numSlides,
      slides,
      customContent: input.customContent ?? null,
      theme: theme.id,
      font: theme.font,
      colors: { ...theme.colors },
      aspectRatio: DEFAULT_ASPECT_RATIO,
      customWidth: null,
      customHeight: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.deps.store.save(presentation);
    return presentation;
  }

  async get(id: string): Promise<Presentation> {
    const presentation = await this.deps.store.getById(id);
    if (!presentation) throw new PresentationNotFoundError(id);
    return presentation;
  }

  list(options?: ListPresentationsOptions): Promise<Presentation[]> {
    return this.deps.store.list(options);
  }

  search(topic: string): Promise<Presentation[]> {
    return this.deps.store.search(topic);
  }

  count(): Promise<number> {
    return this.deps.store.count();
  }

  async delete(id: string): Promise<void> {
    const deleted = await this.deps.store.delete(id);
    if (!deleted) throw new PresentationNotFoundError(id);
  }

  /**
   * Applies styling without regenerating slides. Picking a theme resets font and colours
   * to that theme's defaults unless they are supplied in the same update. Moving to a
   * preset aspect ratio clears any custom dimensions.
   */
  async configure(id: string, config: PresentationConfig): Promise<Presentation> {
    const current = await this.get(id);
    const next: Presentation = { ...current };

    if (config.theme !== undefined) {
      const theme = getTheme(config.theme);
      next.theme = theme.id;
      next.font = theme.font;
      next.colors = { ...theme.colors };
    }
    if (config.font !== undefined) next.font = config.font;
    if (config.colors !== undefined) next.colors = { ...config.colors };

    if (config.aspectRatio !== undefined) {
      next.aspectRatio = config.aspectRatio;
      if (config.aspectRatio !== "custom") {
        next.customWidth = null;
        next.customHeight = null;
      }
    }
    if (config.customWidth !== undefined) next.customWidth = config.customWidth;
    if (config.customHeight !== undefined) next.customHeight = config.customHeight;

    next.updatedAt = this.now().toISOString();
    await this.deps.store.save(next);
    return next;
  }

  async export(id: string): Promise<ExportedDeck> {
    const presentation = await this.get(id);
    const timeoutMs = this.deps.exportTimeoutMs ?? DEFAULT_EXPORT_TIMEOUT_MS;
    const { exporter } = this.deps;

    let data: Buffer;
    try {
      data = await withTimeout(exporter.export(presentation), timeoutMs, `${exporter.format} export`);
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new GenerationError(err.message, { cause: err });
      }
      throw err;
    }

    return {
      presentation,
      filename: `presentation_${presentation.id}.${exporter.format}`,
      contentType: exporter.contentType,
      data,
    };
  }
}
