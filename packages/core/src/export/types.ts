import type { Presentation } from "@slidesmith/schemas";

export interface DeckExporter {
  readonly format: string;
  readonly contentType: string;
  export(presentation: Presentation): Promise<Buffer>;
}
