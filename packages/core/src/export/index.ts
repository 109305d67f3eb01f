export { PptxDeckExporter, splitColumns } from "./pptx-exporter.js";
export type { DeckExporter } from "./types.js";
