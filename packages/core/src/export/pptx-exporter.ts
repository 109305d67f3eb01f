import PptxGenJS from "pptxgenjs";
import type { ColorPalette, Presentation, Slide } from "@slidesmith/schemas";
import type { DeckExporter } from "./types.js";
import { resolvePageSize } from "../presentation/aspect-ratios.js";
import type { PageSize } from "../presentation/aspect-ratios.js";
import { GenerationError } from "../generation/types.js";

const LAYOUT_NAME = "SLIDESMITH";
const MARGIN = 0.5;

interface SlideFrame {
  page: PageSize;
  font: string;
  colors: Record<keyof ColorPalette, string>;
}

/** pptxgenjs wants bare RRGGBB. */
function hex(color: string): string {
  return color.replace(/^#/, "").toUpperCase();
}

/** Splits two-column content on its "Column 1:" / "Column 2:" prefixes. */
export function splitColumns(content: string[]): { left: string[]; right: string[] } {
  const left: string[] = [];
  const right: string[] = [];
  for (const line of content) {
    const match = /^Column ([12]):\s*(.*)$/.exec(line);
    if (match?.[1] === "2") {
      right.push(match[2] ?? "");
    } else if (match) {
      left.push(match[2] ?? "");
    } else {
      (left.length <= right.length ? left : right).push(line);
    }
  }
  return { left, right };
}

export class PptxDeckExporter implements DeckExporter {
  readonly format = "pptx";
  readonly contentType = "application/vnd.openxmlformats-officedocument.presentationml.presentation";

  async export(presentation: Presentation): Promise<Buffer> {
    const pptx = new PptxGenJS();
    const page = resolvePageSize(presentation.aspectRatio, presentation.customWidth, presentation.customHeight);
    pptx.defineLayout({ name: LAYOUT_NAME, width: page.width, height: page.height });
    pptx.layout = LAYOUT_NAME;
    pptx.title = presentation.topic;

    const frame: SlideFrame = {
      page,
      font: presentation.font,
      colors: {
        primary: hex(presentation.colors.primary),
        secondary: hex(presentation.colors.secondary),
        background: hex(presentation.colors.background),
        text: hex(presentation.colors.text),
        accent: hex(presentation.colors.accent),
      },
    };

    for (const slide of presentation.slides) {
      this.render(pptx, slide, frame);
    }

    const output = await pptx.write({ outputType: "nodebuffer" });
    if (!(output instanceof Uint8Array)) {
      throw new GenerationError("PPTX writer returned an unexpected output type");
    }
    return Buffer.from(output);
  }

  private render(pptx: PptxGenJS, data: Slide, frame: SlideFrame): void {
    const slide = pptx.addSlide();
    slide.background = { color: frame.colors.background };
    const { page, font, colors } = frame;
    const width = page.width - 2 * MARGIN;

    if (data.slideType === "title") {
      slide.addText(data.title, {
        x: MARGIN,
        y: page.height * 0.3,
        w: width,
        h: 1.5,
        fontFace: font,
        fontSize: 40,
        bold: true,
        color: colors.primary,
        align: "center",
      });
      slide.addText(data.content.join("\n"), {
        x: MARGIN,
        y: page.height * 0.3 + 1.6,
        w: width,
        h: 0.8,
        fontFace: font,
        fontSize: 18,
        color: colors.secondary,
        align: "center",
      });
      return;
    }

    slide.addText(data.title, {
      x: MARGIN,
      y: 0.3,
      w: width,
      h: 0.9,
      fontFace: font,
      fontSize: 30,
      bold: true,
      color: colors.primary,
    });

    const bodyTop = 1.4;
    const bodyHeight = page.height - bodyTop - 1.0;
    const bullets = (lines: string[]) => lines.map((text) => ({ text, options: { bullet: true, breakLine: true } }));
    const bodyStyle = { fontFace: font, fontSize: 18, color: colors.text, valign: "top" as const };

    switch (data.slideType) {
      case "two_column": {
        const { left, right } = splitColumns(data.content);
        const columnWidth = (width - MARGIN) / 2;
        slide.addText(bullets(left), { x: MARGIN, y: bodyTop, w: columnWidth, h: bodyHeight, ...bodyStyle });
        slide.addText(bullets(right), {
          x: MARGIN * 2 + columnWidth,
          y: bodyTop,
          w: columnWidth,
          h: bodyHeight,
          ...bodyStyle,
        });
        break;
      }
      case "content_with_image": {
        const textWidth = width * 0.55;
        slide.addText(bullets(data.content), { x: MARGIN, y: bodyTop, w: textWidth, h: bodyHeight, ...bodyStyle });
        const imageX = MARGIN * 2 + textWidth;
        const imageWidth = page.width - imageX - MARGIN;
        slide.addShape(pptx.ShapeType.rect, {
          x: imageX,
          y: bodyTop,
          w: imageWidth,
          h: bodyHeight,
          fill: { color: colors.accent },
          line: { color: colors.secondary },
        });
        slide.addText(data.imageSuggestion ?? "Image", {
          x: imageX,
          y: bodyTop,
          w: imageWidth,
          h: bodyHeight,
          fontFace: font,
          fontSize: 14,
          italic: true,
          color: colors.text,
          align: "center",
          valign: "middle",
        });
        break;
      }
      default:
        slide.addText(bullets(data.content), { x: MARGIN, y: bodyTop, w: width, h: bodyHeight, ...bodyStyle });
    }

    if (data.citations.length > 0) {
      slide.addText(`Sources: ${data.citations.join("; ")}`, {
        x: MARGIN,
        y: page.height - 0.8,
        w: width,
        h: 0.5,
        fontFace: font,
        fontSize: 10,
        italic: true,
        color: colors.secondary,
      });
    }
  }
}
