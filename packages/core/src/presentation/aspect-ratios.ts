import type { AspectRatio, AspectRatioDefinition, Orientation } from "@slidesmith/schemas";
import { AspectRatioSchema, CUSTOM_DIMENSION_MAX, CUSTOM_DIMENSION_MIN } from "@slidesmith/schemas";

type PresetRatio = Exclude<AspectRatio, "custom">;

export const DEFAULT_ASPECT_RATIO: PresetRatio = "16:9";

export const ASPECT_RATIOS: Record<PresetRatio, AspectRatioDefinition> = {
  "16:9": {
    id: "16:9",
    name: "Widescreen (16:9)",
    description: "Standard widescreen format for modern displays",
    width: 13.33,
    height: 7.5,
    orientation: "landscape",
    commonUse: "Modern presentations, video displays",
  },
  "4:3": {
    id: "4:3",
    name: "Standard (4:3)",
    description: "Traditional standard format for older projectors",
    width: 10,
    height: 7.5,
    orientation: "landscape",
    commonUse: "Traditional presentations, older projectors",
  },
  A4: {
    id: "A4",
    name: "A4 Portrait",
    description: "A4 paper ratio in portrait orientation",
    width: 8.27,
    height: 11.69,
    orientation: "portrait",
    commonUse: "Print-friendly presentations, documents",
  },
  A4_L: {
    id: "A4_L",
    name: "A4 Landscape",
    description: "A4 paper ratio in landscape orientation",
    width: 11.69,
    height: 8.27,
    orientation: "landscape",
    commonUse: "Print-friendly landscape presentations",
  },
  "1:1": {
    id: "1:1",
    name: "Square (1:1)",
    description: "Square format for social media and mobile",
    width: 10,
    height: 10,
    orientation: "square",
    commonUse: "Social media, mobile presentations",
  },
};

export interface PageSize {
  width: number;
  height: number;
  orientation: Orientation;
}

export function orientationOf(width: number, height: number): Orientation {
  if (width > height) return "landscape";
  if (width < height) return "portrait";
  return "square";
}

export function isValidCustomDimension(value: number): boolean {
  return Number.isFinite(value) && value >= CUSTOM_DIMENSION_MIN && value <= CUSTOM_DIMENSION_MAX;
}

export function customAspectRatio(width: number, height: number): AspectRatioDefinition {
  return {
    id: "custom",
    name: `Custom (${width}" x ${height}")`,
    description: `Custom dimensions: ${width}" x ${height}"`,
    width,
    height,
    orientation: orientationOf(width, height),
    commonUse: "Custom requirements",
  };
}

/**
 * Page size in inches for a stored presentation. A custom ratio with missing or
 * out-of-range dimensions, or an unknown ratio, falls back to 16:9.
 */
export function resolvePageSize(
  aspectRatio: string | null | undefined,
  customWidth?: number | null,
  customHeight?: number | null,
): PageSize {
  const parsed = AspectRatioSchema.safeParse(aspectRatio);
  if (parsed.success && parsed.data === "custom") {
    if (
      customWidth != null &&
      customHeight != null &&
      isValidCustomDimension(customWidth) &&
      isValidCustomDimension(customHeight)
    ) {
      return { width: customWidth, height: customHeight, orientation: orientationOf(customWidth, customHeight) };
    }
    return pageSizeOf(ASPECT_RATIOS[DEFAULT_ASPECT_RATIO]);
  }
  const preset = parsed.success && parsed.data !== "custom" ? parsed.data : DEFAULT_ASPECT_RATIO;
  return pageSizeOf(ASPECT_RATIOS[preset]);
}

export function listAspectRatios(): AspectRatioDefinition[] {
  return Object.values(ASPECT_RATIOS);
}

function pageSizeOf(definition: AspectRatioDefinition): PageSize {
  return { width: definition.width, height: definition.height, orientation: definition.orientation };
}
