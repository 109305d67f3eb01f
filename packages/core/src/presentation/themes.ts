import type { Theme, ThemeDefinition } from "@slidesmith/schemas";
import { ThemeSchema } from "@slidesmith/schemas";

export const DEFAULT_THEME: Theme = "modern";

export const THEMES: Record<Theme, ThemeDefinition> = {
  modern: {
    id: "modern",
    name: "Modern",
    description: "Clean, vibrant design with blue-purple gradient",
    font: "Segoe UI",
    colors: {
      primary: "#2E86AB",
      secondary: "#A23B72",
      background: "#FFFFFF",
      text: "#2C3E50",
      accent: "#3498DB",
    },
  },
  classic: {
    id: "classic",
    name: "Classic",
    description: "Traditional business look with navy and gold",
    font: "Georgia",
    colors: {
      primary: "#1F4E79",
      secondary: "#D4AF37",
      background: "#F8F9FA",
      text: "#2C3E50",
      accent: "#4682B4",
    },
  },
  minimal: {
    id: "minimal",
    name: "Minimal",
    description: "Simple, clean design with black background",
    font: "Arial",
    colors: {
      primary: "#E74C3C",
      secondary: "#F39C12",
      background: "#000000",
      text: "#FFFFFF",
      accent: "#ECF0F1",
    },
  },
  corporate: {
    id: "corporate",
    name: "Corporate",
    description: "Professional business look with dark blue background",
    font: "Roboto",
    colors: {
      primary: "#3498DB",
      secondary: "#2ECC71",
      background: "#1A1A2E",
      text: "#E8E8E8",
      accent: "#F39C12",
    },
  },
};

/** Looks up a theme by id, falling back to the default for anything unrecognised. */
export function getTheme(id: string | null | undefined): ThemeDefinition {
  const parsed = ThemeSchema.safeParse(id);
  return THEMES[parsed.success ? parsed.data : DEFAULT_THEME];
}

export function listThemes(): ThemeDefinition[] {
  return ThemeSchema.options.map((id) => THEMES[id]);
}
