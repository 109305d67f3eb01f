import { z } from "zod";

export const ThemeSchema = z.enum(["modern", "classic", "minimal", "corporate"]);
export type Theme = z.infer<typeof ThemeSchema>;

const HexColorSchema = z.string().regex(/^#[0-9A-Fa-f]{6}$/, "expected #RRGGBB");

export const ColorPaletteSchema = z.object({
  primary: HexColorSchema,
  secondary: HexColorSchema,
  background: HexColorSchema,
  text: HexColorSchema,
  accent: HexColorSchema,
});
export type ColorPalette = z.infer<typeof ColorPaletteSchema>;

export const ThemeDefinitionSchema = z.object({
  id: ThemeSchema,
  name: z.string(),
  description: z.string(),
  font: z.string(),
  colors: ColorPaletteSchema,
});
export type ThemeDefinition = z.infer<typeof ThemeDefinitionSchema>;
