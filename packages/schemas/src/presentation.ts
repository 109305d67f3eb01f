import { z } from "zod";
import { ThemeSchema, ColorPaletteSchema } from "./theme.js";
import { AspectRatioSchema, CustomDimensionSchema } from "./aspect-ratio.js";

export const SlideTypeSchema = z.enum(["title", "bullet_points", "two_column", "content_with_image"]);
export type SlideType = z.infer<typeof SlideTypeSchema>;

export const SlideSchema = z.object({
  slideType: SlideTypeSchema,
  title: z.string(),
  content: z.array(z.string()).default([]),
  imageSuggestion: z.string().nullable().default(null),
  citations: z.array(z.string()).default([]),
});
export type Slide = z.infer<typeof SlideSchema>;

export const PresentationSchema = z.object({
  id: z.string(),
  topic: z.string(),
  numSlides: z.number().int().min(1),
  slides: z.array(SlideSchema),
  customContent: z.string().nullable(),
  theme: ThemeSchema,
  font: z.string(),
  colors: ColorPaletteSchema,
  aspectRatio: AspectRatioSchema,
  customWidth: z.number().nullable(),
  customHeight: z.number().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type Presentation = z.infer<typeof PresentationSchema>;

export const PresentationCreateSchema = z.object({
  topic: z.string().trim().min(1).max(200),
  numSlides: z.number().int().min(1).max(20),
  customContent: z.string().max(2000).optional(),
});
export type PresentationCreate = z.infer<typeof PresentationCreateSchema>;

export const PresentationConfigSchema = z
  .object({
    theme: ThemeSchema.optional(),
    font: z.string().min(1).max(100).optional(),
    colors: ColorPaletteSchema.optional(),
    aspectRatio: AspectRatioSchema.optional(),
    customWidth: CustomDimensionSchema.optional(),
    customHeight: CustomDimensionSchema.optional(),
  })
  .refine(
    (config) =>
      config.aspectRatio !== "custom" ||
      (config.customWidth !== undefined && config.customHeight !== undefined),
    { message: "customWidth and customHeight are required for a custom aspect ratio", path: ["aspectRatio"] },
  );
export type PresentationConfig = z.infer<typeof PresentationConfigSchema>;
