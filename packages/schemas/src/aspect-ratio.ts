import { z } from "zod";

export const AspectRatioSchema = z.enum(["16:9", "4:3", "A4", "A4_L", "1:1", "custom"]);
export type AspectRatio = z.infer<typeof AspectRatioSchema>;

export const OrientationSchema = z.enum(["landscape", "portrait", "square"]);
export type Orientation = z.infer<typeof OrientationSchema>;

/** Bounds for custom page sizes, in inches. */
export const CUSTOM_DIMENSION_MIN = 5;
export const CUSTOM_DIMENSION_MAX = 20;

export const CustomDimensionSchema = z.number().min(CUSTOM_DIMENSION_MIN).max(CUSTOM_DIMENSION_MAX);

export const AspectRatioDefinitionSchema = z.object({
  id: AspectRatioSchema,
  name: z.string(),
  description: z.string(),
  width: z.number().positive(),
  height: z.number().positive(),
  orientation: OrientationSchema,
  commonUse: z.string(),
});
export type AspectRatioDefinition = z.infer<typeof AspectRatioDefinitionSchema>;
