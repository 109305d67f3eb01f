import { z } from "zod";
import { PresentationCreateSchema, PresentationConfigSchema } from "@slidesmith/schemas";

// ── Presentations ────────────────────────────────────────────────────

export const CreatePresentationBodySchema = PresentationCreateSchema;

export const ConfigurePresentationBodySchema = PresentationConfigSchema;

export const ListPresentationsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export const SearchTopicParamsSchema = z.object({
  topic: z.string().trim().min(1).max(200),
});

// ── System ───────────────────────────────────────────────────────────

export const GeneratorProviderSchema = z.enum(["dummy", "openai"]);
export type GeneratorProvider = z.infer<typeof GeneratorProviderSchema>;

export const SwitchGeneratorBodySchema = z.object({
  provider: GeneratorProviderSchema,
});
