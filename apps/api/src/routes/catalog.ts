import type { FastifyPluginAsync } from "fastify";
import { CUSTOM_DIMENSION_MAX, CUSTOM_DIMENSION_MIN } from "@slidesmith/schemas";
import { listAspectRatios, listThemes, DEFAULT_ASPECT_RATIO, DEFAULT_THEME } from "@slidesmith/core";

export const catalogRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/v1/themes
  app.get("/themes", {
    schema: {
      description: "Built-in themes with their fonts and colour palettes.",
      tags: ["Catalog"],
    },
  }, async (_request, reply) => {
    return reply.code(200).send({ themes: listThemes(), default: DEFAULT_THEME });
  });

  // GET /api/v1/aspect-ratios
  app.get("/aspect-ratios", {
    schema: {
      description: "Preset page sizes and the bounds for custom ones, in inches.",
      tags: ["Catalog"],
    },
  }, async (_request, reply) => {
    return reply.code(200).send({
      aspectRatios: listAspectRatios(),
      default: DEFAULT_ASPECT_RATIO,
      custom: { minInches: CUSTOM_DIMENSION_MIN, maxInches: CUSTOM_DIMENSION_MAX },
    });
  });
};
