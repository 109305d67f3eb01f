import type { FastifyPluginAsync } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import { SwitchGeneratorBodySchema } from "../validation.js";
import type { GeneratorProvider } from "../validation.js";

const switchGeneratorJsonSchema = zodToJsonSchema(SwitchGeneratorBodySchema, { target: "openApi3" });

export const systemRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/v1/concurrency/stats
  app.get("/concurrency/stats", {
    config: { admission: "exempt" },
    schema: {
      description: "Global and per-identity permit pools, plus configured admission limits.",
      tags: ["System"],
    },
  }, async (_request, reply) => {
    const snapshot = app.admission.concurrencySnapshot();
    return reply.code(200).send({
      global: snapshot.global,
      identities: snapshot.identities,
      limits: {
        concurrency: snapshot.limits,
        rateLimit: app.admission.config.rateLimit,
      },
    });
  });

  // GET /api/v1/rate-limit/stats
  app.get("/rate-limit/stats", {
    config: { admission: "exempt" },
    schema: {
      description: "Configured rate limits and the number of identities being tracked.",
      tags: ["System"],
    },
  }, async (_request, reply) => {
    const stats = app.admission.rateLimitStats();
    return reply.code(200).send(stats);
  });

  // GET /api/v1/cache/stats
  app.get("/cache/stats", {
    schema: {
      description: "Generation cache backend and size.",
      tags: ["System"],
    },
  }, async (_request, reply) => {
    const stats = await app.generationCache.stats();
    return reply.code(200).send(stats);
  });

  // POST /api/v1/cache/clear
  app.post("/cache/clear", {
    schema: {
      description: "Drop every cached deck.",
      tags: ["System"],
    },
  }, async (request, reply) => {
    const cleared = await app.generationCache.clear();
    request.log.info({ cleared }, "Generation cache cleared");
    return reply.code(200).send({ cleared });
  });

  // GET /api/v1/llm/status
  app.get("/llm/status", {
    schema: {
      description: "Active slide content generator and the ones available to switch to.",
      tags: ["System"],
    },
  }, async (_request, reply) => {
    return reply.code(200).send({
      active: app.slideGenerator.generatorName,
      available: availableProviders(app.contentGenerators),
    });
  });

  // POST /api/v1/llm/switch
  app.post("/llm/switch", {
    schema: {
      description: "Switch the slide content generator at runtime.",
      tags: ["System"],
      body: switchGeneratorJsonSchema,
    },
  }, async (request, reply) => {
    const parsed = SwitchGeneratorBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request body", details: parsed.error.issues });
    }

    const generator = app.contentGenerators[parsed.data.provider];
    if (!generator) {
      return reply.code(400).send({
        error: `Generator '${parsed.data.provider}' is not configured`,
        statusCode: 400,
      });
    }

    const previous = app.slideGenerator.generatorName;
    app.slideGenerator.useGenerator(generator);
    return reply.code(200).send({ previous, active: generator.name });
  });
};

function availableProviders(generators: Partial<Record<GeneratorProvider, unknown>>): GeneratorProvider[] {
  const providers: GeneratorProvider[] = ["dummy", "openai"];
  return providers.filter((provider) => generators[provider] !== undefined);
}
