import type { FastifyPluginAsync } from "fastify";

export interface HealthRoutesOptions {
  version: string;
  storage: "sqlite" | "memory";
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, { version, storage }) => {
  // GET /
  app.get("/", {
    schema: {
      description: "Service banner.",
      tags: ["Health"],
    },
  }, async () => ({
    name: "Slidesmith API",
    version,
    status: "ok",
    docs: "/docs",
  }));

  // GET /health
  app.get("/health", {
    schema: {
      description: "Liveness plus the storage and cache backends in use.",
      tags: ["Health"],
    },
  }, async () => {
    const cache = await app.generationCache.stats();
    return {
      status: "ok",
      storage,
      cache: cache.backend,
      generator: app.slideGenerator.generatorName,
      timestamp: new Date().toISOString(),
    };
  });
};
