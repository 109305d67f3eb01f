import Fastify from "fastify";
import type { FastifyError, FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import {
  AdmissionController,
  CapacityExceededError,
  DummySlideGenerator,
  GenerationError,
  OpenAISlideGenerator,
  PptxDeckExporter,
  PresentationNotFoundError,
  PresentationService,
  QuotaExceededError,
  SlideGenerator,
  SystemClock,
  createAdmissionContext,
} from "@slidesmith/core";
import type { Clock, DeckExporter, GenerationCache, PresentationStore, SlideContentGenerator } from "@slidesmith/core";
import { createPresentationStore } from "@slidesmith/db";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createPromMetrics, metricsRoute } from "./metrics.js";
import type { PromMetrics } from "./metrics.js";
import { authMiddleware } from "./middleware/auth.js";
import { admissionMiddleware, sendCapacityExceeded, sendQuotaExceeded } from "./middleware/admission.js";
import { createGenerationCache } from "./generation-cache/index.js";
import { startAdmissionSweepJob } from "./jobs/admission-sweep.js";
import { presentationsRoutes } from "./routes/presentations.js";
import { systemRoutes } from "./routes/system.js";
import { catalogRoutes } from "./routes/catalog.js";
import { healthRoutes } from "./routes/health.js";
import { sanitizeErrorMessage } from "./utils/error-sanitizer.js";
import type { GeneratorProvider } from "./validation.js";

export const API_VERSION = "0.1.0";

declare module "fastify" {
  interface FastifyInstance {
    presentations: PresentationService;
    slideGenerator: SlideGenerator;
    contentGenerators: Partial<Record<GeneratorProvider, SlideContentGenerator>>;
    generationCache: GenerationCache;
  }
}

export interface BuildServerOptions {
  /** Defaults to {@link loadConfig} over process.env. */
  config?: AppConfig;
  logger?: FastifyServerOptions["logger"];
  clock?: Clock;
  /** Replaces the store chosen from DATABASE_PATH. */
  store?: PresentationStore;
  /** Replaces the cache chosen from REDIS_URL. */
  cache?: GenerationCache;
  /** Generator to start with, instead of OpenAI (when configured) or the dummy. */
  contentGenerator?: SlideContentGenerator;
  exporter?: DeckExporter;
  /** Used by the OpenAI generator. */
  fetch?: typeof fetch;
  metrics?: PromMetrics;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? new SystemClock();
  const now = () => new Date(clock.now());

  const app = Fastify({
    logger: options.logger ?? { level: config.logLevel },
  });

  // CORS: explicit origins when configured, reflect any origin otherwise
  await app.register(cors, {
    origin: config.corsOrigins,
  });

  // OpenAPI documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: "Slidesmith API",
        description: "Slide deck generation with per-caller rate limiting and concurrency control",
        version: API_VERSION,
      },
      tags: [
        { name: "Presentations", description: "Generate, configure, search and download decks" },
        { name: "Catalog", description: "Themes and page sizes" },
        { name: "System", description: "Admission diagnostics, generation cache and generator switching" },
        { name: "Health", description: "Liveness" },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            description: "API key passed as Bearer token or X-API-Key. Set API_KEYS to enforce.",
          },
        },
      },
      security: [{ bearerAuth: [] }],
    },
  });
  await app.register(swaggerUi, {
    routePrefix: "/docs",
  });

  // Global error handler: admission errors keep their wire format, everything else is sanitized
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof QuotaExceededError) {
      return sendQuotaExceeded(reply, error.decision);
    }
    if (error instanceof CapacityExceededError) {
      return sendCapacityExceeded(reply, error, app.admission.config.concurrency);
    }
    if (error instanceof PresentationNotFoundError) {
      return reply.code(404).send({ error: "Presentation not found", statusCode: 404 });
    }
    if (error instanceof GenerationError) {
      request.log.error({ err: error }, "Presentation generation failed");
      return reply.code(502).send({ error: "Presentation generation failed", statusCode: 502 });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Unhandled error");
    }

    return reply.code(statusCode).send({
      error: sanitizeErrorMessage(error, statusCode),
      statusCode,
    });
  });

  // Storage and generation cache, closed with the server
  const storeSetup = options.store
    ? { store: options.store, backend: "memory" as const, close: () => {} }
    : createPresentationStore(config.databasePath);
  const cacheSetup = options.cache
    ? { cache: options.cache, close: async () => {} }
    : createGenerationCache({ ...config.generationCache, redisUrl: config.redisUrl, clock });
  app.addHook("onClose", async () => {
    await cacheSetup.close();
    storeSetup.close();
  });

  // Slide content generators
  const dummy = new DummySlideGenerator();
  const contentGenerators: Partial<Record<GeneratorProvider, SlideContentGenerator>> = { dummy };
  if (config.openai) {
    contentGenerators.openai = new OpenAISlideGenerator({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      baseUrl: config.openai.baseUrl ?? undefined,
      fetch: options.fetch,
      logger: app.log.child({ module: "openai-generator" }),
      fallback: dummy,
    });
  }
  const slideGenerator = new SlideGenerator({
    cache: cacheSetup.cache,
    generator: options.contentGenerator ?? contentGenerators.openai ?? dummy,
    now,
    logger: app.log.child({ module: "slide-generator" }),
  });
  app.log.info({ generator: slideGenerator.generatorName }, "Slide content generator ready");

  const presentations = new PresentationService({
    store: storeSetup.store,
    generator: slideGenerator,
    exporter: options.exporter ?? new PptxDeckExporter(),
    exportTimeoutMs: config.exportTimeoutMs,
    now,
  });

  // Admission: one context per server
  const metrics = options.metrics ?? createPromMetrics();
  const admission = new AdmissionController(createAdmissionContext(config.admission, clock), {
    metrics: metrics.admission,
    logger: app.log.child({ module: "admission" }),
  });

  const stopSweepJob = startAdmissionSweepJob({
    admission,
    intervalMs: config.admissionSweepIntervalMs,
    logger: app.log.child({ module: "admission-sweep" }),
  });
  app.addHook("onClose", async () => {
    stopSweepJob();
  });

  // Decorate Fastify with shared instances
  app.decorate("presentations", presentations);
  app.decorate("slideGenerator", slideGenerator);
  app.decorate("contentGenerators", contentGenerators);
  app.decorate("generationCache", cacheSetup.cache);

  // Register middleware: auth resolves the identity admission partitions on
  await app.register(authMiddleware, { apiKeys: config.apiKeys });
  await app.register(admissionMiddleware, { controller: admission });

  // Register routes
  await app.register(healthRoutes, { version: API_VERSION, storage: storeSetup.backend });
  app.get("/metrics", { schema: { hide: true } }, metricsRoute(metrics.registry));
  await app.register(presentationsRoutes, { prefix: "/api/v1/presentations" });
  await app.register(catalogRoutes, { prefix: "/api/v1" });
  await app.register(systemRoutes, { prefix: "/api/v1" });

  return app;
}
