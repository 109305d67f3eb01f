import type { FastifyPluginAsync } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import {
  CreatePresentationBodySchema,
  ConfigurePresentationBodySchema,
  ListPresentationsQuerySchema,
  SearchTopicParamsSchema,
} from "../validation.js";
import { withCapacity } from "../middleware/admission.js";

const createPresentationJsonSchema = zodToJsonSchema(CreatePresentationBodySchema, { target: "openApi3" });
const configurePresentationJsonSchema = zodToJsonSchema(ConfigurePresentationBodySchema, { target: "openApi3" });

const idParams = { type: "object", properties: { id: { type: "string" } }, required: ["id"] };

export const presentationsRoutes: FastifyPluginAsync = async (app) => {
  // POST /api/v1/presentations
  app.post("/", {
    config: { admission: "protected" },
    schema: {
      description: "Generate a new presentation. Rate limited and concurrency gated.",
      tags: ["Presentations"],
      body: createPresentationJsonSchema,
    },
  }, async (request, reply) => {
    const parsed = CreatePresentationBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request body", details: parsed.error.issues });
    }

    const input = parsed.data;
    const presentation = await withCapacity(request, () => app.presentations.create(input));
    return reply.code(201).send({ presentation });
  });

  // GET /api/v1/presentations
  app.get("/", {
    schema: {
      description: "List presentations, newest first.",
      tags: ["Presentations"],
      querystring: {
        type: "object",
        properties: {
          limit: { type: "integer", minimum: 1, maximum: 100 },
          offset: { type: "integer", minimum: 0 },
        },
      },
    },
  }, async (request, reply) => {
    const parsed = ListPresentationsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid query", details: parsed.error.issues });
    }

    const { limit, offset } = parsed.data;
    const [presentations, total] = await Promise.all([
      app.presentations.list({ limit, offset }),
      app.presentations.count(),
    ]);
    return reply.code(200).send({ presentations, total, limit, offset });
  });

  // GET /api/v1/presentations/search/:topic
  app.get("/search/:topic", {
    schema: {
      description: "Case-insensitive topic search.",
      tags: ["Presentations"],
      params: { type: "object", properties: { topic: { type: "string" } }, required: ["topic"] },
    },
  }, async (request, reply) => {
    const parsed = SearchTopicParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid search topic", details: parsed.error.issues });
    }

    const presentations = await app.presentations.search(parsed.data.topic);
    return reply.code(200).send({ presentations });
  });

  // GET /api/v1/presentations/:id
  app.get<{ Params: { id: string } }>("/:id", {
    schema: {
      description: "Get a presentation by ID.",
      tags: ["Presentations"],
      params: idParams,
    },
  }, async (request, reply) => {
    const presentation = await app.presentations.get(request.params.id);
    return reply.code(200).send({ presentation });
  });

  // DELETE /api/v1/presentations/:id
  app.delete<{ Params: { id: string } }>("/:id", {
    schema: {
      description: "Delete a presentation.",
      tags: ["Presentations"],
      params: idParams,
    },
  }, async (request, reply) => {
    const { id } = request.params;
    await app.presentations.delete(id);
    return reply.code(200).send({ id, deleted: true });
  });

  // POST /api/v1/presentations/:id/configure
  app.post<{ Params: { id: string } }>("/:id/configure", {
    schema: {
      description: "Change theme, font, colours or page size without regenerating slides.",
      tags: ["Presentations"],
      params: idParams,
      body: configurePresentationJsonSchema,
    },
  }, async (request, reply) => {
    const parsed = ConfigurePresentationBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request body", details: parsed.error.issues });
    }

    const presentation = await app.presentations.configure(request.params.id, parsed.data);
    return reply.code(200).send({ presentation });
  });

  // GET /api/v1/presentations/:id/download
  app.get<{ Params: { id: string } }>("/:id/download", {
    config: { admission: "protected" },
    schema: {
      description: "Render the presentation to PPTX. Rate limited and concurrency gated.",
      tags: ["Presentations"],
      params: idParams,
    },
  }, async (request, reply) => {
    const deck = await withCapacity(request, () => app.presentations.export(request.params.id));
    return reply
      .code(200)
      .header("Content-Type", deck.contentType)
      .header("Content-Disposition", `attachment; filename="${deck.filename}"`)
      .send(deck.data);
  });
};
