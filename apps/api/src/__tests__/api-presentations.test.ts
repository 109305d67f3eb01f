import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import type { Presentation } from "@slidesmith/schemas";
import type { DeckExporter } from "@slidesmith/core";
import { buildTestServer, PPTX_CONTENT_TYPE, type TestContext } from "./test-server.js";

describe("Presentations API", () => {
  let app: FastifyInstance;
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await buildTestServer();
    app = ctx.app;
  });

  afterEach(async () => {
    await app.close();
  });

  async function create(topic: string, numSlides = 3): Promise<Presentation> {
    const res = await app.inject({
      method: "POST",
      url: "/api/v1/presentations",
      payload: { topic, numSlides },
    });
    expect(res.statusCode).toBe(201);
    return res.json().presentation;
  }

  describe("POST /api/v1/presentations", () => {
    it("generates a deck with a title slide and default styling", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/presentations",
        payload: { topic: "Tide pools", numSlides: 3 },
      });

      expect(res.statusCode).toBe(201);
      const { presentation } = res.json();
      expect(presentation.id).toMatch(/^pres_/);
      expect(presentation.theme).toBe("modern");
      expect(presentation.font).toBe("Segoe UI");
      expect(presentation.aspectRatio).toBe("16:9");
      expect(presentation.createdAt).toBe("2026-03-05T09:00:00.000Z");
      expect(presentation.slides).toHaveLength(3);
      expect(presentation.slides[0]).toEqual({
        slideType: "title",
        title: "Tide pools",
        content: ["Generated on March 05, 2026"],
        imageSuggestion: null,
        citations: [],
      });
      expect(presentation.slides[1].title).toBe("Key Point 1");
      expect(presentation.slides[2].slideType).toBe("two_column");
    });

    it("persists the presentation", async () => {
      const presentation = await create("Tide pools");
      expect(await ctx.store.getById(presentation.id)).toEqual(presentation);
    });

    it("rejects a blank topic", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/presentations",
        payload: { topic: "   ", numSlides: 3 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("Invalid request body");
    });

    it("rejects more than 20 slides", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/presentations",
        payload: { topic: "Tide pools", numSlides: 21 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().statusCode).toBe(400);
    });
  });

  describe("GET /api/v1/presentations", () => {
    it("lists newest first with totals", async () => {
      const first = await create("Tide pools");
      ctx.clock.advance(1_000);
      const second = await create("Coral reefs");

      const res = await app.inject({ method: "GET", url: "/api/v1/presentations" });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.presentations.map((p: Presentation) => p.id)).toEqual([second.id, first.id]);
      expect(body.total).toBe(2);
      expect(body.limit).toBe(100);
      expect(body.offset).toBe(0);
    });

    it("pages with limit and offset", async () => {
      const first = await create("Tide pools");
      ctx.clock.advance(1_000);
      await create("Coral reefs");

      const res = await app.inject({ method: "GET", url: "/api/v1/presentations?limit=1&offset=1" });

      expect(res.statusCode).toBe(200);
      expect(res.json().presentations.map((p: Presentation) => p.id)).toEqual([first.id]);
    });
  });

  describe("GET /api/v1/presentations/search/:topic", () => {
    it("matches topics case-insensitively", async () => {
      const tide = await create("Tide pools");
      await create("Coral reefs");

      const res = await app.inject({ method: "GET", url: "/api/v1/presentations/search/TIDE" });

      expect(res.statusCode).toBe(200);
      expect(res.json().presentations.map((p: Presentation) => p.id)).toEqual([tide.id]);
    });
  });

  describe("GET /api/v1/presentations/:id", () => {
    it("returns the presentation", async () => {
      const presentation = await create("Tide pools");

      const res = await app.inject({ method: "GET", url: `/api/v1/presentations/${presentation.id}` });

      expect(res.statusCode).toBe(200);
      expect(res.json().presentation).toEqual(presentation);
    });

    it("returns 404 for an unknown id", async () => {
      const res = await app.inject({ method: "GET", url: "/api/v1/presentations/pres_missing" });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: "Presentation not found", statusCode: 404 });
    });
  });

  describe("DELETE /api/v1/presentations/:id", () => {
    it("deletes once, then 404s", async () => {
      const presentation = await create("Tide pools");

      const first = await app.inject({ method: "DELETE", url: `/api/v1/presentations/${presentation.id}` });
      expect(first.statusCode).toBe(200);
      expect(first.json()).toEqual({ id: presentation.id, deleted: true });

      const second = await app.inject({ method: "DELETE", url: `/api/v1/presentations/${presentation.id}` });
      expect(second.statusCode).toBe(404);
    });
  });

  describe("POST /api/v1/presentations/:id/configure", () => {
    it("applies a theme with its font and colours", async () => {
      const presentation = await create("Tide pools");
      ctx.clock.advance(5_000);

      const res = await app.inject({
        method: "POST",
        url: `/api/v1/presentations/${presentation.id}/configure`,
        payload: { theme: "classic" },
      });

      expect(res.statusCode).toBe(200);
      const updated = res.json().presentation;
      expect(updated.theme).toBe("classic");
      expect(updated.font).toBe("Georgia");
      expect(updated.colors.primary).toBe("#1F4E79");
      expect(updated.slides).toEqual(presentation.slides);
      expect(updated.updatedAt).toBe("2026-03-05T09:00:05.000Z");
    });

    it("keeps an explicit font over the theme default", async () => {
      const presentation = await create("Tide pools");

      const res = await app.inject({
        method: "POST",
        url: `/api/v1/presentations/${presentation.id}/configure`,
        payload: { theme: "classic", font: "Verdana" },
      });

      expect(res.json().presentation.font).toBe("Verdana");
    });

    it("stores custom page dimensions", async () => {
      const presentation = await create("Tide pools");

      const res = await app.inject({
        method: "POST",
        url: `/api/v1/presentations/${presentation.id}/configure`,
        payload: { aspectRatio: "custom", customWidth: 12, customHeight: 9 },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().presentation).toMatchObject({ aspectRatio: "custom", customWidth: 12, customHeight: 9 });
    });

    it("requires both dimensions for a custom page", async () => {
      const presentation = await create("Tide pools");

      const res = await app.inject({
        method: "POST",
        url: `/api/v1/presentations/${presentation.id}/configure`,
        payload: { aspectRatio: "custom", customWidth: 12 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("Invalid request body");
    });

    it("returns 404 for an unknown id", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/presentations/pres_missing/configure",
        payload: { theme: "classic" },
      });

      expect(res.statusCode).toBe(404);
    });
  });

  describe("GET /api/v1/presentations/:id/download", () => {
    it("returns the exported deck as an attachment", async () => {
      const presentation = await create("Tide pools");

      const res = await app.inject({ method: "GET", url: `/api/v1/presentations/${presentation.id}/download` });

      expect(res.statusCode).toBe(200);
      expect(res.headers["content-type"]).toBe(PPTX_CONTENT_TYPE);
      expect(res.headers["content-disposition"]).toBe(
        `attachment; filename="presentation_${presentation.id}.pptx"`,
      );
      expect(res.body).toBe("deck-bytes");
    });

    it("returns 404 for an unknown id", async () => {
      const res = await app.inject({ method: "GET", url: "/api/v1/presentations/pres_missing/download" });
      expect(res.statusCode).toBe(404);
    });
  });
});

describe("Presentations API export failures", () => {
  it("answers 502 when the export times out, and returns the lease", async () => {
    const stalled: DeckExporter = {
      format: "pptx",
      contentType: PPTX_CONTENT_TYPE,
      export: () => new Promise<Buffer>(() => {}),
    };
    const { app } = await buildTestServer({ exporter: stalled, env: { EXPORT_TIMEOUT_MS: "20" } });

    const created = await app.inject({
      method: "POST",
      url: "/api/v1/presentations",
      payload: { topic: "Tide pools", numSlides: 2 },
    });
    const { id } = created.json().presentation;

    const res = await app.inject({ method: "GET", url: `/api/v1/presentations/${id}/download` });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({ error: "Presentation generation failed", statusCode: 502 });

    const stats = await app.inject({ method: "GET", url: "/api/v1/concurrency/stats" });
    expect(stats.json().global.inFlight).toBe(0);

    await app.close();
  });
});
