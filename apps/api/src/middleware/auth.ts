import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";
import crypto from "node:crypto";
import { resolveIdentity } from "@slidesmith/core";

declare module "fastify" {
  interface FastifyRequest {
    /** Key presented by the caller, if any. Verified only when API keys are configured. */
    apiKey: string | null;
    /** Partition key for rate limiting and concurrency. */
    identity: string;
  }
}

export interface AuthOptions {
  /** Accepted keys. Empty disables verification. */
  apiKeys: string[];
}

function hashKey(key: string): Buffer {
  return crypto.createHash("sha256").update(key).digest();
}

function isPublicPath(url: string): boolean {
  const path = url.split("?")[0] ?? url;
  return path === "/" || path === "/health" || path === "/metrics" || path === "/docs" || path.startsWith("/docs/");
}

/** Bearer token first, then X-API-Key. */
export function extractApiKey(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;
  const bearer = authHeader ? /^Bearer\s+(.+)$/i.exec(authHeader)?.[1]?.trim() : undefined;
  if (bearer) return bearer;

  const headerKey = request.headers["x-api-key"];
  const raw = Array.isArray(headerKey) ? headerKey[0] : headerKey;
  return raw?.trim() || null;
}

function unauthorized(reply: FastifyReply, message: string) {
  return reply.code(401).header("WWW-Authenticate", "Bearer").send({ error: "Unauthorized", message });
}

/**
 * API key authentication and identity resolution.
 *
 * Keys are SHA-256 hashed on load and compared with timingSafeEqual. Every request gets an
 * identity, including public paths and unauthenticated callers, so admission can partition on it.
 *
 * Public paths: /, /health, /metrics, /docs.
 */
const authPlugin: FastifyPluginAsync<AuthOptions> = async (app, options) => {
  const keyHashes = options.apiKeys.map(hashKey);
  const enforce = keyHashes.length > 0;

  app.decorateRequest("apiKey", null);
  app.decorateRequest("identity", "");

  app.addHook("onRequest", async (request, reply) => {
    const apiKey = extractApiKey(request);
    request.apiKey = apiKey;
    request.identity = resolveIdentity({
      apiKey,
      forwardedFor: request.headers["x-forwarded-for"],
      remoteAddress: request.ip,
    });

    if (enforce && !isPublicPath(request.url)) {
      if (!apiKey) {
        return unauthorized(reply, "API key required");
      }
      const incoming = hashKey(apiKey);
      const known = keyHashes.some((hash) => hash.length === incoming.length && crypto.timingSafeEqual(hash, incoming));
      if (!known) {
        request.log.info({ identity: request.identity }, "Rejected unknown API key");
        return unauthorized(reply, "Invalid API key");
      }
    }

    if (apiKey) {
      reply.header("X-User-ID", request.identity);
    }
  });
};

export const authMiddleware = fp(authPlugin, { name: "auth-middleware" });
