import { createHash } from "node:crypto";

export interface IdentitySource {
  /** Key presented by the caller, already stripped of any "Bearer " prefix. */
  apiKey?: string | null;
  /** Raw X-Forwarded-For value(s). */
  forwardedFor?: string | string[] | null;
  remoteAddress?: string | null;
}

export const UNKNOWN_IDENTITY = "ip:unknown";

/** Stable, non-reversible label for an API key. */
export function keyIdentity(apiKey: string): string {
  return `key:${createHash("sha256").update(apiKey).digest("hex").slice(0, 16)}`;
}

/**
 * Partition key used by both the rate limiter and the concurrency gate.
 *
 * Order: API key, then the first hop of X-Forwarded-For, then the socket address.
 */
export function resolveIdentity(source: IdentitySource): string {
  const apiKey = source.apiKey?.trim();
  if (apiKey) return keyIdentity(apiKey);

  const forwarded = firstForwardedAddress(source.forwardedFor);
  if (forwarded) return `ip:${forwarded}`;

  const remote = source.remoteAddress?.trim();
  if (remote) return `ip:${remote}`;

  return UNKNOWN_IDENTITY;
}

function firstForwardedAddress(header: string | string[] | null | undefined): string | null {
  if (!header) return null;
  const raw = Array.isArray(header) ? header[0] : header;
  const first = raw?.split(",")[0]?.trim();
  return first ? first : null;
}
