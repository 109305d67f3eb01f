/**
 * Sanitizes error messages before returning them to API clients.
 * Prevents leaking internal details like SQL errors, stack traces,
 * connection strings, IP addresses and key material.
 */

const SENSITIVE_PATTERNS = [
  /SELECT\s|INSERT\s|UPDATE\s|DELETE\s|DROP\s|ALTER\s|CREATE\s/i, // SQL
  /at\s+\S+\s+\(.*:\d+:\d+\)/, // stack traces
  /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/, // IPv4
  /redis:\/\/|rediss:\/\/|file:\/\//i, // connection strings
  /ECONNREFUSED|ENOTFOUND|ETIMEDOUT|ECONNRESET/i, // Node network errors
  /SQLITE_[A-Z]+|better-sqlite3/i, // driver internals
  /Bearer\s+\S+|sk-[A-Za-z0-9_-]{8,}/, // key material
];

export function sanitizeErrorMessage(err: unknown, statusCode: number): string {
  if (statusCode >= 500) {
    return "Internal server error";
  }

  const message = err instanceof Error ? err.message : String(err);

  for (const pattern of SENSITIVE_PATTERNS) {
    if (pattern.test(message)) {
      return "Request failed";
    }
  }

  return message;
}
