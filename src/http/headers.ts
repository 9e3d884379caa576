import type { IncomingMessage, ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";

/** Security headers applied to every HTTP response served by the gateway. */
export function applySecurityHeaders(res: ServerResponse): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
  res.setHeader("Cache-Control", "no-store");
}

/**
 * Guarantees that the request/response pair carries a stable correlation id.
 * Identifiers provided by reverse proxies are preserved, otherwise a fresh
 * UUID is minted.
 */
export function ensureRequestId(req: IncomingMessage, res: ServerResponse): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim().slice(0, 128) : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}
