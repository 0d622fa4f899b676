import { randomUUID } from "node:crypto";
import type { FastifyRequest } from "fastify";
import type { IncomingMessage } from "node:http";

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = "X-Request-Id";
export const REQUEST_ID_HEADER_LOWER = "x-request-id";

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Reuse an incoming X-Request-Id or mint a new one.
 * Wired into Fastify as `genReqId`, so `request.id` always carries it.
 */
export function requestIdFromHeaders(raw: IncomingMessage): string {
  const incoming = raw.headers[REQUEST_ID_HEADER_LOWER];
  if (typeof incoming === "string" && incoming.trim().length > 0) {
    return incoming.trim();
  }
  return generateRequestId();
}

/**
 * Get request ID from Fastify request
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request) {
    return "unknown";
  }
  return request.id || "unknown";
}
