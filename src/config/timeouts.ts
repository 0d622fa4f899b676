import { env } from "node:process";

const MIN_TIMEOUT_MS = 5_000; // 5s
const MAX_TIMEOUT_MS = 5 * 60_000; // 5m

function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}

function parseTimeoutEnv(name: string, defaultMs: number): number {
  const raw = env[name];
  if (!raw) return defaultMs;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultMs;
  return n;
}

/** Budget for a single model round trip (invoke, structured or tool call). */
export const MODEL_CALL_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("MODEL_CALL_TIMEOUT_MS", 60_000),
);

/** Socket-level timeouts for the HTTP client used by provider SDKs. */
export const HTTP_CLIENT_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("HTTP_CLIENT_TIMEOUT_MS", 90_000),
);

/** Fastify request/connection timeout; covers a full analysis run. */
export const ROUTE_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("ROUTE_TIMEOUT_MS", 5 * 60_000),
);
