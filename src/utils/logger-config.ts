/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: All sensitive fields must be listed here to prevent
 * accidental exposure in logs.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Provider credentials (at any depth)
  "*.apiKey",
  "*.api_key",
  "*.anthropicApiKey",
  "*.openaiApiKey",
  "*.authorization",
  "*.token",
  "*.secret",
  "*.password",

  // Header names
  "*.headers.authorization",
  "*.headers.x-api-key",
  "*.headers.cookie",

  // Free-text business context supplied by users
  "*.profile.notes",
  "*.email",
  "*.phone",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
