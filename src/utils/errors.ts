import { ZodError } from "zod";
import type { FastifyRequest } from "fastify";
import { getRequestId } from "./request-id.js";
import { ConfigurationError } from "../adapters/llm/errors.js";

/**
 * Violated structural invariant (process with zero steps, confidence
 * weights not summing to 1.0). Fatal at construction time.
 */
export class DataInvariantError extends Error {
  readonly name = "DataInvariantError";

  constructor(message: string, public readonly invariant: string) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DataInvariantError);
    }
  }
}

/**
 * Error codes for structured error responses
 */
export type ErrorCode = "BAD_INPUT" | "NOT_FOUND" | "CONFIGURATION" | "RATE_LIMITED" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    "BAD_INPUT",
    "Validation failed",
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

function sanitizeMessage(raw: string): string {
  return raw
    .replace(/\/[\w/.@-]+/g, "[path]")
    .replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]")
    .replace(/[A-Z_]+_?SECRET=\S+/gi, "[SECRET_REDACTED]")
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, "[email]");
}

/**
 * Convert any error to ErrorV1 (never leaks stack traces)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof ConfigurationError) {
    return buildErrorV1(
      "CONFIGURATION",
      error.userMessage,
      error.configKey ? { config_key: error.configKey } : undefined,
      requestId
    );
  }

  if (error instanceof DataInvariantError) {
    return buildErrorV1("BAD_INPUT", error.message, { invariant: error.invariant }, requestId);
  }

  if (error instanceof Error) {
    const statusCode = "statusCode" in error ? error.statusCode : undefined;
    if (statusCode === 429) {
      return buildErrorV1("RATE_LIMITED", "Too many requests", undefined, requestId);
    }
    if (typeof statusCode === "number" && statusCode >= 400 && statusCode < 500) {
      return buildErrorV1("BAD_INPUT", sanitizeMessage(error.message), undefined, requestId);
    }
    return buildErrorV1(
      "INTERNAL",
      sanitizeMessage(error.message || "An unexpected error occurred"),
      undefined,
      requestId
    );
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", sanitizeMessage(error), undefined, requestId);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "RATE_LIMITED":
      return 429;
    case "CONFIGURATION":
      return 503;
    case "INTERNAL":
    default:
      return 500;
  }
}
