/**
 * Shared error types for model gateway failures
 * Unified error handling across all gateways (Anthropic, OpenAI, fixtures).
 */

/**
 * Upstream timeout error - thrown when a provider API call times out
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamTimeoutError);
    }
  }
}

/**
 * Upstream HTTP error - thrown when a provider API returns a non-2xx status
 *
 * Captures the HTTP status code, provider-specific error code, and request ID
 * for cross-referencing with provider logs.
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamHTTPError);
    }
  }
}

/**
 * Unresolvable provider/model or missing credential.
 * Fatal: surfaced immediately and never retried.
 */
export class ConfigurationError extends Error {
  readonly name = "ConfigurationError";

  constructor(
    message: string,
    public readonly configKey: string | undefined,
    public readonly userMessage: string = message
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * - empty: provider answered with no content
 * - malformed: content present but not valid JSON / failed schema validation
 * - timeout: call exceeded its budget or was aborted
 * - transport: network failure or non-2xx upstream status
 */
export type ModelTransientKind = "empty" | "malformed" | "timeout" | "transport";

/**
 * Recoverable model failure. Callers retry once, then surface a
 * "try again" result instead of crashing.
 */
export class ModelTransientError extends Error {
  readonly name = "ModelTransientError";

  constructor(
    message: string,
    public readonly kind: ModelTransientKind,
    public readonly provider: string,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ModelTransientError);
    }
  }
}

/**
 * Map an SDK/upstream failure onto the transient taxonomy.
 * ConfigurationError and ModelTransientError pass through unchanged.
 */
export function toModelError(error: unknown, provider: string): Error {
  if (error instanceof ConfigurationError || error instanceof ModelTransientError) {
    return error;
  }
  if (error instanceof UpstreamTimeoutError) {
    return new ModelTransientError(error.message, "timeout", provider, error);
  }
  if (error instanceof UpstreamHTTPError) {
    if (error.status === 401 || error.status === 403) {
      return new ConfigurationError(
        `${provider} rejected credentials (HTTP ${error.status})`,
        `${provider}_api_key`,
        `The ${provider} API key was rejected. Check your credentials.`
      );
    }
    return new ModelTransientError(error.message, "transport", provider, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ModelTransientError(message, "transport", provider, error);
}
