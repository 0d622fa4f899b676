import { emit, TelemetryEvents } from "./telemetry.js";
import { ConfigurationError, ModelTransientError } from "../adapters/llm/errors.js";

/**
 * Retry configuration options
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitterPercent: number;
}

/**
 * Default retry configuration
 * - 3 attempts total (1 initial + 2 retries)
 * - Exponential backoff: 250ms, 500ms, 1000ms (with jitter)
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  backoffFactor: 2,
  jitterPercent: 20,
};

/**
 * Retry policy for the structured analysis call
 * - Exactly one retry (2 total attempts) to limit token burn
 */
export const MODEL_TRANSIENT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  baseDelayMs: 100,
  maxDelayMs: 500,
  backoffFactor: 2,
  jitterPercent: 20,
};

const RETRYABLE_ERROR_PATTERNS = [
  /timeout/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /socket hang up/i,
  /rate.?limit/i,
  /too many requests/i,
  /overloaded/i,
  /service unavailable/i,
];

/**
 * HTTP status codes that should trigger retries
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Check if an error is retryable
 *
 * Configuration errors never are; every ModelTransientError kind is.
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;
  if (error instanceof ConfigurationError) return false;
  if (error instanceof ModelTransientError) return true;

  if (error instanceof Error) {
    if ("status" in error && typeof error.status === "number" && RETRYABLE_STATUS_CODES.has(error.status)) {
      return true;
    }
    return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(error.message));
  }

  return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(String(error)));
}

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // ±jitterPercent
  const jitterRange = (cappedDelay * config.jitterPercent) / 100;
  const jitter = Math.random() * jitterRange * 2 - jitterRange;

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryContext {
  provider: string;
  model: string;
  operation: string;
}

/**
 * Execute a function with automatic retries
 *
 * @param fn Function to execute (should throw on error)
 * @param context Context for telemetry (provider, model, operation)
 * @throws Last error if all attempts fail, or the first non-retryable error
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  context: RetryContext,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await fn(attempt);

      if (attempt > 1) {
        emit(TelemetryEvents.LlmRetrySuccess, {
          ...context,
          attempt,
        });
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        throw error;
      }

      const errorMessage = error instanceof Error ? error.message : String(error);

      if (attempt >= config.maxAttempts) {
        emit(TelemetryEvents.LlmRetryExhausted, {
          ...context,
          total_attempts: attempt,
          error_message: errorMessage,
        });
        throw error;
      }

      const delay = calculateBackoffDelay(attempt, config);

      emit(TelemetryEvents.LlmRetry, {
        ...context,
        attempt,
        max_attempts: config.maxAttempts,
        delay_ms: delay,
        kind: error instanceof ModelTransientError ? error.kind : "unknown",
        reason: errorMessage.substring(0, 100),
      });

      await sleep(delay);
    }
  }

  throw lastError;
}
