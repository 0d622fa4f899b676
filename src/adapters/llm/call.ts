import { randomUUID } from "node:crypto";
import type { z } from "zod";
import { Agent, setGlobalDispatcher } from "undici";
import { HTTP_CLIENT_TIMEOUT_MS } from "../../config/timeouts.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { ModelTransientError, UpstreamHTTPError, UpstreamTimeoutError, toModelError } from "./errors.js";
import type { CallOpts, UsageMetrics } from "./types.js";

// Undici dispatcher for provider traffic over fetch
// - connect timeout: 3s (fail fast on connection issues)
// - headers/body timeout: HTTP_CLIENT_TIMEOUT_MS
const undiciAgent = new Agent({
  connect: {
    timeout: 3000,
  },
  headersTimeout: HTTP_CLIENT_TIMEOUT_MS,
  bodyTimeout: HTTP_CLIENT_TIMEOUT_MS,
});

setGlobalDispatcher(undiciAgent);

/**
 * Idempotency key sent with every provider request so that a retried
 * logical call is traceable on the provider side.
 */
export function makeIdempotencyKey(): string {
  return randomUUID();
}

/**
 * Provider-specific recognition of an HTTP failure in an SDK error.
 */
export type HttpErrorInfo = { status: number; code?: string; requestId?: string; message: string };

export interface ModelCallContext {
  provider: string;
  model: string;
  operation: string;
  opts: CallOpts;
  /** Returns status info when `error` is an SDK API error with an HTTP status */
  httpInfo: (error: unknown) => HttpErrorInfo | undefined;
}

/**
 * Run one provider request under the call deadline.
 *
 * The request is aborted when `opts.timeoutMs` elapses or the caller's
 * signal fires. Failures come out as ConfigurationError or
 * ModelTransientError (see toModelError).
 */
export async function runModelCall<T extends { usage: UsageMetrics }>(
  ctx: ModelCallContext,
  fn: (signal: AbortSignal, idempotencyKey: string) => Promise<T>
): Promise<T> {
  const { provider, model, operation, opts } = ctx;
  const idempotencyKey = makeIdempotencyKey();
  const startTime = Date.now();

  const abortController = new AbortController();
  const timeoutId = setTimeout(() => abortController.abort(), opts.timeoutMs);
  const onCallerAbort = () => abortController.abort();
  opts.abortSignal?.addEventListener("abort", onCallerAbort, { once: true });

  log.debug(
    { provider, model, operation, request_id: opts.requestId, idempotency_key: idempotencyKey },
    "calling model"
  );

  try {
    const result = await fn(abortController.signal, idempotencyKey);
    emit(TelemetryEvents.LlmCall, {
      provider,
      model,
      operation,
      request_id: opts.requestId,
      elapsed_ms: Date.now() - startTime,
      input_tokens: result.usage.input_tokens,
      output_tokens: result.usage.output_tokens,
    });
    return result;
  } catch (error) {
    const elapsedMs = Date.now() - startTime;

    if (error instanceof ModelTransientError) {
      throw error;
    }

    if (abortController.signal.aborted || (error instanceof Error && error.name === "AbortError")) {
      log.error({ provider, operation, timeout_ms: opts.timeoutMs, elapsed_ms: elapsedMs }, "Model call timed out or was aborted");
      throw toModelError(
        new UpstreamTimeoutError(`${provider} ${operation} timed out`, provider, operation, elapsedMs, error),
        provider
      );
    }

    const http = ctx.httpInfo(error);
    if (http) {
      log.error(
        { provider, operation, status: http.status, request_id: http.requestId, elapsed_ms: elapsedMs },
        "Provider API returned non-2xx status"
      );
      throw toModelError(
        new UpstreamHTTPError(
          `${provider} ${operation} failed: ${http.message}`,
          provider,
          http.status,
          http.code,
          http.requestId,
          elapsedMs,
          error
        ),
        provider
      );
    }

    log.error({ provider, operation, error }, "Model call failed");
    throw toModelError(error, provider);
  } finally {
    clearTimeout(timeoutId);
    opts.abortSignal?.removeEventListener("abort", onCallerAbort);
  }
}

/**
 * Validate raw model output against a schema.
 *
 * No fence stripping or shape guessing: anything other than a JSON
 * document matching the schema is malformed.
 */
export function parseStructured<S extends z.ZodTypeAny>(
  content: string | null | undefined,
  schema: S,
  provider: string
): z.infer<S> {
  if (!content || content.trim() === "") {
    throw new ModelTransientError(`${provider}_empty_response`, "empty", provider);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ModelTransientError(`${provider}_response_not_json`, "malformed", provider, error);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    log.warn({ provider, event: "llm.validation.schema_failed", details }, "Model response failed schema validation");
    throw new ModelTransientError(`${provider}_response_invalid_schema: ${details}`, "malformed", provider, parsed.error);
  }
  return parsed.data;
}

export function requireText(content: string | null | undefined, provider: string): string {
  if (!content || content.trim() === "") {
    throw new ModelTransientError(`${provider}_empty_response`, "empty", provider);
  }
  return content;
}
