// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import compress from "@fastify/compress";
import { config } from "./config/index.js";
import { resolveModelConfig } from "./config/model-routing.js";
import { ROUTE_TIMEOUT_MS } from "./config/timeouts.js";
import { GatewayRouter } from "./adapters/llm/router.js";
import {
  AnalysisOrchestrator,
  InMemoryCheckpointStore,
  type CheckpointStore,
  type GatewayResolver,
  type OrchestratorOptions,
} from "./orchestrator/index.js";
import { PostExtractionEnricher } from "./enrichment/post-extraction.js";
import { analyzeRoutes } from "./routes/v1.analyze.js";
import { enrichRoute } from "./routes/v1.enrich.js";
import { roiRoute } from "./routes/v1.roi.js";
import { processRoutes } from "./routes/v1.process.js";
import { SERVICE_VERSION } from "./version.js";
import { REQUEST_ID_HEADER, getRequestId, requestIdFromHeaders } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { flushMetrics } from "./utils/telemetry.js";

const SERVICE_NAME = "process-analysis-service";

function resolveAllowedOrigins(): string[] {
  const origins = config.server.allowedOrigins;
  if (config.server.nodeEnv === "production" && origins.some((origin) => origin === "*" || origin === '"*"')) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }
  return origins;
}

export interface ServerDeps {
  /** Defaults to the provider router */
  gatewayFor?: GatewayResolver;
  checkpoints?: CheckpointStore;
  orchestrator?: OrchestratorOptions;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(deps: ServerDeps = {}) {
  const gatewayFor = deps.gatewayFor ?? new GatewayRouter().gatewayFor;
  const orchestrator = new AnalysisOrchestrator(
    gatewayFor,
    deps.checkpoints ?? new InMemoryCheckpointStore(),
    deps.orchestrator
  );
  const enricher = new PostExtractionEnricher(gatewayFor, {
    explanationsEnabled: deps.orchestrator?.explanationsEnabled,
    timeoutMs: deps.orchestrator?.timeoutMs,
  });

  const rateLimitRpm = config.server.rateLimitRpm;

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    connectionTimeout: ROUTE_TIMEOUT_MS,
    requestTimeout: ROUTE_TIMEOUT_MS,
    genReqId: requestIdFromHeaders,
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(),
  });

  // Pure JSON API: no CSP, cross-origin reads allowed
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  await app.register(compress, {
    threshold: 1024,
    encodings: ["gzip", "deflate"],
    customTypes: /^(application\/json|text\/plain)$/,
  });

  await app.register(rateLimit, {
    global: true,
    max: rateLimitRpm,
    timeWindow: "1 minute",
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
      "retry-after": true,
    },
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn({ event: "rate_limit_hit", max: rateLimitRpm, request_id: requestId }, "Rate limit exceeded");

      // @fastify/rate-limit reads statusCode off the body
      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, requestId),
      };
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      request.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    } else {
      request.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", retryAfter);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.get("/healthz", async () => {
    const { provider, model } = resolveModelConfig("analysis");
    return {
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      provider,
      model,
    };
  });

  await analyzeRoutes(app, orchestrator);
  await enrichRoute(app, enricher);
  await roiRoute(app);
  await processRoutes(app);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  const port = config.server.port;

  build()
    .then(async (app) => {
      const { provider, model } = resolveModelConfig("analysis");
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          provider,
          model,
          explanations_enabled: config.llm.explanationsEnabled,
          confidence_threshold: config.analysis.confidenceThreshold,
          max_cycles: config.analysis.maxCycles,
          global_rate_limit_rpm: config.server.rateLimitRpm,
          body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
          cors_origins: config.server.allowedOrigins,
          route_timeout_ms: ROUTE_TIMEOUT_MS,
        },
        "Process analysis service starting"
      );

      const shutdown = (signal: string) => {
        app.log.info({ signal }, "Shutting down");
        app
          .close()
          .then(() => flushMetrics())
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            app.log.error({ error: err }, "Shutdown failed");
            process.exit(1);
          });
      };
      process.once("SIGTERM", () => shutdown("SIGTERM"));
      process.once("SIGINT", () => shutdown("SIGINT"));

      await app.listen({ port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
