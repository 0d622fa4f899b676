import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * so that the Fastify and standalone Pino loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryValue = TelemetryLeaf | TelemetryShape | TelemetryValue[];
export type TelemetryShape = { [key: string]: TelemetryValue };
export type Event = Record<string, unknown>;

type TestSink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests.
 * Only allowed when NODE_ENV=test or under Vitest.
 */
let testSink: TestSink | null = null;

export function setTestSink(sink: TestSink | null): void {
  // Direct env check: config may not be parseable during module init
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  ContextChecked: "analysis.context.checked",
  ClarificationRequested: "analysis.clarification.requested",
  ClarificationQuestionsFallback: "analysis.clarification.fallback",

  AnalysisStarted: "analysis.initial.started",
  AnalysisSucceeded: "analysis.initial.succeeded",
  AnalysisFailed: "analysis.initial.failed",

  InvestigationCycle: "analysis.investigation.cycle",
  InvestigationSkipped: "analysis.investigation.skipped",
  ToolInvoked: "analysis.investigation.tool_invoked",

  AnalysisFinalized: "analysis.finalized",
  ReasoningTraceTruncated: "analysis.trace.truncated",

  LlmRetry: "llm.retry",
  LlmRetrySuccess: "llm.retry_success",
  LlmRetryExhausted: "llm.retry_exhausted",
  LlmCall: "llm.call",

  EnrichmentSucceeded: "enrichment.succeeded",
  EnrichmentFailed: "enrichment.failed",

  RoiEstimated: "roi.estimated",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * All valid event names (for CI validation)
 */
export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * StatsD client (optional, enabled by STATSD_HOST)
 */
let statsdClient: StatsD | null = null;

if (env.STATSD_HOST) {
  statsdClient = new StatsD({
    host: env.STATSD_HOST,
    port: Number(env.STATSD_PORT) || 8125,
    prefix: "process_analysis.",
    globalTags: {
      service: env.SERVICE_NAME || "process-analysis-service",
      env: env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "StatsD error");
    },
  });
  log.info({ statsd_host: env.STATSD_HOST }, "StatsD client initialized");
}

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: TelemetryValue[] = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (typeof value === "object") {
    const sanitizedObj: TelemetryShape = {};
    for (const [key, v] of Object.entries(value)) {
      const sanitizedChild = sanitizeTelemetryValue(v);
      if (sanitizedChild !== undefined) {
        sanitizedObj[key] = sanitizedChild;
      }
    }
    return sanitizedObj;
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tagValue(value: TelemetryValue | undefined, fallback: string): string {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean"
    ? String(value)
    : fallback;
}

function sendMetrics(client: StatsD, event: string, eventData: TelemetryShape): void {
  switch (event) {
    case TelemetryEvents.ContextChecked:
      if (typeof eventData.confidence === "number") {
        client.histogram("context.confidence", eventData.confidence, {
          sufficient: tagValue(eventData.sufficient, "unknown"),
        });
      }
      break;

    case TelemetryEvents.AnalysisSucceeded:
      client.increment("analysis.succeeded", 1, {
        provider: tagValue(eventData.provider, "unknown"),
      });
      if (typeof eventData.latency_ms === "number") {
        client.histogram("analysis.latency_ms", eventData.latency_ms);
      }
      if (typeof eventData.issue_count === "number") {
        client.gauge("analysis.issues", eventData.issue_count);
      }
      break;

    case TelemetryEvents.AnalysisFailed:
      client.increment("analysis.failed", 1, {
        kind: tagValue(eventData.kind, "unknown"),
      });
      break;

    case TelemetryEvents.InvestigationCycle:
      client.increment("investigation.cycles", 1);
      break;

    case TelemetryEvents.ToolInvoked:
      client.increment("investigation.tool_calls", 1, {
        tool: tagValue(eventData.tool, "unknown"),
      });
      break;

    case TelemetryEvents.LlmRetry:
      client.increment("llm.retry", 1, {
        operation: tagValue(eventData.operation, "unknown"),
      });
      break;

    case TelemetryEvents.LlmRetryExhausted:
      client.increment("llm.retry_exhausted", 1, {
        operation: tagValue(eventData.operation, "unknown"),
      });
      break;

    case TelemetryEvents.EnrichmentFailed:
      client.increment("enrichment.failed", 1, {
        task: tagValue(eventData.task, "unknown"),
      });
      break;

    default:
      break;
  }
}

/**
 * Emit telemetry event (logs + StatsD metrics)
 *
 * @param event Event name (use TelemetryEvents)
 */
export function emit(event: string, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (statsdClient) {
    try {
      sendMetrics(statsdClient, event, eventData);
    } catch (error) {
      log.error({ error, event }, "Failed to send StatsD metrics");
    }
  }
}

/**
 * Flush StatsD metrics (for graceful shutdown)
 */
export async function flushMetrics(): Promise<void> {
  const client = statsdClient;
  if (!client) return;
  await new Promise<void>((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing StatsD metrics");
        reject(error);
      } else {
        log.info("StatsD metrics flushed");
        resolve();
      }
    });
  });
}
