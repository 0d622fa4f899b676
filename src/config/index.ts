/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 *
 * Invalid configurations fail fast on first access; tests reset the
 * cached value with `_resetConfigCache()` after stubbing env vars.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Optional string that treats empty as undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim().length > 0 ? val.trim() : undefined));

const Environment = z.enum(["development", "test", "production"]);

/**
 * LLM Provider enum
 */
export const LLMProvider = z.enum(["anthropic", "openai", "ollama", "fixtures"]);
export type LLMProviderT = z.infer<typeof LLMProvider>;

/**
 * Analysis mode presets (see config/model-presets.json)
 */
export const AnalysisMode = z.enum(["cost_optimized", "balanced", "deep_analysis"]);
export type AnalysisModeT = z.infer<typeof AnalysisMode>;

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Per-task override, supplied as JSON in LLM_TASK_<TASK>
 * e.g. LLM_TASK_ANALYSIS='{"model":"gpt-4o","temperature":0.2}'
 */
const TaskOverride = z.object({
  provider: LLMProvider.optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
});
export type TaskOverrideT = z.infer<typeof TaskOverride>;

const taskOverrideFromEnv = z
  .string()
  .optional()
  .transform((val, ctx): TaskOverrideT => {
    if (!val || val.trim() === "") return {};
    let raw: unknown;
    try {
      raw = JSON.parse(val);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Task override must be JSON" });
      return z.NEVER;
    }
    const parsed = TaskOverride.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${issue.path.join(".") || "override"}: ${issue.message}`,
        });
      }
      return z.NEVER;
    }
    return parsed.data;
  });

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
    rateLimitRpm: z.coerce.number().int().positive().default(120),
    /** Comma-separated CORS allowlist */
    allowedOrigins: z
      .string()
      .default("http://localhost:5173,http://localhost:3000")
      .transform((val) =>
        val
          .split(",")
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0)
      ),
  }),

  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: optionalString,
    temperature: z.coerce.number().min(0).max(2).default(0),
    anthropicApiKey: optionalString,
    openaiApiKey: optionalString,
    ollamaBaseUrl: z.string().url().default("http://localhost:11434"),
    explanationsEnabled: booleanString.default(true),
    analysisMode: AnalysisMode.optional(),
    presetsPath: optionalString,
    tasks: z.object({
      clarification: taskOverrideFromEnv,
      explanation: taskOverrideFromEnv,
      analysis: taskOverrideFromEnv,
    }),
  }),

  analysis: z.object({
    confidenceThreshold: z.coerce.number().min(0).max(1).default(0.6),
    maxCycles: z.coerce.number().int().min(0).default(5),
    maxTraceEntries: z.coerce.number().int().min(2).default(200),
    executionsPerYear: z.coerce.number().int().positive().default(1000),
  }),

  statsd: z.object({
    host: optionalString,
    port: z.coerce.number().int().positive().default(8125),
  }),

  testing: z.object({
    isVitest: booleanString.default(false),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Parse configuration from process.env
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: emptyToUndefined(env.PORT),
      nodeEnv: emptyToUndefined(env.NODE_ENV),
      logLevel: emptyToUndefined(env.LOG_LEVEL),
      bodyLimitBytes: emptyToUndefined(env.BODY_LIMIT_BYTES),
      rateLimitRpm: emptyToUndefined(env.GLOBAL_RATE_LIMIT_RPM),
      allowedOrigins: emptyToUndefined(env.ALLOWED_ORIGINS),
    },
    llm: {
      provider: emptyToUndefined(env.LLM_PROVIDER),
      model: env.LLM_MODEL,
      temperature: emptyToUndefined(env.LLM_TEMPERATURE),
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      openaiApiKey: env.OPENAI_API_KEY,
      ollamaBaseUrl: emptyToUndefined(env.OLLAMA_BASE_URL),
      explanationsEnabled: emptyToUndefined(env.LLM_EXPLANATIONS_ENABLED),
      analysisMode: emptyToUndefined(env.LLM_ANALYSIS_MODE),
      presetsPath: env.MODEL_PRESETS_PATH,
      tasks: {
        clarification: env.LLM_TASK_CLARIFICATION,
        explanation: env.LLM_TASK_EXPLANATION,
        analysis: env.LLM_TASK_ANALYSIS,
      },
    },
    analysis: {
      confidenceThreshold: emptyToUndefined(env.CONFIDENCE_THRESHOLD),
      maxCycles: emptyToUndefined(env.AGENT_MAX_CYCLES),
      maxTraceEntries: emptyToUndefined(env.REASONING_TRACE_MAX),
      executionsPerYear: emptyToUndefined(env.ROI_EXECUTIONS_PER_YEAR),
    },
    statsd: {
      host: env.STATSD_HOST,
      port: emptyToUndefined(env.STATSD_PORT),
    },
    testing: {
      isVitest: emptyToUndefined(env.VITEST),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables. ${details}`);
  }
  return result.data;
}

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access. This allows tests
 * to set environment variables before the config is parsed.
 *
 * ```
 * import { config } from './config/index.js';
 * const threshold = config.analysis.confidenceThreshold;
 * ```
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys() {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isProduction(): boolean {
  return config.server.nodeEnv === "production";
}

export function isTest(): boolean {
  return config.server.nodeEnv === "test" || config.testing.isVitest;
}
