/**
 * Task-to-Model Routing Configuration
 *
 * Resolves provider, model and temperature for a model task:
 * 1. Analysis-mode preset (config/model-presets.json, provider + mode + task)
 * 2. Task override (LLM_TASK_<TASK>)
 * 3. Global settings (LLM_PROVIDER, LLM_MODEL, LLM_TEMPERATURE)
 */

import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { config, type AnalysisModeT, type LLMProviderT } from "./index.js";
import { log } from "../utils/telemetry.js";

/**
 * Model-backed tasks that can be routed independently
 */
export const MODEL_TASKS = ["clarification", "explanation", "analysis"] as const;
export type ModelTask = (typeof MODEL_TASKS)[number];

export function isModelTask(task: string): task is ModelTask {
  return (MODEL_TASKS as readonly string[]).includes(task);
}

/**
 * Fallback model per provider when neither a preset nor an override names one
 */
export const PROVIDER_DEFAULT_MODELS: Readonly<Record<LLMProviderT, string>> = {
  openai: "gpt-5-nano",
  anthropic: "claude-haiku-4-5-20251001",
  ollama: "qwen3:8b",
  fixtures: "fixture-v1",
};

const TaskModels = z.object({
  clarification: z.string().min(1).optional(),
  explanation: z.string().min(1).optional(),
  analysis: z.string().min(1).optional(),
});

/** A mode maps either to one model for every task, or to a model per task */
const ModePreset = z.union([z.string().min(1), TaskModels]);

const ModelPresets = z.record(
  z.string(),
  z.object({
    cost_optimized: ModePreset.optional(),
    balanced: ModePreset.optional(),
    deep_analysis: ModePreset.optional(),
  })
);

export type ModelPresetsT = z.infer<typeof ModelPresets>;

function getPresetsPath(): string {
  return config.llm.presetsPath || join(process.cwd(), "config", "model-presets.json");
}

function loadPresets(): ModelPresetsT {
  const presetsPath = getPresetsPath();
  if (!existsSync(presetsPath)) {
    log.warn({ presets_path: presetsPath }, "Model presets file not found, using provider defaults");
    return {};
  }
  try {
    const parsed = ModelPresets.safeParse(JSON.parse(readFileSync(presetsPath, "utf-8")));
    if (!parsed.success) {
      log.warn({ presets_path: presetsPath, issues: parsed.error.issues.length }, "Invalid model presets, ignoring");
      return {};
    }
    log.info({ presets_path: presetsPath }, "Loaded model presets");
    return parsed.data;
  } catch (error) {
    log.warn({ error, presets_path: presetsPath }, "Failed to read model presets, using provider defaults");
    return {};
  }
}

// Lazy-load on first use
let presetsCache: ModelPresetsT | undefined;

function getPresets(): ModelPresetsT {
  if (presetsCache === undefined) {
    presetsCache = loadPresets();
  }
  return presetsCache;
}

/**
 * Reset presets cache (for testing)
 */
export function _resetPresetsCache(): void {
  presetsCache = undefined;
}

/**
 * Preset model for provider/mode/task, or undefined when none matches.
 */
export function getPresetModel(provider: string, mode: AnalysisModeT, task: ModelTask): string | undefined {
  const preset = getPresets()[provider]?.[mode];
  if (preset === undefined) return undefined;
  if (typeof preset === "string") return preset;
  return preset[task];
}

/**
 * Model used when nothing more specific applies. LLM_MODEL only counts
 * for the globally configured provider.
 */
export function getDefaultModel(provider: LLMProviderT): string {
  if (provider === config.llm.provider && config.llm.model) {
    return config.llm.model;
  }
  return PROVIDER_DEFAULT_MODELS[provider];
}

export interface ResolvedModelConfig {
  provider: LLMProviderT;
  model: string;
  temperature: number;
}

export interface ModelRoutingOptions {
  analysisMode?: AnalysisModeT;
  /** Provider chosen by the caller; replaces LLM_PROVIDER */
  provider?: LLMProviderT;
}

export function resolveModelConfig(task: ModelTask | undefined, opts: ModelRoutingOptions = {}): ResolvedModelConfig {
  let provider = opts.provider ?? config.llm.provider;
  let temperature = config.llm.temperature;
  let model: string | undefined;

  const mode = opts.analysisMode ?? config.llm.analysisMode;
  if (mode && task) {
    model = getPresetModel(provider, mode, task);
  }

  if (task) {
    const override = config.llm.tasks[task];
    if (override.provider) provider = override.provider;
    if (override.temperature !== undefined) temperature = override.temperature;
    if (override.model) model = override.model;
  }

  return {
    provider,
    model: model ?? getDefaultModel(provider),
    temperature,
  };
}
