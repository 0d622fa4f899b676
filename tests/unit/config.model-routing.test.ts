import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  PROVIDER_DEFAULT_MODELS,
  _resetPresetsCache,
  getDefaultModel,
  getPresetModel,
  isModelTask,
  resolveModelConfig,
} from "../../src/config/model-routing.js";

describe("resolveModelConfig", () => {
  beforeEach(() => {
    _resetPresetsCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _resetPresetsCache();
  });

  it("falls back to the provider default model", () => {
    expect(resolveModelConfig("analysis")).toEqual({ provider: "fixtures", model: "fixture-v1", temperature: 0 });
  });

  it("uses the analysis-mode preset for the task", () => {
    expect(resolveModelConfig("analysis", { provider: "openai", analysisMode: "balanced" }).model).toBe("gpt-5-mini");
    expect(resolveModelConfig("clarification", { provider: "openai", analysisMode: "balanced" }).model).toBe(
      "gpt-4o-mini"
    );
  });

  it("reads the mode from LLM_ANALYSIS_MODE", () => {
    vi.stubEnv("LLM_ANALYSIS_MODE", "deep_analysis");
    expect(resolveModelConfig("explanation", { provider: "anthropic" }).model).toBe("claude-sonnet-4-5-20250929");
  });

  it("lets a task override replace the preset", () => {
    vi.stubEnv("LLM_TASK_ANALYSIS", '{"provider":"anthropic","model":"claude-custom","temperature":0.2}');

    expect(resolveModelConfig("analysis", { provider: "openai", analysisMode: "balanced" })).toEqual({
      provider: "anthropic",
      model: "claude-custom",
      temperature: 0.2,
    });
  });

  it("applies LLM_MODEL only to the global provider", () => {
    vi.stubEnv("LLM_PROVIDER", "openai");
    vi.stubEnv("LLM_MODEL", "gpt-4.1");

    expect(getDefaultModel("openai")).toBe("gpt-4.1");
    expect(getDefaultModel("anthropic")).toBe(PROVIDER_DEFAULT_MODELS.anthropic);
  });

  it("ignores a missing presets file", () => {
    vi.stubEnv("MODEL_PRESETS_PATH", "/nonexistent/model-presets.json");
    expect(getPresetModel("openai", "balanced", "analysis")).toBeUndefined();
    expect(resolveModelConfig("analysis", { provider: "openai", analysisMode: "balanced" }).model).toBe(
      PROVIDER_DEFAULT_MODELS.openai
    );
  });
});

describe("isModelTask", () => {
  it("accepts known tasks only", () => {
    expect(isModelTask("analysis")).toBe(true);
    expect(isModelTask("summarize")).toBe(false);
    expect(isModelTask("extraction")).toBe(false);
  });
});
