/**
 * Provider router for model gateways.
 *
 * Selects a gateway (OpenAI, Anthropic, Ollama, Fixtures) per task using
 * resolveModelConfig: preset → task override → environment.
 */

import { log } from "../../utils/telemetry.js";
import { config, type LLMProviderT } from "../../config/index.js";
import { resolveModelConfig, type ModelRoutingOptions, type ModelTask } from "../../config/model-routing.js";
import type { ModelGateway } from "./types.js";
import { AnthropicGateway } from "./anthropic.js";
import { OpenAIGateway } from "./openai.js";
import { FixturesGateway } from "./fixtures.js";
import { ConfigurationError } from "./errors.js";

function assertCredentials(provider: LLMProviderT): void {
  if (provider === "openai" && !config.llm.openaiApiKey) {
    throw new ConfigurationError(
      "OpenAI API key not configured",
      "OPENAI_API_KEY",
      "Please set OPENAI_API_KEY in your environment or .env file."
    );
  }
  if (provider === "anthropic" && !config.llm.anthropicApiKey) {
    throw new ConfigurationError(
      "Anthropic API key not configured",
      "ANTHROPIC_API_KEY",
      "Please set ANTHROPIC_API_KEY in your environment or .env file."
    );
  }
}

function createGateway(provider: LLMProviderT, model: string, temperature: number, task: ModelTask): ModelGateway {
  switch (provider) {
    case "anthropic":
      return new AnthropicGateway(model, temperature);
    case "openai":
    case "ollama":
      return new OpenAIGateway(provider, model, temperature);
    case "fixtures":
      return new FixturesGateway(task);
  }
}

/**
 * Hands out gateways per task and owns their cache. The server builds one
 * router and passes `gatewayFor` to the orchestrator and enricher.
 *
 * @example
 * ```typescript
 * const router = new GatewayRouter();
 * const gateway = router.gatewayFor("analysis", { analysisMode: "balanced" });
 * const { value } = await gateway.structured(args, AnalysisInsight, opts);
 * ```
 */
export class GatewayRouter {
  private readonly gateways = new Map<string, ModelGateway>();

  /**
   * @throws ConfigurationError when the resolved provider has no credentials
   */
  readonly gatewayFor = (task: ModelTask, opts: ModelRoutingOptions = {}): ModelGateway => {
    const { provider, model, temperature } = resolveModelConfig(task, opts);
    assertCredentials(provider);

    // Fixture text varies by task
    const cacheKey = provider === "fixtures" ? `fixtures:${task}` : `${provider}:${model}:${temperature}`;
    const cached = this.gateways.get(cacheKey);
    if (cached) return cached;

    const gateway = createGateway(provider, model, temperature, task);
    this.gateways.set(cacheKey, gateway);
    log.info({ provider, model, temperature, task, cache_key: cacheKey }, "Created model gateway instance");
    return gateway;
  };

  get size(): number {
    return this.gateways.size;
  }
}
