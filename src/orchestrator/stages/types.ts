import type { ModelRoutingOptions, ModelTask } from "../../config/model-routing.js";
import type { CallOpts, ModelGateway } from "../../adapters/llm/types.js";
import type { AgentState } from "../state.js";

/**
 * Resolves the gateway for a task. `GatewayRouter.gatewayFor` has this
 * shape; tests pass fakes.
 */
export type GatewayResolver = (task: ModelTask, routing: ModelRoutingOptions) => ModelGateway;

export interface StageDeps {
  gatewayFor: GatewayResolver;
  callOpts: CallOpts;
  confidenceThreshold: number;
  explanationsEnabled: boolean;
}

export function routingOf(state: Pick<AgentState, "analysisMode" | "provider">): ModelRoutingOptions {
  return { analysisMode: state.analysisMode, provider: state.provider };
}

export function formatPercent(value: number, digits: number): string {
  return `${(value * 100).toFixed(digits)}%`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
