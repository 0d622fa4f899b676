import { toolUsesOf, type ChatMessage } from "../../adapters/llm/types.js";
import { INVESTIGATION_SYSTEM_PROMPT } from "../../prompts/analysis.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { MODEL_TRANSIENT_RETRY_CONFIG, withRetry } from "../../utils/retry.js";
import { shouldExecuteTools } from "../machine.js";
import { getToolDefinitions } from "../tools/registry.js";
import type { AgentState, StageResult } from "../state.js";
import { errorMessage, routingOf, type StageDeps } from "./types.js";

function cycles(count: number): string {
  return `${count} ${count === 1 ? "cycle" : "cycles"}`;
}

/**
 * One tool-calling turn over the accumulated history.
 *
 * The cycle counter moves only when the model asks for tools. Failures
 * end the loop; the initial analysis is kept as the result.
 */
export async function investigate(state: AgentState, deps: StageDeps): Promise<StageResult> {
  try {
    const gateway = deps.gatewayFor("analysis", routingOf(state));
    const chatWithTools = gateway.chatWithTools?.bind(gateway);

    if (!gateway.supportsTools || !chatWithTools) {
      emit(TelemetryEvents.InvestigationSkipped, { thread_id: state.threadId, reason: "tools_unsupported", provider: gateway.name });
      return {
        update: { phase: "finalization" },
        trace: [`Investigation skipped: ${gateway.name} does not support tool calling`],
        event: { type: "investigation_ended" },
      };
    }

    const result = await withRetry(
      () => chatWithTools({ system: INVESTIGATION_SYSTEM_PROMPT, messages: state.messages, tools: getToolDefinitions() }, deps.callOpts),
      { provider: gateway.name, model: gateway.model, operation: "investigate" },
      MODEL_TRANSIENT_RETRY_CONFIG
    );

    const toolUses = toolUsesOf(result.content);
    const assistant: ChatMessage = { role: "assistant", content: result.content };
    const messages = [...state.messages, assistant];

    if (toolUses.length === 0) {
      return {
        update: { messages, phase: "finalization" },
        trace: [`Investigation complete after ${cycles(state.cycleCount)}`],
        event: { type: "investigation_turn", toolCalls: 0, cycleCount: state.cycleCount, maxCycles: state.maxCycles },
      };
    }

    const cycleCount = state.cycleCount + 1;
    const proceed = shouldExecuteTools(toolUses.length, cycleCount, state.maxCycles);

    emit(TelemetryEvents.InvestigationCycle, {
      thread_id: state.threadId,
      cycle: cycleCount,
      tool_calls: toolUses.length,
      stop_reason: result.stop_reason,
    });

    if (!proceed) {
      // Unanswered tool_use blocks are not kept in the history
      return {
        update: { cycleCount, phase: "finalization" },
        trace: [`Investigation stopped at cycle limit (${state.maxCycles})`],
        event: { type: "investigation_turn", toolCalls: toolUses.length, cycleCount, maxCycles: state.maxCycles },
      };
    }

    const trace = `Investigation cycle ${cycleCount}: requested ${toolUses.map((use) => use.name).join(", ")}`;

    return {
      update: { messages, cycleCount, phase: "investigation" },
      trace: [trace],
      event: { type: "investigation_turn", toolCalls: toolUses.length, cycleCount, maxCycles: state.maxCycles },
    };
  } catch (error) {
    log.warn({ thread_id: state.threadId, cycle: state.cycleCount, error: errorMessage(error) }, "Investigation turn failed");
    return {
      update: { phase: "finalization" },
      trace: [`Investigation failed after ${cycles(state.cycleCount)}: ${errorMessage(error)}`],
      event: { type: "investigation_ended" },
    };
  }
}
