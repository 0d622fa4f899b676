import { computeProcessMetrics } from "../../analysis/metrics.js";
import type { ChatMessage, ContentBlock, ToolResultBlock } from "../../adapters/llm/types.js";
import { toolUsesOf } from "../../adapters/llm/types.js";
import { emit, TelemetryEvents } from "../../utils/telemetry.js";
import { dispatchTool } from "../tools/dispatch.js";
import type { ToolContext } from "../tools/types.js";
import type { AgentState, StageResult } from "../state.js";

function lastAssistantBlocks(messages: readonly ChatMessage[]): ContentBlock[] {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === "assistant") {
      return typeof message.content === "string" ? [] : message.content;
    }
  }
  return [];
}

/**
 * Run the tool calls from the last assistant turn, in the order issued,
 * and append their results as one user turn.
 */
export function toolExec(state: AgentState): StageResult {
  const toolUses = toolUsesOf(lastAssistantBlocks(state.messages));

  const ctx: ToolContext = {
    metrics: state.metrics ?? computeProcessMetrics(state.process),
    insight: state.insight,
    constraints: state.constraints,
  };

  const results: ToolResultBlock[] = [];
  const findings: string[] = [];
  for (const use of toolUses) {
    const { output, ok } = dispatchTool(use.name, use.input, ctx);
    emit(TelemetryEvents.ToolInvoked, { thread_id: state.threadId, tool: use.name, ok, cycle: state.cycleCount });
    results.push({ type: "tool_result", tool_use_id: use.id, content: output });
    if (ok) findings.push(output);
  }

  const messages: ChatMessage[] =
    results.length > 0 ? [...state.messages, { role: "user", content: results }] : state.messages;

  return {
    update: { messages, findings: [...state.findings, ...findings] },
    trace: [`Executed ${toolUses.length} tool calls: ${toolUses.map((use) => use.name).join(", ") || "none"}`],
    event: { type: "tools_executed" },
  };
}
