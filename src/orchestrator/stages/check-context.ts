import { criticalGaps, scoreConfidence } from "../../analysis/confidence.js";
import { emit, TelemetryEvents } from "../../utils/telemetry.js";
import type { AgentState, StageResult } from "../state.js";
import { formatPercent, type StageDeps } from "./types.js";

/**
 * Score input completeness and decide between clarification and analysis.
 * Consumes any pending user response.
 */
export function checkContext(state: AgentState, deps: Pick<StageDeps, "confidenceThreshold">): StageResult {
  const confidence = scoreConfidence(state.process, state.constraints, state.profile, deps.confidenceThreshold);

  let trace = `Context check: confidence=${formatPercent(confidence.score, 1)} (${confidence.level})`;

  emit(TelemetryEvents.ContextChecked, {
    thread_id: state.threadId,
    confidence: confidence.score,
    sufficient: confidence.isSufficient,
    gap_count: confidence.dataGaps.length,
  });

  if (!confidence.isSufficient) {
    trace += `, identified ${criticalGaps(confidence.dataGaps).length} critical gaps`;
    return {
      update: {
        confidence,
        needsClarification: true,
        clarificationQuestions: confidence.suggestions.slice(0, 3),
        userResponse: undefined,
        phase: "needs_clarification",
      },
      trace: [trace],
      event: { type: "context_checked", sufficient: false },
    };
  }

  return {
    update: {
      confidence,
      needsClarification: false,
      clarificationQuestions: [],
      userResponse: undefined,
      phase: "analysis",
    },
    trace: [trace],
    event: { type: "context_checked", sufficient: true },
  };
}
