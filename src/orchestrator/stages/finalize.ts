import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { AgentState, StageResult } from "../state.js";
import { formatPercent } from "./types.js";

/**
 * Fold investigation findings into the insight and close the run.
 */
export function finalize(state: AgentState): StageResult {
  const insight = state.insight
    ? { ...state.insight, investigationFindings: [...state.insight.investigationFindings, ...state.findings] }
    : undefined;
  const confidence = state.confidence?.score ?? 0;

  let trace: string;
  if (state.error) {
    trace = `Analysis finalized with error: ${state.error}`;
  } else if (insight) {
    trace =
      `Analysis finalized: ${insight.issues.length} issues, ` +
      `${insight.recommendations.length} recommendations, confidence=${formatPercent(confidence, 0)}`;
  } else {
    trace = "Analysis finalized with no results";
  }

  log.info({ thread_id: state.threadId, confidence, has_insight: insight !== undefined }, "Analysis finalized");
  emit(TelemetryEvents.AnalysisFinalized, {
    thread_id: state.threadId,
    outcome: state.error ? "error" : insight ? "insight" : "no_results",
    error_code: state.errorCode ?? null,
    cycles: state.cycleCount,
    findings: state.findings.length,
  });

  return {
    update: {
      insight,
      findings: [],
      phase: "complete",
      errorCode: state.error || insight ? state.errorCode : "no_results",
    },
    trace: [trace],
    event: { type: "finalized" },
  };
}
