/**
 * Initial analysis stage
 *
 * Metrics are computed here (facts); one structured model call turns them
 * into issues, recommendations and not-problems (judgment). The call is
 * retried once on a transient failure; a second failure ends the run with
 * a user-facing error.
 */

import { computeProcessMetrics, formatMetricsForLlm } from "../../analysis/metrics.js";
import { ConfigurationError, ModelTransientError } from "../../adapters/llm/errors.js";
import { getAnalysisPrompt, getSystemPrompt, buildInvestigationSeed } from "../../prompts/analysis.js";
import { formatConstraintsForLlm } from "../../schemas/constraints.js";
import { industryLabel } from "../../schemas/profile.js";
import { AnalysisInsight, linkRecommendations } from "../../schemas/insight.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { MODEL_TRANSIENT_RETRY_CONFIG, withRetry } from "../../utils/retry.js";
import { investigationSkipReason } from "../machine.js";
import type { AgentState, StageResult } from "../state.js";
import { errorMessage, routingOf, type StageDeps } from "./types.js";

export const ANALYSIS_FAILED_MESSAGE = "Analysis failed. Please try again.";

export async function initialAnalysis(state: AgentState, deps: StageDeps): Promise<StageResult> {
  const metrics = computeProcessMetrics(state.process);

  log.debug(
    {
      thread_id: state.threadId,
      steps: metrics.stepCount,
      total_hours: metrics.totalTimeHours,
      reviews: metrics.patterns.reviewStepCount,
      external: metrics.patterns.externalTouchpoints,
    },
    "Metrics calculated"
  );

  if (!deps.explanationsEnabled) {
    return {
      update: { metrics, insight: undefined, phase: "finalization" },
      trace: ["Model analysis skipped (model explanations disabled)"],
      event: { type: "analysis_completed", issueCount: 0, maxCycles: state.maxCycles },
    };
  }

  const startTime = Date.now();
  let provider = state.provider ?? "unknown";

  try {
    const gateway = deps.gatewayFor("analysis", routingOf(state));
    provider = gateway.name;

    emit(TelemetryEvents.AnalysisStarted, {
      thread_id: state.threadId,
      provider: gateway.name,
      model: gateway.model,
      step_count: metrics.stepCount,
    });

    const args = {
      system: getSystemPrompt(state.profile),
      user: getAnalysisPrompt({
        metricsText: formatMetricsForLlm(metrics),
        industry: state.profile ? industryLabel(state.profile) : undefined,
        constraintsSummary: state.constraints ? formatConstraintsForLlm(state.constraints) : undefined,
      }),
    };

    const result = await withRetry(
      () => gateway.structured(args, AnalysisInsight, deps.callOpts),
      { provider: gateway.name, model: gateway.model, operation: "initial_analysis" },
      MODEL_TRANSIENT_RETRY_CONFIG
    );
    const insight = linkRecommendations(result.value);

    emit(TelemetryEvents.AnalysisSucceeded, {
      thread_id: state.threadId,
      provider: gateway.name,
      latency_ms: Date.now() - startTime,
      issue_count: insight.issues.length,
      recommendation_count: insight.recommendations.length,
    });

    const trace = [
      `Model analysis: ${insight.issues.length} issues identified, ` +
        `${insight.recommendations.length} recommendations, ` +
        `${insight.notProblems.length} steps identified as core value (not waste)`,
    ];

    const skipReason = investigationSkipReason(insight.issues.length, state.maxCycles);
    if (skipReason) {
      trace.push(`Investigation skipped: ${skipReason}`);
      emit(TelemetryEvents.InvestigationSkipped, { thread_id: state.threadId, reason: skipReason });
    }

    return {
      update: {
        metrics,
        insight,
        messages: skipReason ? [] : [{ role: "user", content: buildInvestigationSeed(insight.issues) }],
        cycleCount: 0,
        findings: [],
        phase: skipReason ? "finalization" : "investigation",
      },
      trace,
      event: { type: "analysis_completed", issueCount: insight.issues.length, maxCycles: state.maxCycles },
    };
  } catch (error) {
    const kind =
      error instanceof ModelTransientError ? error.kind : error instanceof ConfigurationError ? "configuration" : "unknown";
    emit(TelemetryEvents.AnalysisFailed, {
      thread_id: state.threadId,
      provider,
      kind,
      latency_ms: Date.now() - startTime,
    });

    if (error instanceof ConfigurationError) {
      log.error({ thread_id: state.threadId, config_key: error.configKey }, "Analysis model is not configured");
      return {
        update: { metrics, insight: undefined, error: error.userMessage, errorCode: "configuration", phase: "finalization" },
        trace: [`Model analysis failed: configuration error (${error.configKey ?? "unknown"})`],
        event: { type: "analysis_failed" },
      };
    }

    log.warn({ thread_id: state.threadId, error: errorMessage(error), kind }, "Model analysis failed");
    return {
      update: { metrics, insight: undefined, error: ANALYSIS_FAILED_MESSAGE, errorCode: "analysis_failed", phase: "finalization" },
      trace: ["Model analysis failed"],
      event: { type: "analysis_failed" },
    };
  }
}
