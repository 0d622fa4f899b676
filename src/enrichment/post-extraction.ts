/**
 * Post-extraction enrichment
 *
 * After a process has been extracted, two independent model calls run
 * concurrently: a short paragraph on which details would improve the
 * analysis, and a draft analysis for preview. Both read the same metrics
 * and confidence snapshot. Either may fail without failing the other;
 * a failed task leaves its slot empty.
 */

import { randomUUID } from "node:crypto";
import { config, type AnalysisModeT, type LLMProviderT } from "../config/index.js";
import { MODEL_CALL_TIMEOUT_MS } from "../config/timeouts.js";
import { computeProcessMetrics, formatMetricsForLlm, type ProcessMetrics } from "../analysis/metrics.js";
import { scoreConfidence, type ConfidenceResult } from "../analysis/confidence.js";
import type { CallOpts } from "../adapters/llm/types.js";
import { getAnalysisPrompt, getImprovementSuggestionsPrompt, getSystemPrompt } from "../prompts/analysis.js";
import type { ProcessDataT } from "../schemas/process.js";
import { formatConstraintsForLlm, type ConstraintsT } from "../schemas/constraints.js";
import { industryLabel, type BusinessProfileT } from "../schemas/profile.js";
import { AnalysisInsight, linkRecommendations, type AnalysisInsightT } from "../schemas/insight.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { routingOf, type GatewayResolver } from "../orchestrator/stages/types.js";
import { buildTargetedQuestions } from "./targeted-questions.js";

/** Below this confidence a draft would mostly be guesswork */
export const DRAFT_CONFIDENCE_THRESHOLD = 0.5;

export type EnrichmentTask = "suggestions" | "draft";

export interface EnrichmentOptions {
  constraints?: ConstraintsT;
  profile?: BusinessProfileT;
  analysisMode?: AnalysisModeT;
  provider?: LLMProviderT;
  requestId?: string;
  signal?: AbortSignal;
}

export interface EnrichmentResult {
  confidence: ConfidenceResult;
  improvementSuggestions?: string;
  draftInsight?: AnalysisInsightT;
  targetedQuestions: string[];
}

export interface EnricherOptions {
  explanationsEnabled?: boolean;
  timeoutMs?: number;
}

export class PostExtractionEnricher {
  private readonly explanationsEnabled: boolean;
  private readonly timeoutMs: number;

  constructor(
    private readonly gatewayFor: GatewayResolver,
    options: EnricherOptions = {}
  ) {
    this.explanationsEnabled = options.explanationsEnabled ?? config.llm.explanationsEnabled;
    this.timeoutMs = options.timeoutMs ?? MODEL_CALL_TIMEOUT_MS;
  }

  async enrich(process: ProcessDataT, options: EnrichmentOptions = {}): Promise<EnrichmentResult> {
    const confidence = scoreConfidence(process, options.constraints, options.profile);
    const targetedQuestions = buildTargetedQuestions(confidence);

    if (!this.explanationsEnabled) {
      log.debug({ process: process.name }, "Model explanations disabled, skipping enrichment");
      return { confidence, targetedQuestions };
    }

    const metrics = computeProcessMetrics(process);
    const opts: CallOpts = {
      requestId: options.requestId ?? randomUUID(),
      timeoutMs: this.timeoutMs,
      abortSignal: options.signal,
    };

    const [suggestions, draft] = await Promise.allSettled([
      this.timed("suggestions", () => this.suggestions(process, confidence, options, opts)),
      this.timed("draft", () => this.draft(metrics, confidence, options, opts)),
    ]);

    return {
      confidence,
      improvementSuggestions: this.settled("suggestions", suggestions),
      draftInsight: this.settled("draft", draft),
      targetedQuestions,
    };
  }

  private async suggestions(
    process: ProcessDataT,
    confidence: ConfidenceResult,
    options: EnrichmentOptions,
    opts: CallOpts
  ): Promise<string | undefined> {
    const gateway = this.gatewayFor("explanation", routingOf(options));
    const { steps } = process;
    const result = await gateway.invoke(
      {
        system: getSystemPrompt(options.profile),
        user: getImprovementSuggestionsPrompt({
          processName: process.name,
          stepCount: steps.length,
          stepsWithTimes: steps.filter((step) => step.averageTimeHours > 0).length,
          stepsWithCosts: steps.filter((step) => step.costPerInstance > 0).length,
          stepsWithErrors: steps.filter((step) => step.errorRatePct > 0).length,
          stepsWithDependencies: steps.filter((step) => step.dependsOn.length > 0).length,
          confidence: confidence.score,
          dataGaps: confidence.dataGaps,
        }),
      },
      opts
    );
    const text = result.content.trim();
    return text.length > 0 ? text : undefined;
  }

  private async draft(
    metrics: ProcessMetrics,
    confidence: ConfidenceResult,
    options: EnrichmentOptions,
    opts: CallOpts
  ): Promise<AnalysisInsightT | undefined> {
    if (confidence.score < DRAFT_CONFIDENCE_THRESHOLD) {
      log.debug({ confidence: confidence.score }, "Skipping draft analysis: confidence below threshold");
      return undefined;
    }

    const gateway = this.gatewayFor("analysis", routingOf(options));
    const { value } = await gateway.structured(
      {
        system: getSystemPrompt(options.profile),
        user: getAnalysisPrompt({
          metricsText: formatMetricsForLlm(metrics),
          industry: options.profile ? industryLabel(options.profile) : undefined,
          constraintsSummary: options.constraints ? formatConstraintsForLlm(options.constraints) : undefined,
        }),
      },
      AnalysisInsight,
      opts
    );
    return linkRecommendations(value);
  }

  private async timed<T>(task: EnrichmentTask, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    const value = await fn();
    if (value !== undefined) {
      emit(TelemetryEvents.EnrichmentSucceeded, { task, latency_ms: Date.now() - startTime });
    }
    return value;
  }

  private settled<T>(task: EnrichmentTask, outcome: PromiseSettledResult<T | undefined>): T | undefined {
    if (outcome.status === "fulfilled") return outcome.value;

    const error = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
    log.warn({ task, error }, "Post-extraction enrichment failed");
    emit(TelemetryEvents.EnrichmentFailed, { task, error });
    return undefined;
  }
}
