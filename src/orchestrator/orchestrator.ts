/**
 * Analysis Orchestrator
 *
 * Runs the stage machine for one thread until it completes or needs user
 * input. Processing flow per step:
 * 1. Run the current stage against the last checkpointed state
 * 2. Apply its update, trace lines and transition in one step
 * 3. Checkpoint
 *
 * Stage failures end in Finalize with an error string; callers always get
 * an AnalysisResponse. A cancelled run stops at the last checkpoint.
 */

import { randomUUID } from "node:crypto";
import { config, type AnalysisModeT, type LLMProviderT } from "../config/index.js";
import { MODEL_CALL_TIMEOUT_MS } from "../config/timeouts.js";
import type { ConfidenceResult } from "../analysis/confidence.js";
import type { CallOpts } from "../adapters/llm/types.js";
import { assertProcessInvariants, type ProcessDataT } from "../schemas/process.js";
import type { ConstraintsT } from "../schemas/constraints.js";
import { withAppendedNotes, type BusinessProfileT } from "../schemas/profile.js";
import { summarizeInsight, type AnalysisInsightT } from "../schemas/insight.js";
import { log } from "../utils/telemetry.js";
import { isSuspended, Stage, transition } from "./machine.js";
import {
  appendTrace,
  createInitialState,
  type AgentState,
  type AnalysisPhase,
  type StageResult,
} from "./state.js";
import type { CheckpointStore } from "./checkpoint.js";
import { checkContext } from "./stages/check-context.js";
import { requestClarification } from "./stages/request-clarification.js";
import { initialAnalysis } from "./stages/initial-analysis.js";
import { investigate } from "./stages/investigate.js";
import { toolExec } from "./stages/tool-exec.js";
import { finalize } from "./stages/finalize.js";
import { errorMessage, formatPercent, type GatewayResolver, type StageDeps } from "./stages/types.js";

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorOptions {
  confidenceThreshold?: number;
  maxCycles?: number;
  maxTraceEntries?: number;
  explanationsEnabled?: boolean;
  /** Per model call */
  timeoutMs?: number;
}

export interface AnalyzeInput {
  process: ProcessDataT;
  constraints?: ConstraintsT;
  profile?: BusinessProfileT;
  threadId?: string;
  analysisMode?: AnalysisModeT;
  provider?: LLMProviderT;
  /** 0 disables investigation */
  maxCycles?: number;
}

export interface RunOptions {
  requestId?: string;
  signal?: AbortSignal;
}

export type ResponseErrorCode =
  | "analysis_failed"
  | "configuration"
  | "no_results"
  | "empty_input"
  | "thread_not_found"
  | "not_awaiting_input"
  | "cancelled";

export interface AnalysisResponse {
  message: string;
  threadId: string;
  phase: AnalysisPhase;
  needsInput: boolean;
  suggestedQuestions: string[];
  confidence?: ConfidenceResult;
  insight?: AnalysisInsightT;
  reasoningTrace: string[];
  isError: boolean;
  errorCode?: ResponseErrorCode;
}

export const CLARIFICATION_MESSAGE = "I need a bit more information to provide better recommendations.";
export const NO_RESULTS_MESSAGE =
  "Analysis completed but could not generate recommendations. This may indicate insufficient data.";
export const EMPTY_INPUT_MESSAGE = "I didn't receive any input. Please answer the questions above or describe what changed.";
export const THREAD_NOT_FOUND_MESSAGE = "No saved analysis was found for this conversation. Start a new analysis.";
export const NOT_AWAITING_INPUT_MESSAGE = "This conversation is not waiting for more information.";
export const CANCELLED_MESSAGE = "The analysis was cancelled before it finished.";
const UNEXPECTED_FAILURE_MESSAGE = "Analysis failed unexpectedly. Please try again.";

// ============================================================================
// Orchestrator
// ============================================================================

export class AnalysisOrchestrator {
  private readonly confidenceThreshold: number;
  private readonly maxCycles: number;
  private readonly maxTraceEntries: number;
  private readonly explanationsEnabled: boolean;
  private readonly timeoutMs: number;

  constructor(
    private readonly gatewayFor: GatewayResolver,
    private readonly checkpoints: CheckpointStore,
    options: OrchestratorOptions = {}
  ) {
    this.confidenceThreshold = options.confidenceThreshold ?? config.analysis.confidenceThreshold;
    this.maxCycles = options.maxCycles ?? config.analysis.maxCycles;
    this.maxTraceEntries = options.maxTraceEntries ?? config.analysis.maxTraceEntries;
    this.explanationsEnabled = options.explanationsEnabled ?? config.llm.explanationsEnabled;
    this.timeoutMs = options.timeoutMs ?? MODEL_CALL_TIMEOUT_MS;
  }

  /**
   * Start a new analysis run (or restart `threadId` from scratch).
   *
   * @throws DataInvariantError when the process has no steps or duplicate step names
   */
  async analyze(input: AnalyzeInput, run: RunOptions = {}): Promise<AnalysisResponse> {
    assertProcessInvariants(input.process);

    const threadId = input.threadId ?? randomUUID();
    const state = createInitialState({
      threadId,
      process: input.process,
      constraints: input.constraints,
      profile: input.profile,
      analysisMode: input.analysisMode,
      provider: input.provider,
      maxCycles: input.maxCycles ?? this.maxCycles,
    });

    log.info({ thread_id: threadId, process: input.process.name, steps: input.process.steps.length }, "Starting analysis");
    await this.checkpoints.put(threadId, state);
    return this.run(state, run);
  }

  /**
   * Resume a thread with the user's reply. The reply is added to the
   * profile notes; a thread waiting on clarification re-checks context,
   * any other thread re-runs the analysis from the start.
   */
  async continueConversation(threadId: string, userMessage: string, run: RunOptions = {}): Promise<AnalysisResponse> {
    const message = userMessage.trim();
    if (!message) {
      return errorResponse(threadId, "awaiting_input", "empty_input", EMPTY_INPUT_MESSAGE, true);
    }

    const saved = await this.checkpoints.get(threadId);
    if (!saved) {
      return errorResponse(threadId, "initialization", "thread_not_found", THREAD_NOT_FOUND_MESSAGE, false);
    }

    const profile = withAppendedNotes(saved.profile, message);

    if (saved.stage === Stage.AwaitingInput) {
      const resumed = this.apply(
        { ...saved, profile, userResponse: message },
        {
          update: {},
          trace: ["User responded to clarification"],
          event: { type: "user_input", hasInput: true, confidence: saved.confidence?.score ?? 0 },
        }
      );
      await this.checkpoints.put(threadId, resumed);
      return this.run(resumed, run);
    }

    const restarted = createInitialState({
      threadId,
      process: saved.process,
      constraints: saved.constraints,
      profile,
      analysisMode: saved.analysisMode,
      provider: saved.provider,
      maxCycles: saved.maxCycles,
    });
    const withTrace: AgentState = {
      ...restarted,
      userResponse: message,
      ...appendTrace(saved, ["Re-running analysis with new user context"], this.maxTraceEntries),
    };
    await this.checkpoints.put(threadId, withTrace);
    return this.run(withTrace, run);
  }

  /**
   * Continue a thread waiting on clarification without new input. Analysis
   * starts if confidence has reached the post-interaction threshold,
   * otherwise the questions are asked again.
   */
  async proceed(threadId: string, run: RunOptions = {}): Promise<AnalysisResponse> {
    const saved = await this.checkpoints.get(threadId);
    if (!saved) {
      return errorResponse(threadId, "initialization", "thread_not_found", THREAD_NOT_FOUND_MESSAGE, false);
    }
    if (saved.stage !== Stage.AwaitingInput) {
      return { ...toResponse(saved), isError: true, errorCode: "not_awaiting_input", message: NOT_AWAITING_INPUT_MESSAGE };
    }

    const confidence = saved.confidence?.score ?? 0;
    const resumed = this.apply(saved, {
      update: {},
      trace: [`Proceeding without further input (confidence=${formatPercent(confidence, 1)})`],
      event: { type: "user_input", hasInput: false, confidence },
    });
    await this.checkpoints.put(threadId, resumed);
    return this.run(resumed, run);
  }

  async getThreadState(threadId: string): Promise<AgentState | undefined> {
    return this.checkpoints.get(threadId);
  }

  // ==========================================================================
  // Run loop
  // ==========================================================================

  private async run(initial: AgentState, run: RunOptions): Promise<AnalysisResponse> {
    const deps: StageDeps = {
      gatewayFor: this.gatewayFor,
      callOpts: this.callOpts(run),
      confidenceThreshold: this.confidenceThreshold,
      explanationsEnabled: this.explanationsEnabled,
    };

    let state = initial;
    while (!isSuspended(state.stage)) {
      if (run.signal?.aborted) {
        return this.cancelled(state);
      }

      const result = await this.runStage(state, deps);

      // Results of a stage that outlived cancellation are discarded
      if (run.signal?.aborted) {
        return this.cancelled(state);
      }

      const next = this.apply(state, result);
      log.debug({ thread_id: state.threadId, from: state.stage, to: next.stage, event: result.event.type }, "Stage complete");
      await this.checkpoints.put(next.threadId, next);
      state = next;
    }

    return toResponse(state);
  }

  private async runStage(state: AgentState, deps: StageDeps): Promise<StageResult> {
    try {
      switch (state.stage) {
        case Stage.CheckContext:
          return checkContext(state, deps);
        case Stage.RequestClarification:
          return await requestClarification(state, deps);
        case Stage.InitialAnalysis:
          return await initialAnalysis(state, deps);
        case Stage.Investigate:
          return await investigate(state, deps);
        case Stage.ToolExec:
          return toolExec(state);
        case Stage.Finalize:
          return finalize(state);
        case Stage.AwaitingInput:
        case Stage.Done:
          throw new Error(`Stage ${state.stage} does not run`);
      }
    } catch (error) {
      log.error({ thread_id: state.threadId, stage: state.stage, error }, "Stage failed unexpectedly");
      return {
        update: { error: state.error ?? UNEXPECTED_FAILURE_MESSAGE, errorCode: state.errorCode ?? "analysis_failed", phase: "finalization" },
        trace: [`Stage ${state.stage} failed: ${errorMessage(error)}`],
        event: { type: "stage_failed" },
      };
    }
  }

  private apply(state: AgentState, result: StageResult): AgentState {
    const stage = transition(state.stage, result.event);
    return {
      ...state,
      ...result.update,
      ...appendTrace(state, result.trace, this.maxTraceEntries),
      stage,
    };
  }

  private callOpts(run: RunOptions): CallOpts {
    return {
      requestId: run.requestId ?? randomUUID(),
      timeoutMs: this.timeoutMs,
      abortSignal: run.signal,
    };
  }

  private cancelled(state: AgentState): AnalysisResponse {
    log.info({ thread_id: state.threadId, stage: state.stage }, "Analysis cancelled");
    return { ...toResponse(state), isError: true, errorCode: "cancelled", message: CANCELLED_MESSAGE };
  }
}

// ============================================================================
// Responses
// ============================================================================

function errorResponse(
  threadId: string,
  phase: AnalysisPhase,
  errorCode: ResponseErrorCode,
  message: string,
  needsInput: boolean
): AnalysisResponse {
  return {
    message,
    threadId,
    phase,
    needsInput,
    suggestedQuestions: [],
    reasoningTrace: [],
    isError: true,
    errorCode,
  };
}

/**
 * Caller-facing view of a suspended (or cancelled) run.
 */
export function toResponse(state: AgentState): AnalysisResponse {
  const base = {
    threadId: state.threadId,
    phase: state.phase,
    confidence: state.confidence,
    reasoningTrace: state.reasoningTrace,
  };

  if (state.stage === Stage.AwaitingInput) {
    return {
      ...base,
      message: CLARIFICATION_MESSAGE,
      needsInput: true,
      suggestedQuestions: state.clarificationQuestions,
      isError: false,
    };
  }

  if (state.error) {
    return {
      ...base,
      message: state.error,
      needsInput: false,
      suggestedQuestions: [],
      insight: state.insight,
      isError: true,
      errorCode: state.errorCode ?? "analysis_failed",
    };
  }

  if (state.insight) {
    return {
      ...base,
      message: summarizeInsight(state.insight),
      needsInput: false,
      suggestedQuestions: state.insight.followUpQuestions,
      insight: state.insight,
      isError: false,
    };
  }

  return {
    ...base,
    message: NO_RESULTS_MESSAGE,
    needsInput: false,
    suggestedQuestions: [],
    isError: true,
    errorCode: "no_results",
  };
}
