/**
 * Orchestrator working state
 *
 * One AgentState per analysis thread. Stages never mutate it: each returns
 * a StageResult that the orchestrator applies in one step, so a checkpoint
 * always reflects the last completed transition.
 */

import type { AnalysisModeT, LLMProviderT } from "../config/index.js";
import type { ConfidenceResult } from "../analysis/confidence.js";
import type { ProcessMetrics } from "../analysis/metrics.js";
import type { ChatMessage } from "../adapters/llm/types.js";
import type { ProcessDataT } from "../schemas/process.js";
import type { ConstraintsT } from "../schemas/constraints.js";
import type { BusinessProfileT } from "../schemas/profile.js";
import type { AnalysisInsightT } from "../schemas/insight.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { Stage, type StageEvent } from "./machine.js";

export type AnalysisPhase =
  | "initialization"
  | "needs_clarification"
  | "awaiting_input"
  | "analysis"
  | "investigation"
  | "finalization"
  | "complete";

/**
 * Machine-readable failure recorded on the state before Finalize
 */
export type AnalysisErrorCode = "analysis_failed" | "configuration" | "no_results";

export interface AgentState {
  threadId: string;
  stage: Stage;
  phase: AnalysisPhase;

  process: ProcessDataT;
  constraints?: ConstraintsT;
  profile?: BusinessProfileT;
  analysisMode?: AnalysisModeT;
  provider?: LLMProviderT;
  maxCycles: number;

  confidence?: ConfidenceResult;
  needsClarification: boolean;
  clarificationQuestions: string[];
  /** Latest answer to the clarification questions, consumed by CheckContext */
  userResponse?: string;

  metrics?: ProcessMetrics;
  insight?: AnalysisInsightT;

  /** Investigation loop history, in the order the model saw it */
  messages: ChatMessage[];
  cycleCount: number;
  findings: string[];

  reasoningTrace: string[];
  droppedTraceEntries: number;

  error?: string;
  errorCode?: AnalysisErrorCode;
}

/**
 * Fields a stage may set. Stage, trace and thread id are owned by the
 * orchestrator.
 */
export type StateUpdate = Partial<Omit<AgentState, "threadId" | "stage" | "reasoningTrace" | "droppedTraceEntries">>;

export interface StageResult {
  update: StateUpdate;
  trace: string[];
  event: StageEvent;
}

export interface InitialStateInput {
  threadId: string;
  process: ProcessDataT;
  constraints?: ConstraintsT;
  profile?: BusinessProfileT;
  analysisMode?: AnalysisModeT;
  provider?: LLMProviderT;
  maxCycles: number;
}

export function createInitialState(input: InitialStateInput): AgentState {
  return {
    threadId: input.threadId,
    stage: Stage.CheckContext,
    phase: "initialization",
    process: input.process,
    constraints: input.constraints,
    profile: input.profile,
    analysisMode: input.analysisMode,
    provider: input.provider,
    maxCycles: input.maxCycles,
    needsClarification: false,
    clarificationQuestions: [],
    messages: [],
    cycleCount: 0,
    findings: [],
    reasoningTrace: [],
    droppedTraceEntries: 0,
  };
}

export function truncationNote(dropped: number): string {
  return `[${dropped} earlier trace ${dropped === 1 ? "entry" : "entries"} truncated]`;
}

/**
 * Append entries to the reasoning trace, keeping at most `maxEntries`.
 *
 * Entries are dropped from the oldest end and replaced by a single note
 * that counts everything dropped so far.
 */
export function appendTrace(
  state: Pick<AgentState, "threadId" | "reasoningTrace" | "droppedTraceEntries">,
  entries: readonly string[],
  maxEntries: number
): Pick<AgentState, "reasoningTrace" | "droppedTraceEntries"> {
  const hasNote = state.droppedTraceEntries > 0;
  const kept = hasNote ? state.reasoningTrace.slice(1) : state.reasoningTrace;
  const combined = [...kept, ...entries];

  const room = hasNote || combined.length > maxEntries ? maxEntries - 1 : maxEntries;
  if (combined.length <= room) {
    return {
      reasoningTrace: hasNote ? [truncationNote(state.droppedTraceEntries), ...combined] : combined,
      droppedTraceEntries: state.droppedTraceEntries,
    };
  }

  const dropNow = combined.length - room;
  const dropped = state.droppedTraceEntries + dropNow;
  emit(TelemetryEvents.ReasoningTraceTruncated, {
    thread_id: state.threadId,
    dropped_now: dropNow,
    dropped_total: dropped,
  });

  return {
    reasoningTrace: [truncationNote(dropped), ...combined.slice(dropNow)],
    droppedTraceEntries: dropped,
  };
}
