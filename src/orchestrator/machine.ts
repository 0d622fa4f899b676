/**
 * Analysis state machine
 *
 * CheckContext → (RequestClarification → AwaitingInput → CheckContext)* →
 * InitialAnalysis → (Investigate → ToolExec)* → Finalize → Done
 *
 * `transition` is pure: stages report what happened as a StageEvent and
 * the routing decision lives here, so it can be tested without any model.
 */

export enum Stage {
  CheckContext = "check_context",
  RequestClarification = "request_clarification",
  AwaitingInput = "awaiting_input",
  InitialAnalysis = "initial_analysis",
  Investigate = "investigate",
  ToolExec = "tool_exec",
  Finalize = "finalize",
  Done = "done",
}

/**
 * Confidence at which a resumed run skips re-checking and analyzes with
 * what it has.
 */
export const POST_INTERACTION_THRESHOLD = 0.4;

export type StageEvent =
  | { type: "context_checked"; sufficient: boolean }
  | { type: "clarification_requested" }
  | { type: "user_input"; hasInput: boolean; confidence: number }
  | { type: "analysis_completed"; issueCount: number; maxCycles: number }
  | { type: "analysis_failed" }
  | { type: "investigation_turn"; toolCalls: number; cycleCount: number; maxCycles: number }
  | { type: "investigation_ended" }
  | { type: "tools_executed" }
  | { type: "finalized" }
  | { type: "stage_failed" };

export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError";

  constructor(
    public readonly stage: Stage,
    public readonly eventType: StageEvent["type"]
  ) {
    super(`No transition from ${stage} on ${eventType}`);
  }
}

/**
 * Why investigation is skipped after initial analysis, or undefined when
 * it runs.
 */
export function investigationSkipReason(issueCount: number, maxCycles: number): string | undefined {
  if (maxCycles === 0) return "investigation disabled (max cycles is 0)";
  if (issueCount === 0) return "no issues found";
  return undefined;
}

/**
 * A turn with tool calls continues the loop while the cycle counter,
 * already incremented for this turn, stays below the limit.
 */
export function shouldExecuteTools(toolCalls: number, cycleCount: number, maxCycles: number): boolean {
  return toolCalls > 0 && cycleCount < maxCycles;
}

export function transition(stage: Stage, event: StageEvent): Stage {
  // An unexpected stage failure still ends in Finalize
  if (event.type === "stage_failed" && stage !== Stage.Done) {
    return stage === Stage.Finalize ? Stage.Done : Stage.Finalize;
  }

  switch (stage) {
    case Stage.CheckContext:
      if (event.type === "context_checked") {
        return event.sufficient ? Stage.InitialAnalysis : Stage.RequestClarification;
      }
      break;

    case Stage.RequestClarification:
      if (event.type === "clarification_requested") return Stage.AwaitingInput;
      break;

    case Stage.AwaitingInput:
      if (event.type === "user_input") {
        if (event.hasInput) return Stage.CheckContext;
        return event.confidence >= POST_INTERACTION_THRESHOLD ? Stage.InitialAnalysis : Stage.CheckContext;
      }
      break;

    case Stage.InitialAnalysis:
      if (event.type === "analysis_failed") return Stage.Finalize;
      if (event.type === "analysis_completed") {
        return investigationSkipReason(event.issueCount, event.maxCycles) === undefined
          ? Stage.Investigate
          : Stage.Finalize;
      }
      break;

    case Stage.Investigate:
      if (event.type === "investigation_ended") return Stage.Finalize;
      if (event.type === "investigation_turn") {
        return shouldExecuteTools(event.toolCalls, event.cycleCount, event.maxCycles) ? Stage.ToolExec : Stage.Finalize;
      }
      break;

    case Stage.ToolExec:
      if (event.type === "tools_executed") return Stage.Investigate;
      break;

    case Stage.Finalize:
      if (event.type === "finalized") return Stage.Done;
      break;

    case Stage.Done:
      break;
  }

  throw new InvalidTransitionError(stage, event.type);
}

/**
 * Stages at which a run stops and returns to the caller.
 */
export function isSuspended(stage: Stage): boolean {
  return stage === Stage.AwaitingInput || stage === Stage.Done;
}
