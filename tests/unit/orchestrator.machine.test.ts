/**
 * Analysis state machine
 *
 * Routing decisions only: no stage runs, no model is involved.
 */

import { describe, it, expect } from "vitest";
import {
  InvalidTransitionError,
  POST_INTERACTION_THRESHOLD,
  Stage,
  investigationSkipReason,
  isSuspended,
  shouldExecuteTools,
  transition,
} from "../../src/orchestrator/machine.js";

describe("transition", () => {
  describe("context gate", () => {
    it("goes straight to analysis when context is sufficient", () => {
      expect(transition(Stage.CheckContext, { type: "context_checked", sufficient: true })).toBe(Stage.InitialAnalysis);
    });

    it("asks for clarification when context is insufficient", () => {
      expect(transition(Stage.CheckContext, { type: "context_checked", sufficient: false })).toBe(
        Stage.RequestClarification
      );
      expect(transition(Stage.RequestClarification, { type: "clarification_requested" })).toBe(Stage.AwaitingInput);
    });
  });

  describe("resuming from AwaitingInput", () => {
    it("re-checks context when the user answered", () => {
      expect(transition(Stage.AwaitingInput, { type: "user_input", hasInput: true, confidence: 0.1 })).toBe(
        Stage.CheckContext
      );
    });

    it("analyzes without input once confidence reaches the post-interaction threshold", () => {
      expect(
        transition(Stage.AwaitingInput, { type: "user_input", hasInput: false, confidence: POST_INTERACTION_THRESHOLD })
      ).toBe(Stage.InitialAnalysis);
    });

    it("re-checks context without input below the threshold", () => {
      expect(transition(Stage.AwaitingInput, { type: "user_input", hasInput: false, confidence: 0.39 })).toBe(
        Stage.CheckContext
      );
    });
  });

  describe("after initial analysis", () => {
    it("investigates when there are issues and cycles allowed", () => {
      expect(transition(Stage.InitialAnalysis, { type: "analysis_completed", issueCount: 2, maxCycles: 3 })).toBe(
        Stage.Investigate
      );
    });

    it("finalizes when no issues were found", () => {
      expect(transition(Stage.InitialAnalysis, { type: "analysis_completed", issueCount: 0, maxCycles: 3 })).toBe(
        Stage.Finalize
      );
    });

    it("finalizes when investigation is disabled", () => {
      expect(transition(Stage.InitialAnalysis, { type: "analysis_completed", issueCount: 2, maxCycles: 0 })).toBe(
        Stage.Finalize
      );
    });

    it("finalizes on failure", () => {
      expect(transition(Stage.InitialAnalysis, { type: "analysis_failed" })).toBe(Stage.Finalize);
    });
  });

  describe("investigation loop", () => {
    it("executes tools while under the cycle limit", () => {
      expect(
        transition(Stage.Investigate, { type: "investigation_turn", toolCalls: 1, cycleCount: 1, maxCycles: 2 })
      ).toBe(Stage.ToolExec);
      expect(transition(Stage.ToolExec, { type: "tools_executed" })).toBe(Stage.Investigate);
    });

    it("finalizes when the model requests no tools", () => {
      expect(
        transition(Stage.Investigate, { type: "investigation_turn", toolCalls: 0, cycleCount: 1, maxCycles: 2 })
      ).toBe(Stage.Finalize);
    });

    it("finalizes once the counter reaches the limit", () => {
      expect(
        transition(Stage.Investigate, { type: "investigation_turn", toolCalls: 2, cycleCount: 2, maxCycles: 2 })
      ).toBe(Stage.Finalize);
    });

    it("finalizes when investigation ends early", () => {
      expect(transition(Stage.Investigate, { type: "investigation_ended" })).toBe(Stage.Finalize);
    });
  });

  it("ends at Done after Finalize", () => {
    expect(transition(Stage.Finalize, { type: "finalized" })).toBe(Stage.Done);
  });

  it("routes unexpected stage failures to Finalize, then Done", () => {
    expect(transition(Stage.Investigate, { type: "stage_failed" })).toBe(Stage.Finalize);
    expect(transition(Stage.CheckContext, { type: "stage_failed" })).toBe(Stage.Finalize);
    expect(transition(Stage.Finalize, { type: "stage_failed" })).toBe(Stage.Done);
  });

  it("rejects events the stage does not handle", () => {
    expect(() => transition(Stage.ToolExec, { type: "finalized" })).toThrow(InvalidTransitionError);
    expect(() => transition(Stage.Done, { type: "stage_failed" })).toThrow("No transition from done on stage_failed");
  });
});

describe("shouldExecuteTools", () => {
  it("allows cycles only while the counter is below the limit", () => {
    expect(shouldExecuteTools(1, 1, 2)).toBe(true);
    expect(shouldExecuteTools(1, 2, 2)).toBe(false);
    expect(shouldExecuteTools(1, 1, 1)).toBe(false);
  });

  it("never executes without tool calls", () => {
    expect(shouldExecuteTools(0, 0, 5)).toBe(false);
  });
});

describe("investigationSkipReason", () => {
  it("names why investigation is skipped", () => {
    expect(investigationSkipReason(3, 0)).toBe("investigation disabled (max cycles is 0)");
    expect(investigationSkipReason(0, 5)).toBe("no issues found");
    expect(investigationSkipReason(1, 5)).toBeUndefined();
  });
});

describe("isSuspended", () => {
  it("is true only for AwaitingInput and Done", () => {
    const suspended = Object.values(Stage).filter((stage) => isSuspended(stage));
    expect(suspended).toEqual([Stage.AwaitingInput, Stage.Done]);
  });
});
