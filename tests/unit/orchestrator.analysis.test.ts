/**
 * Orchestrator runs end to end against scripted gateways
 */

import { describe, it, expect } from "vitest";
import { AnalysisOrchestrator, InMemoryCheckpointStore, Stage } from "../../src/orchestrator/index.js";
import {
  CANCELLED_MESSAGE,
  CLARIFICATION_MESSAGE,
  EMPTY_INPUT_MESSAGE,
  NOT_AWAITING_INPUT_MESSAGE,
  THREAD_NOT_FOUND_MESSAGE,
} from "../../src/orchestrator/orchestrator.js";
import { ANALYSIS_FAILED_MESSAGE } from "../../src/orchestrator/stages/initial-analysis.js";
import { dispatchTool } from "../../src/orchestrator/tools/dispatch.js";
import { computeProcessMetrics } from "../../src/analysis/metrics.js";
import { AnalysisInsight } from "../../src/schemas/insight.js";
import { DataInvariantError } from "../../src/utils/errors.js";
import { FakeGateway, fakeResolver, textBlock, toolUse, type GatewayScript } from "../helpers/fake-gateway.js";
import { approvalInsight, expenseClaims, invoiceApproval, tightConstraints } from "../helpers/process-fixtures.js";

function setup(script: GatewayScript, maxCycles = 3) {
  const gateway = new FakeGateway(script);
  const resolver = fakeResolver({ analysis: gateway });
  const checkpoints = new InMemoryCheckpointStore();
  const orchestrator = new AnalysisOrchestrator(resolver.gatewayFor, checkpoints, {
    confidenceThreshold: 0.6,
    maxCycles,
    maxTraceEntries: 200,
    explanationsEnabled: true,
    timeoutMs: 5_000,
  });
  return { gateway, resolver, checkpoints, orchestrator };
}

const percent = (score: number | undefined, digits: number) => `${((score ?? 0) * 100).toFixed(digits)}%`;

const DEPENDENCY_QUESTION = { step_name: "Manager review", question: "Does review block payment?" };

describe("AnalysisOrchestrator.analyze", () => {
  it("runs context check, analysis, one investigation cycle and finalization", async () => {
    const { orchestrator, gateway, resolver } = setup({
      structured: [approvalInsight()],
      tools: [
        [textBlock("Checking the review dependency."), toolUse("t1", "analyze_dependency_impact", DEPENDENCY_QUESTION)],
        [textBlock("Confirmed: review gates payment.")],
      ],
    });

    const response = await orchestrator.analyze({
      process: invoiceApproval(),
      constraints: tightConstraints(),
      threadId: "thread-a",
      provider: "openai",
    });

    const score = response.confidence?.score;
    expect(response.confidence?.level).toBe("high");
    expect(response.reasoningTrace).toEqual([
      `Context check: confidence=${percent(score, 1)} (high)`,
      "Model analysis: 1 issues identified, 1 recommendations, 1 steps identified as core value (not waste)",
      "Investigation cycle 1: requested analyze_dependency_impact",
      "Executed 1 tool calls: analyze_dependency_impact",
      "Investigation complete after 1 cycle",
      `Analysis finalized: 1 issues, 1 recommendations, confidence=${percent(score, 0)}`,
    ]);

    expect(response.message).toBe("Analysis complete. Found 1 significant issue, 1 recommendation, 1 area that looks fine.");
    expect(response.threadId).toBe("thread-a");
    expect(response.phase).toBe("complete");
    expect(response.needsInput).toBe(false);
    expect(response.isError).toBe(false);
    expect(response.suggestedQuestions).toEqual(["What share of invoices is under $500?"]);
    expect(response.insight?.recommendations[0]?.addressesIssue).toBe("Slow approvals");

    const expectedFinding = dispatchTool("analyze_dependency_impact", DEPENDENCY_QUESTION, {
      metrics: computeProcessMetrics(invoiceApproval()),
      insight: AnalysisInsight.parse(approvalInsight()),
      constraints: tightConstraints(),
    }).output;
    expect(response.insight?.investigationFindings).toEqual([expectedFinding]);

    expect(gateway.toolCalls).toHaveLength(2);
    expect(gateway.toolCalls[1]?.messages).toHaveLength(3);
    expect(gateway.toolCalls[1]?.messages[2]).toEqual({
      role: "user",
      content: [{ type: "tool_result", tool_use_id: "t1", content: expectedFinding }],
    });
    expect(resolver.calls.map((call) => call.task)).toEqual(["analysis", "analysis", "analysis"]);
    expect(resolver.calls[0]?.routing).toEqual({ analysisMode: undefined, provider: "openai" });
  });

  it("checkpoints the finished thread", async () => {
    const { orchestrator } = setup({ structured: [approvalInsight({ issues: [] })] });
    await orchestrator.analyze({ process: invoiceApproval(), constraints: tightConstraints(), threadId: "thread-b" });

    const saved = await orchestrator.getThreadState("thread-b");
    expect(saved?.stage).toBe(Stage.Done);
    expect(saved?.phase).toBe("complete");
    expect(saved?.reasoningTrace[2]).toBe("Investigation skipped: no issues found");
  });

  it("generates a thread id when none is given", async () => {
    const { orchestrator } = setup({ structured: [approvalInsight({ issues: [] })] });
    const response = await orchestrator.analyze({ process: invoiceApproval(), constraints: tightConstraints() });
    expect(response.threadId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("skips investigation when max cycles is 0", async () => {
    const { orchestrator, gateway } = setup({ structured: [approvalInsight()] });
    const response = await orchestrator.analyze({
      process: invoiceApproval(),
      constraints: tightConstraints(),
      maxCycles: 0,
    });

    expect(gateway.toolCalls).toHaveLength(0);
    expect(response.reasoningTrace[2]).toBe("Investigation skipped: investigation disabled (max cycles is 0)");
    expect(response.insight?.investigationFindings).toEqual([]);
  });

  it("stops investigating when the counter reaches the limit", async () => {
    const { orchestrator, gateway } = setup(
      {
        structured: [approvalInsight()],
        tools: [
          [toolUse("t1", "analyze_dependency_impact", DEPENDENCY_QUESTION)],
          [toolUse("t2", "validate_root_cause", { hypothesis: "One approver" })],
        ],
      },
      2
    );

    const response = await orchestrator.analyze({
      process: invoiceApproval(),
      constraints: tightConstraints(),
      threadId: "thread-limit",
    });

    expect(gateway.toolCalls).toHaveLength(2);
    expect(response.reasoningTrace.slice(2, 5)).toEqual([
      "Investigation cycle 1: requested analyze_dependency_impact",
      "Executed 1 tool calls: analyze_dependency_impact",
      "Investigation stopped at cycle limit (2)",
    ]);
    expect(response.insight?.investigationFindings).toHaveLength(1);

    const saved = await orchestrator.getThreadState("thread-limit");
    expect(saved?.cycleCount).toBe(2);
    expect(saved?.messages).toHaveLength(3);
    expect(saved?.messages[2]?.role).toBe("user");
  });

  it("runs no tool round when the limit is 1", async () => {
    const { orchestrator, gateway } = setup(
      {
        structured: [approvalInsight()],
        tools: [[toolUse("t1", "analyze_dependency_impact", DEPENDENCY_QUESTION)]],
      },
      1
    );

    const response = await orchestrator.analyze({ process: invoiceApproval(), constraints: tightConstraints() });

    expect(gateway.toolCalls).toHaveLength(1);
    expect(response.reasoningTrace[2]).toBe("Investigation stopped at cycle limit (1)");
    expect(response.insight?.investigationFindings).toEqual([]);
  });

  it("reports an analysis failure after one retry", async () => {
    const malformed = { processSummary: 42 };
    const { orchestrator, gateway } = setup({ structured: [malformed, malformed] });

    const response = await orchestrator.analyze({ process: invoiceApproval(), constraints: tightConstraints() });

    expect(gateway.structuredCalls).toHaveLength(2);
    expect(response.isError).toBe(true);
    expect(response.errorCode).toBe("analysis_failed");
    expect(response.message).toBe(ANALYSIS_FAILED_MESSAGE);
    expect(response.reasoningTrace.slice(1)).toEqual([
      "Model analysis failed",
      `Analysis finalized with error: ${ANALYSIS_FAILED_MESSAGE}`,
    ]);
  });

  it("rejects a process with duplicate step names", async () => {
    const { orchestrator } = setup({});
    const process = invoiceApproval();
    const duplicated = { ...process, steps: [...process.steps, ...process.steps.slice(0, 1)] };

    await expect(orchestrator.analyze({ process: duplicated })).rejects.toBeInstanceOf(DataInvariantError);
  });

  it("stops at the last checkpoint when cancelled", async () => {
    const { orchestrator, gateway } = setup({ structured: [approvalInsight()] });
    const controller = new AbortController();
    controller.abort();

    const response = await orchestrator.analyze(
      { process: invoiceApproval(), constraints: tightConstraints(), threadId: "thread-c" },
      { signal: controller.signal }
    );

    expect(response.isError).toBe(true);
    expect(response.errorCode).toBe("cancelled");
    expect(response.message).toBe(CANCELLED_MESSAGE);
    expect(gateway.structuredCalls).toHaveLength(0);
    expect((await orchestrator.getThreadState("thread-c"))?.stage).toBe(Stage.CheckContext);
  });
});

describe("clarification loop", () => {
  const QUESTIONS = "1. What does each claim cost to process?\n2. How often are claims sent back?";

  it("asks for clarification when confidence is low", async () => {
    const { orchestrator, gateway, resolver } = setup({ invoke: [QUESTIONS] });

    const response = await orchestrator.analyze({ process: expenseClaims(), threadId: "thread-d" });

    expect(response.message).toBe(CLARIFICATION_MESSAGE);
    expect(response.needsInput).toBe(true);
    expect(response.phase).toBe("awaiting_input");
    expect(response.isError).toBe(false);
    expect(response.suggestedQuestions).toEqual([
      "What does each claim cost to process?",
      "How often are claims sent back?",
    ]);
    expect(response.reasoningTrace).toEqual([
      "Context check: confidence=49.5% (low), identified 5 critical gaps",
      "Requesting clarification: 2 questions (model generated)",
    ]);
    expect(gateway.structuredCalls).toHaveLength(0);
    expect(resolver.calls.map((call) => call.task)).toEqual(["clarification"]);
  });

  it("re-checks context after the user answers", async () => {
    const { orchestrator } = setup({ invoke: [QUESTIONS, QUESTIONS] });
    await orchestrator.analyze({ process: expenseClaims(), threadId: "thread-e" });

    const response = await orchestrator.continueConversation("thread-e", "  About 200 claims a month  ");

    const saved = await orchestrator.getThreadState("thread-e");
    expect(saved?.profile?.notes).toBe("About 200 claims a month");
    expect(saved?.userResponse).toBeUndefined();
    expect(response.reasoningTrace.slice(2)).toEqual([
      "User responded to clarification",
      `Context check: confidence=${percent(response.confidence?.score, 1)} (low), identified 5 critical gaps`,
      "Requesting clarification: 2 questions (model generated)",
    ]);
    expect(response.needsInput).toBe(true);
  });

  it("analyzes with what it has when the user proceeds", async () => {
    const { orchestrator } = setup({ invoke: [QUESTIONS], structured: [approvalInsight({ issues: [] })] });
    await orchestrator.analyze({ process: expenseClaims(), threadId: "thread-f" });

    const response = await orchestrator.proceed("thread-f");

    expect(response.reasoningTrace.slice(2)).toEqual([
      "Proceeding without further input (confidence=49.5%)",
      "Model analysis: 0 issues identified, 1 recommendations, 1 steps identified as core value (not waste)",
      "Investigation skipped: no issues found",
      `Analysis finalized: 0 issues, 1 recommendations, confidence=${percent(response.confidence?.score, 0)}`,
    ]);
    expect(response.phase).toBe("complete");
    expect(response.message).toBe("Analysis complete. Found 1 recommendation, 1 area that looks fine.");
  });

  it("re-runs a finished analysis with the new context", async () => {
    const { orchestrator } = setup({
      structured: [approvalInsight({ issues: [] }), approvalInsight({ issues: [] })],
    });
    await orchestrator.analyze({ process: invoiceApproval(), constraints: tightConstraints(), threadId: "thread-g" });

    const response = await orchestrator.continueConversation("thread-g", "Invoices under $500 are 80% of volume");

    expect(response.isError).toBe(false);
    expect(response.reasoningTrace[4]).toBe("Re-running analysis with new user context");
    expect(response.reasoningTrace).toHaveLength(9);
    expect(response.phase).toBe("complete");
    expect((await orchestrator.getThreadState("thread-g"))?.profile?.notes).toBe("Invoices under $500 are 80% of volume");
  });
});

describe("resume errors", () => {
  it("rejects an empty reply", async () => {
    const { orchestrator } = setup({});
    const response = await orchestrator.continueConversation("thread-h", "   ");

    expect(response).toEqual({
      message: EMPTY_INPUT_MESSAGE,
      threadId: "thread-h",
      phase: "awaiting_input",
      needsInput: true,
      suggestedQuestions: [],
      reasoningTrace: [],
      isError: true,
      errorCode: "empty_input",
    });
  });

  it("reports an unknown thread", async () => {
    const { orchestrator } = setup({});

    const continued = await orchestrator.continueConversation("missing", "hello");
    const proceeded = await orchestrator.proceed("missing");

    expect(continued.errorCode).toBe("thread_not_found");
    expect(continued.message).toBe(THREAD_NOT_FOUND_MESSAGE);
    expect(proceeded.errorCode).toBe("thread_not_found");
  });

  it("refuses to proceed a thread that is not waiting", async () => {
    const { orchestrator } = setup({ structured: [approvalInsight({ issues: [] })] });
    await orchestrator.analyze({ process: invoiceApproval(), constraints: tightConstraints(), threadId: "thread-i" });

    const response = await orchestrator.proceed("thread-i");

    expect(response.isError).toBe(true);
    expect(response.errorCode).toBe("not_awaiting_input");
    expect(response.message).toBe(NOT_AWAITING_INPUT_MESSAGE);
    expect(response.phase).toBe("complete");
  });
});
