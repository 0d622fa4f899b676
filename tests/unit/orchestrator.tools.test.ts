/**
 * Investigation tools
 *
 * Handlers read the computed metrics only; outputs are exact strings
 * shown to the model.
 */

import { describe, it, expect } from "vitest";
import { computeProcessMetrics } from "../../src/analysis/metrics.js";
import { AnalysisInsight } from "../../src/schemas/insight.js";
import { Constraints } from "../../src/schemas/constraints.js";
import { dispatchTool } from "../../src/orchestrator/tools/dispatch.js";
import { getToolDefinitions, isInvestigationTool } from "../../src/orchestrator/tools/registry.js";
import type { ToolContext } from "../../src/orchestrator/tools/types.js";
import { approvalInsight, invoiceApproval, tightConstraints } from "../helpers/process-fixtures.js";

const metrics = computeProcessMetrics(invoiceApproval());
const insight = AnalysisInsight.parse(approvalInsight());

describe("registry", () => {
  it("exposes the three investigation tools", () => {
    expect(getToolDefinitions().map((tool) => tool.name)).toEqual([
      "analyze_dependency_impact",
      "validate_root_cause",
      "check_constraint_feasibility",
    ]);
  });

  it("recognizes only registered names", () => {
    expect(isInvestigationTool("validate_root_cause")).toBe(true);
    expect(isInvestigationTool("run_sql")).toBe(false);
  });
});

describe("analyze_dependency_impact", () => {
  const ctx: ToolContext = { metrics };

  it("reports step metrics, reach and flags (case-insensitive lookup)", () => {
    const result = dispatchTool(
      "analyze_dependency_impact",
      { step_name: "manager REVIEW", question: "Is it the bottleneck?" },
      ctx
    );

    expect(result.ok).toBe(true);
    expect(result.output).toBe(
      [
        "Step 'Manager review':",
        "  Time: 4.0h (67% of total)",
        "  Cost: $120 (60% of total)",
        "  Error rate: 10%",
        "  Resources: 1",
        "  Type: review",
        "  Downstream steps blocked by this: 1",
        "  Upstream dependencies: 1",
        "  Question being investigated: Is it the bottleneck?",
        "  Flag: longest step in process",
        "  Flag: most expensive step in process",
        "  Flag: highest error rate in process",
      ].join("\n")
    );
  });

  it("omits the question line and flags when they do not apply", () => {
    const result = dispatchTool("analyze_dependency_impact", { step_name: "Receive invoice" }, ctx);

    expect(result.output).toBe(
      [
        "Step 'Receive invoice':",
        "  Time: 1.0h (17% of total)",
        "  Cost: $20 (10% of total)",
        "  Error rate: 1%",
        "  Resources: 1",
        "  Type: administrative",
        "  Downstream steps blocked by this: 2",
        "  Upstream dependencies: 0",
      ].join("\n")
    );
  });

  it("reports unknown steps as output, not failure", () => {
    expect(dispatchTool("analyze_dependency_impact", { step_name: "Archive" }, ctx)).toEqual({
      output: "Step 'Archive' not found in process data.",
      ok: true,
    });
  });
});

describe("validate_root_cause", () => {
  it("shows data for the issue's affected steps", () => {
    const result = dispatchTool(
      "validate_root_cause",
      { issue_title: "SLOW APPROVALS", hypothesis: "Single approver" },
      { metrics, insight }
    );

    expect(result.output).toBe(
      [
        "Hypothesis: Single approver",
        "Issue: SLOW APPROVALS",
        "",
        "Affected step data:",
        "  Manager review: 4.0h, 10% errors, type=review, downstream=1",
      ].join("\n")
    );
  });

  it("falls back to process-wide patterns and lists active constraints", () => {
    const result = dispatchTool(
      "validate_root_cause",
      { issue_title: "Late payments", hypothesis: "Vendor portal is slow" },
      { metrics, insight, constraints: Constraints.parse({ budgetLimit: 5000, cannotHire: true }) }
    );

    expect(result.output).toBe(
      [
        "Hypothesis: Vendor portal is slow",
        "Issue: Late payments",
        "",
        "Affected step data:",
        "  (no affected steps found, showing process-wide patterns)",
        "  Review steps: 1 (33%)",
        "  Longest chain: 3",
        "  External touchpoints: 1",
        "",
        "Active constraints (may be relevant):",
        "  - Budget limit: $5,000",
        "  - Cannot hire new staff",
      ].join("\n")
    );
  });
});

describe("check_constraint_feasibility", () => {
  it("reports feasibility when there are no constraints", () => {
    expect(dispatchTool("check_constraint_feasibility", { recommendation_concept: "Automate" }, { metrics }).output).toBe(
      "No constraints defined. Recommendation appears feasible."
    );
  });

  it("reports feasibility when no constraint binds", () => {
    const result = dispatchTool(
      "check_constraint_feasibility",
      { recommendation_concept: "Automate" },
      { metrics, constraints: Constraints.parse({}) }
    );
    expect(result.output).toBe("No binding constraints. Recommendation appears feasible.");
  });

  it("lists active and custom constraints", () => {
    const constraints = { ...tightConstraints(), customConstraints: ["Works council sign-off"] };
    const result = dispatchTool(
      "check_constraint_feasibility",
      { recommendation_concept: "Hire a second approver", concern: "" },
      { metrics, constraints }
    );

    expect(result.output).toBe(
      [
        "Checking: 'Hire a second approver'",
        "Concern: general feasibility",
        "Active constraints:",
        "- Budget limit: $5,000",
        "- Cannot hire new staff",
        "- Max implementation time: 6 weeks",
        "- Works council sign-off",
      ].join("\n")
    );
  });
});

describe("dispatchTool", () => {
  it("reports unknown tools to the model", () => {
    expect(dispatchTool("delete_records", {}, { metrics })).toEqual({
      output: "Unknown tool 'delete_records'.",
      ok: false,
    });
  });

  it("reports invalid input with the failing field", () => {
    expect(dispatchTool("validate_root_cause", { issue_title: "Slow approvals" }, { metrics })).toEqual({
      output: "Invalid input for validate_root_cause: hypothesis Required",
      ok: false,
    });
  });
});
