/**
 * Tool Dispatch
 *
 * Validates model-supplied input and routes to the handler. Every outcome
 * is a string for the model: unknown tools and bad arguments are reported
 * back rather than thrown, since the model can correct itself next turn.
 */

import { log } from "../../utils/telemetry.js";
import { ConstraintFeasibilityInput, handleConstraintFeasibility } from "./constraint-feasibility.js";
import { DependencyImpactInput, handleDependencyImpact } from "./dependency-impact.js";
import { handleRootCause, RootCauseInput } from "./root-cause.js";
import { isInvestigationTool } from "./registry.js";
import type { ToolContext } from "./types.js";

export interface ToolDispatchResult {
  output: string;
  /** False when the tool was unknown or its input invalid */
  ok: boolean;
}

function invalidInput(toolName: string, issues: string): ToolDispatchResult {
  return { output: `Invalid input for ${toolName}: ${issues}`, ok: false };
}

function describeIssues(error: { issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }> }): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "input"} ${issue.message}`).join("; ");
}

export function dispatchTool(toolName: string, toolInput: Record<string, unknown>, ctx: ToolContext): ToolDispatchResult {
  if (!isInvestigationTool(toolName)) {
    log.warn({ tool: toolName }, "Model requested unknown tool");
    return { output: `Unknown tool '${toolName}'.`, ok: false };
  }

  switch (toolName) {
    case "analyze_dependency_impact": {
      const parsed = DependencyImpactInput.safeParse(toolInput);
      if (!parsed.success) return invalidInput(toolName, describeIssues(parsed.error));
      return { output: handleDependencyImpact(parsed.data, ctx), ok: true };
    }

    case "validate_root_cause": {
      const parsed = RootCauseInput.safeParse(toolInput);
      if (!parsed.success) return invalidInput(toolName, describeIssues(parsed.error));
      return { output: handleRootCause(parsed.data, ctx), ok: true };
    }

    case "check_constraint_feasibility": {
      const parsed = ConstraintFeasibilityInput.safeParse(toolInput);
      if (!parsed.success) return invalidInput(toolName, describeIssues(parsed.error));
      return { output: handleConstraintFeasibility(parsed.data, ctx), ok: true };
    }
  }
}
