/**
 * Tool Registry
 *
 * The three read-only investigation tools the model may call during the
 * Investigate stage. Definitions are static; handlers live in dispatch.ts.
 */

import type { ToolDefinition } from "../../adapters/llm/types.js";
import type { InvestigationToolName } from "./types.js";

// ============================================================================
// Tool Definitions (LLM-visible)
// ============================================================================

const TOOL_DEFINITIONS: ReadonlyArray<ToolDefinition & { name: InvestigationToolName }> = [
  {
    name: "analyze_dependency_impact",
    description:
      "Analyze how a specific process step impacts downstream work. Use when a step appears problematic and you need the cascade effect on everything that depends on it.",
    input_schema: {
      type: "object",
      properties: {
        step_name: { type: "string", description: "The exact name of the step to investigate." },
        question: { type: "string", description: "The aspect of dependency impact being analyzed." },
      },
      required: ["step_name", "question"],
    },
  },
  {
    name: "validate_root_cause",
    description:
      "Test whether a root cause hypothesis is consistent with the process data. Use before committing to an explanation for an issue.",
    input_schema: {
      type: "object",
      properties: {
        issue_title: { type: "string", description: "Title of the issue from your initial analysis." },
        hypothesis: { type: "string", description: "Your proposed explanation for why the issue exists." },
      },
      required: ["issue_title", "hypothesis"],
    },
  },
  {
    name: "check_constraint_feasibility",
    description:
      "List the user's constraints that a recommendation must respect. Use before finalizing any significant recommendation.",
    input_schema: {
      type: "object",
      properties: {
        recommendation_concept: { type: "string", description: "The recommendation you are considering." },
        concern: { type: "string", description: "Which constraint or requirement you are checking against." },
      },
      required: ["recommendation_concept", "concern"],
    },
  },
];

export function getToolDefinitions(): ToolDefinition[] {
  return TOOL_DEFINITIONS.map((tool) => ({ ...tool }));
}

export function isInvestigationTool(name: string): name is InvestigationToolName {
  return TOOL_DEFINITIONS.some((tool) => tool.name === name);
}
