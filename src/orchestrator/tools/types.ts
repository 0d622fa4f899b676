import type { ProcessMetrics } from "../../analysis/metrics.js";
import type { ConstraintsT } from "../../schemas/constraints.js";
import type { AnalysisInsightT } from "../../schemas/insight.js";

/**
 * Read-only view of the run that investigation tools query.
 */
export interface ToolContext {
  readonly metrics: ProcessMetrics;
  readonly insight?: AnalysisInsightT;
  readonly constraints?: ConstraintsT;
}

export type InvestigationToolName =
  | "analyze_dependency_impact"
  | "validate_root_cause"
  | "check_constraint_feasibility";
