/**
 * analyze_dependency_impact
 *
 * Metrics for one step plus how much of the process waits on it.
 */

import { z } from "zod";
import { findStepMetrics } from "../../analysis/metrics.js";
import type { ToolContext } from "./types.js";

export const DependencyImpactInput = z.object({
  step_name: z.string().min(1),
  question: z.string().default(""),
});

export type DependencyImpactInputT = z.infer<typeof DependencyImpactInput>;

export function handleDependencyImpact(input: DependencyImpactInputT, ctx: ToolContext): string {
  const step = findStepMetrics(ctx.metrics, input.step_name);
  if (!step) {
    return `Step '${input.step_name}' not found in process data.`;
  }

  const lines = [
    `Step '${step.stepName}':`,
    `  Time: ${step.timeHours.toFixed(1)}h (${step.timePct.toFixed(0)}% of total)`,
    `  Cost: $${step.cost.toFixed(0)} (${step.costPct.toFixed(0)}% of total)`,
    `  Error rate: ${step.errorRatePct.toFixed(0)}%`,
    `  Resources: ${step.resources}`,
    `  Type: ${step.category}`,
    `  Downstream steps blocked by this: ${step.downstreamCount}`,
    `  Upstream dependencies: ${step.upstreamCount}`,
  ];
  if (input.question) {
    lines.push(`  Question being investigated: ${input.question}`);
  }
  if (step.isLongest) lines.push("  Flag: longest step in process");
  if (step.isMostExpensive) lines.push("  Flag: most expensive step in process");
  if (step.isHighestError) lines.push("  Flag: highest error rate in process");

  return lines.join("\n");
}
