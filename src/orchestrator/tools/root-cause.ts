/**
 * validate_root_cause
 *
 * Puts a hypothesis next to the data for the issue's affected steps, or
 * next to process-wide patterns when the issue or its steps are unknown.
 */

import { z } from "zod";
import { findStepMetrics, type StepMetrics } from "../../analysis/metrics.js";
import { activeConstraintLines } from "../../schemas/constraints.js";
import type { ToolContext } from "./types.js";

export const RootCauseInput = z.object({
  issue_title: z.string().min(1),
  hypothesis: z.string().min(1),
});

export type RootCauseInputT = z.infer<typeof RootCauseInput>;

function affectedStepMetrics(input: RootCauseInputT, ctx: ToolContext): StepMetrics[] {
  const title = input.issue_title.trim().toLowerCase();
  const issue = ctx.insight?.issues.find((candidate) => candidate.title.toLowerCase() === title);
  if (!issue) return [];
  return issue.affectedSteps.flatMap((name) => {
    const step = findStepMetrics(ctx.metrics, name);
    return step ? [step] : [];
  });
}

export function handleRootCause(input: RootCauseInputT, ctx: ToolContext): string {
  const lines = [`Hypothesis: ${input.hypothesis}`, `Issue: ${input.issue_title}`, "", "Affected step data:"];

  const steps = affectedStepMetrics(input, ctx);
  if (steps.length > 0) {
    for (const step of steps) {
      lines.push(
        `  ${step.stepName}: ${step.timeHours.toFixed(1)}h, ${step.errorRatePct.toFixed(0)}% errors, ` +
          `type=${step.category}, downstream=${step.downstreamCount}`
      );
    }
  } else {
    const { patterns } = ctx.metrics;
    lines.push("  (no affected steps found, showing process-wide patterns)");
    lines.push(`  Review steps: ${patterns.reviewStepCount} (${patterns.reviewPctOfSteps.toFixed(0)}%)`);
    lines.push(`  Longest chain: ${patterns.sequentialChainLength}`);
    lines.push(`  External touchpoints: ${patterns.externalTouchpoints}`);
  }

  const active = ctx.constraints ? activeConstraintLines(ctx.constraints) : [];
  if (active.length > 0) {
    lines.push("", "Active constraints (may be relevant):");
    for (const line of active) lines.push(`  - ${line}`);
  }

  return lines.join("\n");
}
