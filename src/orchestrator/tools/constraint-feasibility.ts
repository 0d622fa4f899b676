import { z } from "zod";
import { activeConstraintLines } from "../../schemas/constraints.js";
import type { ToolContext } from "./types.js";

export const ConstraintFeasibilityInput = z.object({
  recommendation_concept: z.string().min(1),
  concern: z.string().default(""),
});

export type ConstraintFeasibilityInputT = z.infer<typeof ConstraintFeasibilityInput>;

/**
 * check_constraint_feasibility: the constraints a recommendation has to
 * respect. The judgment stays with the model.
 */
export function handleConstraintFeasibility(input: ConstraintFeasibilityInputT, ctx: ToolContext): string {
  if (!ctx.constraints) {
    return "No constraints defined. Recommendation appears feasible.";
  }

  const active = [...activeConstraintLines(ctx.constraints), ...ctx.constraints.customConstraints];
  if (active.length === 0) {
    return "No binding constraints. Recommendation appears feasible.";
  }

  return [
    `Checking: '${input.recommendation_concept}'`,
    `Concern: ${input.concern || "general feasibility"}`,
    "Active constraints:",
    ...active.map((line) => `- ${line}`),
  ].join("\n");
}
