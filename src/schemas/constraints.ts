import { z } from "zod";

export const Priority = z.enum([
  "cost_reduction",
  "time_reduction",
  "quality_improvement",
  "compliance",
]);

/**
 * Business constraints that bound which recommendations are acceptable.
 */
export const Constraints = z.object({
  budgetLimit: z.number().min(0).optional(),
  cannotHire: z.boolean().default(false),
  maxErrorRateIncreasePct: z.number().min(0).default(0),
  mustMaintainAuditTrail: z.boolean().default(false),
  maxImplementationWeeks: z.number().int().min(1).optional(),
  priority: Priority.default("cost_reduction"),
  customConstraints: z.array(z.string().min(1)).default([]),
});

export type ConstraintsT = z.infer<typeof Constraints>;
export type ConstraintsInput = z.input<typeof Constraints>;

const usd = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

export function formatUsd(amount: number): string {
  return `$${usd.format(amount)}`;
}

/**
 * Active constraints as short human-readable lines, in a fixed order.
 * Falsy values (no budget, zero weeks, zero ceiling) are not listed.
 */
export function activeConstraintLines(constraints: ConstraintsT): string[] {
  const lines: string[] = [];
  if (constraints.budgetLimit) {
    lines.push(`Budget limit: ${formatUsd(constraints.budgetLimit)}`);
  }
  if (constraints.cannotHire) {
    lines.push("Cannot hire new staff");
  }
  if (constraints.mustMaintainAuditTrail) {
    lines.push("Must maintain audit trail");
  }
  if (constraints.maxImplementationWeeks) {
    lines.push(`Max implementation time: ${constraints.maxImplementationWeeks} weeks`);
  }
  if (constraints.maxErrorRateIncreasePct) {
    lines.push(`Max error rate increase: ${constraints.maxErrorRateIncreasePct}%`);
  }
  return lines;
}

/**
 * One-line constraints summary for model prompts.
 */
export function formatConstraintsForLlm(constraints: ConstraintsT): string {
  const parts = activeConstraintLines(constraints);
  parts.push(`Priority: ${constraints.priority}`);
  return parts.join("; ");
}
