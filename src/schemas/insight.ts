import { z } from "zod";

export const Severity = z.enum(["high", "medium", "low"]);
export const Feasibility = z.enum(["easy", "moderate", "complex"]);

export const Issue = z.object({
  title: z.string().min(1).max(100),
  description: z.string(),
  severity: Severity,
  affectedSteps: z.array(z.string()).default([]),
  rootCauseHypothesis: z.string().default(""),
  evidence: z.array(z.string()).default([]),
});

export const Recommendation = z.object({
  title: z.string().min(1),
  /** Title of the Issue this addresses (linked best-effort after parsing) */
  addressesIssue: z.string(),
  description: z.string(),
  expectedBenefit: z.string(),
  feasibility: Feasibility,
  risks: z.array(z.string()).default([]),
  affectedSteps: z.array(z.string()).default([]),
  prerequisites: z.array(z.string()).default([]),
  plainExplanation: z.string().default(""),
  concreteNextSteps: z.array(z.string()).default([]),
});

export const NotAProblem = z.object({
  stepName: z.string().min(1),
  whyNotAProblem: z.string(),
  appearsProblematicBecause: z.string().default(""),
});

/**
 * Structured judgment returned by the analysis model call.
 */
export const AnalysisInsight = z.object({
  processSummary: z.string(),
  patterns: z.array(z.string()).default([]),
  issues: z.array(Issue).default([]),
  recommendations: z.array(Recommendation).default([]),
  notProblems: z.array(NotAProblem).default([]),
  followUpQuestions: z.array(z.string()).default([]),
  confidenceNotes: z.string().default(""),
  reasoning: z.string().default(""),
  investigationFindings: z.array(z.string()).default([]),
});

export type IssueT = z.infer<typeof Issue>;
export type RecommendationT = z.infer<typeof Recommendation>;
export type NotAProblemT = z.infer<typeof NotAProblem>;
export type AnalysisInsightT = z.infer<typeof AnalysisInsight>;
export type AnalysisInsightInput = z.input<typeof AnalysisInsight>;

/**
 * Link each recommendation back to an Issue title.
 *
 * Exact match first, then case-insensitive exact, then case-insensitive
 * substring in either direction (first issue in order wins). The
 * substring step is best-effort and can pick the wrong issue when two
 * titles share text. Unmatched recommendations are left as-is.
 */
export function linkRecommendations(insight: AnalysisInsightT): AnalysisInsightT {
  const titles = insight.issues.map((issue) => issue.title);

  const recommendations = insight.recommendations.map((rec) => {
    const target = rec.addressesIssue;
    if (titles.includes(target)) return rec;

    const lowered = target.trim().toLowerCase();
    if (!lowered) return rec;

    const exact = titles.find((title) => title.toLowerCase() === lowered);
    if (exact !== undefined) return { ...rec, addressesIssue: exact };

    const partial = titles.find((title) => {
      const t = title.toLowerCase();
      return t.includes(lowered) || lowered.includes(t);
    });
    if (partial !== undefined) return { ...rec, addressesIssue: partial };

    return rec;
  });

  return { ...insight, recommendations };
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/**
 * One-line summary shown alongside a completed analysis.
 */
export function summarizeInsight(insight: AnalysisInsightT): string {
  const parts: string[] = [];

  if (insight.issues.length > 0) {
    const high = insight.issues.filter((issue) => issue.severity === "high").length;
    parts.push(high > 0 ? plural(high, "significant issue") : plural(insight.issues.length, "issue"));
  }
  if (insight.recommendations.length > 0) {
    parts.push(plural(insight.recommendations.length, "recommendation"));
  }
  if (insight.notProblems.length > 0) {
    const n = insight.notProblems.length;
    parts.push(`${plural(n, "area")} that ${n === 1 ? "looks" : "look"} fine`);
  }

  return parts.length > 0 ? `Analysis complete. Found ${parts.join(", ")}.` : "Analysis complete.";
}
