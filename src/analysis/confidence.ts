/**
 * Confidence scoring
 *
 * Deterministic 0-1 measure of how complete the supplied data is. Gates
 * whether the orchestrator asks for clarification before analysing.
 */

import { config } from "../config/index.js";
import type { ProcessDataT } from "../schemas/process.js";
import type { ConstraintsT } from "../schemas/constraints.js";
import type { BusinessProfileT } from "../schemas/profile.js";
import { DataInvariantError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";

export const CONFIDENCE_WEIGHTS = {
  process: 0.6,
  constraints: 0.25,
  profile: 0.15,
} as const;

export interface ConfidenceWeights {
  process: number;
  constraints: number;
  profile: number;
}

/**
 * @throws DataInvariantError unless the weights sum to 1.0
 */
export function assertWeights(weights: ConfidenceWeights): void {
  const sum = weights.process + weights.constraints + weights.profile;
  if (Math.abs(sum - 1) > 1e-9) {
    throw new DataInvariantError(
      `Confidence weights must sum to 1.0, got ${sum}`,
      "confidence_weights_sum"
    );
  }
}

assertWeights(CONFIDENCE_WEIGHTS);

export type ConfidenceLevel = "high" | "moderate" | "low" | "very low";

export interface ConfidenceBreakdown {
  processCompleteness: number;
  constraintsCompleteness: number;
  profileCompleteness: number;
}

export interface ConfidenceResult {
  score: number;
  dataGaps: string[];
  suggestions: string[];
  breakdown: ConfidenceBreakdown;
  isSufficient: boolean;
  level: ConfidenceLevel;
}

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= 0.8) return "high";
  if (score >= 0.6) return "moderate";
  if (score >= 0.4) return "low";
  return "very low";
}

function scoreProcess(process: ProcessDataT, gaps: string[], suggestions: string[]): number {
  const { steps } = process;
  if (steps.length === 0) {
    gaps.push("No process steps defined");
    suggestions.push("Add at least one process step");
    return 0;
  }

  let scores = steps.map((step) => {
    let score = 1;
    if (step.errorRatePct === 0) {
      score -= 0.15;
      gaps.push(`error rate for '${step.stepName}'`);
    }
    if (step.costPerInstance === 0) {
      score -= 0.2;
      gaps.push(`cost for '${step.stepName}'`);
    }
    if (step.averageTimeHours === 0) {
      score -= 0.3;
      gaps.push(`time for '${step.stepName}'`);
    }
    return Math.max(score, 0);
  });

  if (steps.length > 1 && !steps.some((step) => step.dependsOn.length > 0)) {
    gaps.push("No dependencies defined between steps");
    suggestions.push("Define step dependencies to enable cascade analysis");
    scores = scores.map((score) => score * 0.9);
  }

  if (!process.description.trim()) {
    suggestions.push("Add a process description for better context");
  }

  let average = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  if (steps.length >= 5) {
    average = Math.min(average + 0.05, 1);
  }
  return average;
}

function scoreConstraints(
  constraints: ConstraintsT | undefined,
  gaps: string[],
  suggestions: string[]
): number {
  if (!constraints) {
    gaps.push("No constraints provided");
    suggestions.push("Define business constraints (budget, hiring, timeline)");
    return 0.3;
  }

  let score = 0.5;
  if (constraints.budgetLimit !== undefined) {
    score += 0.15;
  } else {
    suggestions.push("Consider adding a budget limit for better filtering");
  }
  if (constraints.maxImplementationWeeks !== undefined) score += 0.15;
  if (constraints.customConstraints.length > 0) score += 0.1;
  if (constraints.cannotHire || constraints.mustMaintainAuditTrail) score += 0.1;

  return Math.min(score, 1);
}

function scoreProfile(profile: BusinessProfileT | undefined, gaps: string[], suggestions: string[]): number {
  if (!profile) {
    gaps.push("No business profile provided");
    suggestions.push("Add business context (industry, company size, regulatory environment)");
    return 0.2;
  }

  let score = 0.4;
  if (profile.industry !== undefined || profile.companySize !== undefined) score += 0.2;
  if (profile.previousImprovements.length > 0) score += 0.1;
  if (profile.preferredFrameworks.length > 0) score += 0.1;
  if (profile.rejectedApproaches.length > 0) score += 0.15;

  return Math.min(score, 1);
}

/**
 * Score data completeness. Pure and deterministic.
 *
 * @param threshold Minimum score for `isSufficient` (defaults to CONFIDENCE_THRESHOLD)
 */
export function scoreConfidence(
  process: ProcessDataT,
  constraints?: ConstraintsT,
  profile?: BusinessProfileT,
  threshold: number = config.analysis.confidenceThreshold
): ConfidenceResult {
  const dataGaps: string[] = [];
  const suggestions: string[] = [];

  const processCompleteness = scoreProcess(process, dataGaps, suggestions);
  const constraintsCompleteness = scoreConstraints(constraints, dataGaps, suggestions);
  const profileCompleteness = scoreProfile(profile, dataGaps, suggestions);

  const raw =
    processCompleteness * CONFIDENCE_WEIGHTS.process +
    constraintsCompleteness * CONFIDENCE_WEIGHTS.constraints +
    profileCompleteness * CONFIDENCE_WEIGHTS.profile;
  const score = Math.min(Math.max(raw, 0), 1);

  const result: ConfidenceResult = {
    score,
    dataGaps,
    suggestions,
    breakdown: { processCompleteness, constraintsCompleteness, profileCompleteness },
    isSufficient: score >= threshold,
    level: confidenceLevel(score),
  };

  log.debug(
    { process: process.name, score, level: result.level, gap_count: dataGaps.length },
    "Confidence calculated"
  );

  return result;
}

const CRITICAL_GAP_KEYWORDS = ["time", "cost", "error rate", "no process steps", "no constraints"];

function isCriticalGap(gap: string): boolean {
  const lowered = gap.toLowerCase();
  return CRITICAL_GAP_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

export function criticalGaps(gaps: readonly string[]): string[] {
  return gaps.filter(isCriticalGap);
}

/**
 * Gaps ordered critical-first; relative order kept within each bucket.
 */
export function prioritizeGaps(gaps: readonly string[]): string[] {
  return [...gaps.filter(isCriticalGap), ...gaps.filter((gap) => !isCriticalGap(gap))];
}
