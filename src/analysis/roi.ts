/**
 * ROI estimation for a proposed change to a single step.
 *
 * Pure arithmetic over a fixed table of improvement factors. Three
 * scenarios scale the factors; the likely one drives payback.
 */

import { z } from "zod";
import { config } from "../config/index.js";
import type { ProcessDataT } from "../schemas/process.js";
import { getStep } from "../schemas/process.js";
import { formatUsd } from "../schemas/constraints.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";

export const SuggestionType = z.enum([
  "automation",
  "process_redesign",
  "resource_reallocation",
  "training",
  "tool_upgrade",
  "elimination",
  "parallelization",
]);
export type SuggestionTypeT = z.infer<typeof SuggestionType>;

export interface ImprovementFactors {
  /** Fraction of step time removed (0-1) */
  timeReduction: number;
  errorReduction: number;
  /** Ongoing cost relative to today */
  ongoingCostMultiplier: number;
}

export const IMPROVEMENT_FACTORS: Readonly<Record<SuggestionTypeT, ImprovementFactors>> = {
  automation: { timeReduction: 0.7, errorReduction: 0.8, ongoingCostMultiplier: 0.3 },
  process_redesign: { timeReduction: 0.4, errorReduction: 0.3, ongoingCostMultiplier: 0.7 },
  resource_reallocation: { timeReduction: 0.25, errorReduction: 0.15, ongoingCostMultiplier: 0.9 },
  training: { timeReduction: 0.15, errorReduction: 0.4, ongoingCostMultiplier: 0.95 },
  tool_upgrade: { timeReduction: 0.35, errorReduction: 0.25, ongoingCostMultiplier: 0.6 },
  elimination: { timeReduction: 1, errorReduction: 1, ongoingCostMultiplier: 0 },
  // coordination overhead
  parallelization: { timeReduction: 0.5, errorReduction: 0, ongoingCostMultiplier: 1.1 },
};

export const SCENARIO_MULTIPLIERS = {
  pessimistic: 0.5,
  likely: 1,
  optimistic: 1.3,
} as const;

export type Scenario = keyof typeof SCENARIO_MULTIPLIERS;

/** Used when a step has no recorded time */
export const DEFAULT_HOURLY_RATE = 75;
export const DEFAULT_ROI_CONFIDENCE = 0.7;

export interface RoiEstimate {
  pessimistic: number;
  likely: number;
  optimistic: number;
  assumptions: string[];
  confidence: number;
  /** Only defined when likely savings and implementation cost are both positive */
  paybackMonths?: number;
}

export interface RoiRequest {
  stepName: string;
  suggestionType: SuggestionTypeT;
  implementationCost?: number;
  executionsPerYear?: number;
  confidence?: number;
}

interface StepFigures {
  timeHours: number;
  costPerInstance: number;
  errorRatePct: number;
}

/**
 * Annual savings for one scenario: time saved at the step's hourly rate,
 * plus avoided rework (each error costs twice the step cost).
 */
export function annualSavings(
  step: StepFigures,
  factors: ImprovementFactors,
  scenario: Scenario,
  executionsPerYear: number
): number {
  const multiplier = SCENARIO_MULTIPLIERS[scenario];
  const timeReduction = Math.min(factors.timeReduction * multiplier, 1);
  const errorReduction = Math.min(factors.errorReduction * multiplier, 1);

  const hourlyRate = step.timeHours > 0 ? step.costPerInstance / step.timeHours : DEFAULT_HOURLY_RATE;
  const timeSavings = step.timeHours * timeReduction * hourlyRate;

  const errorCost = step.costPerInstance * 2 * (step.errorRatePct / 100);
  const errorSavings = errorCost * errorReduction;

  return (timeSavings + errorSavings) * executionsPerYear;
}

function buildAssumptions(
  step: StepFigures,
  factors: ImprovementFactors,
  suggestionType: SuggestionTypeT,
  executionsPerYear: number,
  implementationCost: number
): string[] {
  const assumptions = [
    `Process executes ${executionsPerYear.toLocaleString("en-US")} times per year`,
    `Current step cost: $${step.costPerInstance.toFixed(2)} per execution`,
    `Current step time: ${step.timeHours.toFixed(1)} hours`,
  ];

  if (factors.timeReduction > 0) {
    assumptions.push(
      `Expected time reduction: ${(factors.timeReduction * 100).toFixed(0)}% (based on ${suggestionType})`
    );
  }
  if (factors.errorReduction > 0 && step.errorRatePct > 0) {
    assumptions.push(`Expected error reduction: ${(factors.errorReduction * 100).toFixed(0)}%`);
    assumptions.push("Error rework cost estimated at 2x step cost");
  }
  if (factors.ongoingCostMultiplier !== 1) {
    assumptions.push(`Ongoing cost after change: ${(factors.ongoingCostMultiplier * 100).toFixed(0)}% of current`);
  }
  if (implementationCost > 0) {
    assumptions.push(`Implementation cost: ${formatUsd(implementationCost)}`);
  }

  return assumptions;
}

function unknownStepEstimate(): RoiEstimate {
  return {
    pessimistic: 0,
    likely: 0,
    optimistic: 0,
    assumptions: ["Unable to calculate ROI - step not found"],
    confidence: 0,
  };
}

/**
 * Estimate savings for applying `suggestionType` to one step.
 *
 * An unknown step yields a zero-confidence, zero-savings estimate.
 */
export function estimateRoi(process: ProcessDataT, request: RoiRequest): RoiEstimate {
  const step = getStep(process, request.stepName);
  if (!step) {
    log.warn({ step: request.stepName, process: process.name }, "ROI requested for unknown step");
    return unknownStepEstimate();
  }

  const executionsPerYear = request.executionsPerYear ?? config.analysis.executionsPerYear;
  const implementationCost = request.implementationCost ?? 0;
  const factors = IMPROVEMENT_FACTORS[request.suggestionType];
  const figures: StepFigures = {
    timeHours: step.averageTimeHours,
    costPerInstance: step.costPerInstance,
    errorRatePct: step.errorRatePct,
  };

  const likely = annualSavings(figures, factors, "likely", executionsPerYear);
  const estimate: RoiEstimate = {
    pessimistic: annualSavings(figures, factors, "pessimistic", executionsPerYear),
    likely,
    optimistic: annualSavings(figures, factors, "optimistic", executionsPerYear),
    assumptions: buildAssumptions(figures, factors, request.suggestionType, executionsPerYear, implementationCost),
    confidence: request.confidence ?? DEFAULT_ROI_CONFIDENCE,
  };

  if (likely > 0 && implementationCost > 0) {
    estimate.paybackMonths = (implementationCost / likely) * 12;
  }

  emit(TelemetryEvents.RoiEstimated, {
    suggestion_type: request.suggestionType,
    likely: Math.round(likely),
    has_payback: estimate.paybackMonths !== undefined,
  });

  return estimate;
}

/**
 * PERT-weighted summary of a three-point range.
 */
export function expectedValue(estimate: Pick<RoiEstimate, "pessimistic" | "likely" | "optimistic">): number {
  return (estimate.pessimistic + 4 * estimate.likely + estimate.optimistic) / 6;
}
