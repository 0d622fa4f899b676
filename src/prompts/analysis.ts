/**
 * Analysis Prompts
 *
 * System and user prompts for the analysis pipeline. Metrics arrive as
 * pre-computed facts; the model supplies the judgment.
 */

import type { BusinessProfileT } from "../schemas/profile.js";
import { industryLabel } from "../schemas/profile.js";
import type { IssueT } from "../schemas/insight.js";

// ============================================================================
// System Prompt
// ============================================================================

const BASE_SYSTEM_PROMPT = `You are a senior operations consultant who analyzes business processes.

You receive FACTS that were calculated from the user's process data: time and cost shares, error rates, dependency counts and structural patterns. Your job is JUDGMENT: decide which facts point to real problems and which are simply the valuable core of the work.

Principles:
- A step that takes the most time is not automatically a bottleneck. Creative and expert work is often the point of the process.
- Tie every issue to evidence from the metrics you were given. Do not invent numbers.
- Prefer recommendations the business can actually carry out under its constraints.
- Say plainly when the data is too thin to support a conclusion.`;

export function getSystemPrompt(profile?: BusinessProfileT): string {
  if (!profile) return BASE_SYSTEM_PROMPT;

  const lines: string[] = [];
  const industry = industryLabel(profile);
  if (industry) lines.push(`Industry: ${industry}`);
  if (profile.companySize) lines.push(`Company size: ${profile.companySize}`);
  lines.push(`Regulatory environment: ${profile.regulatoryEnvironment}`);
  if (profile.previousImprovements.length > 0) {
    lines.push(`Already tried: ${profile.previousImprovements.join("; ")}`);
  }
  if (profile.rejectedApproaches.length > 0) {
    lines.push(`Do NOT recommend (previously rejected): ${profile.rejectedApproaches.join("; ")}`);
  }
  if (profile.preferredFrameworks.length > 0) {
    lines.push(`Preferred frameworks: ${profile.preferredFrameworks.join(", ")}`);
  }
  if (profile.notes.trim()) lines.push(`Notes from the user:\n${profile.notes.trim()}`);

  return `${BASE_SYSTEM_PROMPT}\n\n## Business context\n${lines.join("\n")}`;
}

// ============================================================================
// Initial Analysis
// ============================================================================

const INSIGHT_SHAPE = `{
  "processSummary": string,
  "patterns": string[],
  "issues": [{ "title": string (max 100 chars), "description": string, "severity": "high" | "medium" | "low", "affectedSteps": string[], "rootCauseHypothesis": string, "evidence": string[] }],
  "recommendations": [{ "title": string, "addressesIssue": string (exact issue title), "description": string, "expectedBenefit": string, "feasibility": "easy" | "moderate" | "complex", "risks": string[], "affectedSteps": string[], "prerequisites": string[], "plainExplanation": string, "concreteNextSteps": string[] }],
  "notProblems": [{ "stepName": string, "whyNotAProblem": string, "appearsProblematicBecause": string }],
  "followUpQuestions": string[],
  "confidenceNotes": string,
  "reasoning": string
}`;

export interface AnalysisPromptInput {
  metricsText: string;
  industry?: string;
  constraintsSummary?: string;
}

export function getAnalysisPrompt(input: AnalysisPromptInput): string {
  const sections = [
    "Analyze this process. The metrics below were calculated from the user's data.",
    input.metricsText,
    `## Industry\n${input.industry ?? "Not specified"}`,
    `## Constraints\n${input.constraintsSummary ?? "No specific constraints"}`,
    [
      "## Output",
      "Respond with JSON matching this shape:",
      INSIGHT_SHAPE,
      "Every recommendation must name the issue it addresses in addressesIssue, using the issue title exactly.",
      "Use notProblems for steps that look slow or costly but are core value.",
    ].join("\n"),
  ];
  return sections.join("\n\n");
}

// ============================================================================
// Clarification
// ============================================================================

export interface ClarificationPromptInput {
  confidence: number;
  phase: string;
  dataGaps: readonly string[];
}

export function getClarificationPrompt(input: ClarificationPromptInput): string {
  const gaps = input.dataGaps.length > 0 ? input.dataGaps.map((gap) => `- ${gap}`).join("\n") : "- (none listed)";
  return [
    `We are in the ${input.phase} phase and data confidence is ${(input.confidence * 100).toFixed(0)}%.`,
    `Missing or default data:\n${gaps}`,
    "Write at most 3 short questions that would fill the most important gaps.",
    "Number them 1., 2., 3. and put each on its own line. No preamble.",
  ].join("\n\n");
}

// ============================================================================
// Investigation
// ============================================================================

export const INVESTIGATION_SYSTEM_PROMPT = `You are checking your own initial analysis of a business process before it is shown to the user.

You have tools that read the calculated process metrics and the user's constraints. Use them where an issue rests on thin evidence: check how far a step's delays cascade, test a root cause hypothesis against the data, and confirm a recommendation fits the constraints.

Call only the tools you need. When nothing further needs checking, reply with a short summary of what you verified and stop calling tools.`;

function describeIssue(issue: IssueT, index: number): string {
  const affected = issue.affectedSteps.length > 0 ? ` (affected: ${issue.affectedSteps.join(", ")})` : "";
  const hypothesis = issue.rootCauseHypothesis ? `: ${issue.rootCauseHypothesis}` : "";
  return `${index + 1}. [${issue.severity}] ${issue.title}${hypothesis}${affected}`;
}

/**
 * First user turn of the investigation loop.
 */
export function buildInvestigationSeed(issues: readonly IssueT[]): string {
  return [
    `The initial analysis identified ${issues.length} ${issues.length === 1 ? "issue" : "issues"}:`,
    ...issues.map(describeIssue),
    "",
    "Investigate as needed using the tools, then summarize what you verified.",
  ].join("\n");
}

// ============================================================================
// Improvement Suggestions (post-extraction)
// ============================================================================

export interface SuggestionsPromptInput {
  processName: string;
  stepCount: number;
  stepsWithTimes: number;
  stepsWithCosts: number;
  stepsWithErrors: number;
  stepsWithDependencies: number;
  confidence: number;
  dataGaps: readonly string[];
}

export function getImprovementSuggestionsPrompt(input: SuggestionsPromptInput): string {
  const gaps = input.dataGaps.slice(0, 5).map((gap) => `- ${gap}`);
  return [
    `The user just described the process "${input.processName}" with ${input.stepCount} steps.`,
    `Steps with times: ${input.stepsWithTimes}/${input.stepCount}. With costs: ${input.stepsWithCosts}/${input.stepCount}. With error rates: ${input.stepsWithErrors}/${input.stepCount}. With dependencies: ${input.stepsWithDependencies}/${input.stepCount}.`,
    `Data confidence: ${(input.confidence * 100).toFixed(0)}%.`,
    gaps.length > 0 ? `Main gaps:\n${gaps.join("\n")}` : "No major data gaps.",
    "In 2 to 4 short sentences, tell the user which additional details would most improve the analysis and why. Plain language, no lists.",
  ].join("\n\n");
}
