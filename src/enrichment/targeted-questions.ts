import type { ConfidenceResult } from "../analysis/confidence.js";

export const CONFIRMATION_QUESTION = "Does this look correct?";

export const FALLBACK_QUESTIONS = [
  CONFIRMATION_QUESTION,
  "Would you like to add any missing steps?",
  "Are there any constraints I should know about?",
] as const;

const MAX_TARGETED_QUESTIONS = 4;

const STEP_NAME_PATTERN = /for ['"](.+?)['"]/;

export function stepNameFromGap(gap: string): string | undefined {
  return STEP_NAME_PATTERN.exec(gap)?.[1];
}

function questionForGap(gap: string): string | undefined {
  const lowered = gap.toLowerCase();

  if (lowered.includes("time for")) {
    const step = stepNameFromGap(gap);
    return step ? `How long does '${step}' typically take? Even a rough estimate helps.` : undefined;
  }
  if (lowered.includes("cost for")) {
    const step = stepNameFromGap(gap);
    return step ? `What does '${step}' cost per instance? Include labor and tools.` : undefined;
  }
  if (lowered.includes("error rate for")) {
    const step = stepNameFromGap(gap);
    return step ? `How often does '${step}' need rework or fail? Even 'rarely' vs 'often' helps.` : undefined;
  }
  if (lowered.includes("no dependencies")) {
    return "Which steps depend on others being done first? This helps identify where delays cascade.";
  }
  if (lowered.includes("no constraints")) {
    return "Are there any budget limits, hiring freezes, or timeline constraints I should know about?";
  }
  if (lowered.includes("no business profile")) {
    return "What industry are you in? This helps me tailor recommendations.";
  }
  return undefined;
}

/**
 * Follow-up questions derived from the data gaps, no model involved.
 * The confirmation question always comes first.
 */
export function buildTargetedQuestions(confidence: Pick<ConfidenceResult, "dataGaps">): string[] {
  const unique: string[] = [];
  for (const gap of confidence.dataGaps) {
    const question = questionForGap(gap);
    if (question && !unique.includes(question)) {
      unique.push(question);
      if (unique.length >= MAX_TARGETED_QUESTIONS) break;
    }
  }

  return unique.length > 0 ? [CONFIRMATION_QUESTION, ...unique] : [...FALLBACK_QUESTIONS];
}
