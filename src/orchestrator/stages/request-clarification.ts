import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { getClarificationPrompt, getSystemPrompt } from "../../prompts/analysis.js";
import type { AgentState, StageResult } from "../state.js";
import { errorMessage, routingOf, type StageDeps } from "./types.js";

const MAX_QUESTIONS = 3;

/**
 * Questions from model text: numbered ("1.", "1)", "1:") or dashed lines,
 * at most three. Text with no such lines is returned whole.
 */
export function parseClarificationQuestions(content: string): string[] {
  const questions: string[] = [];
  for (const raw of content.split("\n")) {
    const line = raw.trim();
    if (line.length > 2 && /\d/.test(line.charAt(0)) && ".):".includes(line.charAt(1))) {
      questions.push(line.slice(2).trim());
    } else if (line.startsWith("-")) {
      questions.push(line.slice(1).trim());
    }
  }

  const parsed = questions.filter((question) => question.length > 0);
  if (parsed.length > 0) return parsed.slice(0, MAX_QUESTIONS);
  return [content.trim()];
}

async function generateQuestions(state: AgentState, deps: StageDeps): Promise<string[] | undefined> {
  if (!deps.explanationsEnabled) return undefined;

  try {
    const gateway = deps.gatewayFor("clarification", routingOf(state));
    const result = await gateway.invoke(
      {
        system: getSystemPrompt(state.profile),
        user: getClarificationPrompt({
          confidence: state.confidence?.score ?? 0,
          phase: "initial_analysis",
          dataGaps: state.confidence?.dataGaps ?? [],
        }),
      },
      deps.callOpts
    );
    return parseClarificationQuestions(result.content);
  } catch (error) {
    log.warn({ thread_id: state.threadId, error: errorMessage(error) }, "Clarification question generation failed");
    emit(TelemetryEvents.ClarificationQuestionsFallback, {
      thread_id: state.threadId,
      reason: errorMessage(error).substring(0, 100),
    });
    return undefined;
  }
}

/**
 * Produce the questions the caller shows the user, then wait for input.
 */
export async function requestClarification(state: AgentState, deps: StageDeps): Promise<StageResult> {
  const generated = await generateQuestions(state, deps);

  let questions: string[];
  if (generated && generated.length > 0) {
    questions = generated;
  } else if (state.clarificationQuestions.length > 0) {
    questions = state.clarificationQuestions;
  } else {
    questions = (state.confidence?.dataGaps ?? []).slice(0, MAX_QUESTIONS).map((gap) => `Please provide: ${gap}`);
  }

  let trace = `Requesting clarification: ${questions.length} questions`;
  if (generated) trace += " (model generated)";

  emit(TelemetryEvents.ClarificationRequested, {
    thread_id: state.threadId,
    question_count: questions.length,
    model_generated: generated !== undefined,
  });

  return {
    update: { clarificationQuestions: questions, phase: "awaiting_input" },
    trace: [trace],
    event: { type: "clarification_requested" },
  };
}
