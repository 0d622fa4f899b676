import type { z } from "zod";
import type { ModelTask } from "../../config/model-routing.js";
import { parseStructured } from "./call.js";
import type { CallOpts, InvokeArgs, InvokeResult, ModelGateway, StructuredResult } from "./types.js";

const ZERO_USAGE = { input_tokens: 0, output_tokens: 0 };

const FIXTURE_TEXT: Record<ModelTask, string> = {
  clarification: [
    "1. Roughly how long does each step take?",
    "2. What does each step cost per instance, including labor?",
    "3. Are there budget, hiring or timeline constraints?",
  ].join("\n"),
  explanation: "Fixture suggestions - configure a model provider for real improvement ideas.",
  analysis: "Fixture analysis - no model configured.",
};

/**
 * Minimal analysis judgment returned for structured calls
 */
const FIXTURE_INSIGHT = {
  processSummary: "Fixture analysis - no model was called.",
  patterns: [],
  issues: [],
  recommendations: [],
  notProblems: [],
  followUpQuestions: [],
  confidenceNotes: "Generated by the fixtures provider.",
  reasoning: "",
  investigationFindings: [],
};

/**
 * Deterministic gateway for running without credentials.
 * No tool calling, so investigation is always skipped.
 */
export class FixturesGateway implements ModelGateway {
  readonly name = "fixtures" as const;
  readonly model = "fixture-v1";
  readonly temperature = 0;
  readonly supportsTools = false;

  constructor(private readonly task: ModelTask = "analysis") {}

  async invoke(_args: InvokeArgs, _opts: CallOpts): Promise<InvokeResult> {
    return { content: FIXTURE_TEXT[this.task], usage: ZERO_USAGE };
  }

  async structured<S extends z.ZodTypeAny>(
    _args: InvokeArgs,
    schema: S,
    _opts: CallOpts
  ): Promise<StructuredResult<z.infer<S>>> {
    return { value: parseStructured(JSON.stringify(FIXTURE_INSIGHT), schema, this.name), usage: ZERO_USAGE };
  }
}
