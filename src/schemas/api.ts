import { z } from "zod";
import { AnalysisMode, LLMProvider } from "../config/index.js";
import { SuggestionType } from "../analysis/roi.js";
import { ProcessData } from "./process.js";
import { Constraints } from "./constraints.js";
import { BusinessProfile } from "./profile.js";

/**
 * Request bodies for the HTTP surface
 */

const RoutingFields = {
  analysisMode: AnalysisMode.optional(),
  provider: LLMProvider.optional(),
};

export const AnalyzeRequest = z.object({
  process: ProcessData,
  constraints: Constraints.optional(),
  profile: BusinessProfile.optional(),
  threadId: z.string().trim().min(1).max(128).optional(),
  maxCycles: z.number().int().min(0).max(20).optional(),
  ...RoutingFields,
});
export type AnalyzeRequestT = z.infer<typeof AnalyzeRequest>;

export const ContinueRequest = z.object({
  message: z.string().max(10_000),
});

export const ThreadParams = z.object({
  threadId: z.string().min(1).max(128),
});

export const EnrichRequest = z.object({
  process: ProcessData,
  constraints: Constraints.optional(),
  profile: BusinessProfile.optional(),
  ...RoutingFields,
});

export const RoiRequestBody = z.object({
  process: ProcessData,
  stepName: z.string().min(1),
  suggestionType: SuggestionType,
  implementationCost: z.number().min(0).optional(),
  executionsPerYear: z.number().int().positive().optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export const MergeRequest = z.object({
  base: ProcessData,
  incoming: ProcessData,
});
