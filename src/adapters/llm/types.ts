/**
 * Provider-agnostic model gateway interface.
 *
 * Every stage that needs judgment goes through a ModelGateway; gateways
 * are constructed once by the caller and injected (see router.ts).
 */

import type { z } from "zod";
import type { LLMProviderT } from "../../config/index.js";

/**
 * Usage metrics returned by model calls for cost tracking and telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

/**
 * Call options passed to all gateway methods for request tracking and timeouts.
 */
export interface CallOpts {
  requestId: string;
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: string;
}

/**
 * Blocks a model can return
 */
export type ContentBlock = TextBlock | ToolUseBlock;

export type ChatMessage =
  | { role: "user"; content: string | Array<TextBlock | ToolResultBlock> }
  | { role: "assistant"; content: string | ContentBlock[] };

/**
 * Tool exposed to the model, described by a JSON Schema for its input.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface InvokeArgs {
  system: string;
  user: string;
  /** Prior turns, sent before `user` */
  messages?: ChatMessage[];
}

export interface InvokeResult {
  content: string;
  usage: UsageMetrics;
}

export interface StructuredResult<T> {
  value: T;
  usage: UsageMetrics;
}

export interface ChatWithToolsArgs {
  system: string;
  messages: ChatMessage[];
  tools: ToolDefinition[];
}

export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "stop_sequence";

export interface ChatWithToolsResult {
  content: ContentBlock[];
  stop_reason: StopReason;
  usage: UsageMetrics;
}

export interface ModelGateway {
  /**
   * Provider name for telemetry and routing.
   */
  readonly name: LLMProviderT;

  readonly model: string;
  readonly temperature: number;

  /**
   * Whether `chatWithTools` is available for this provider/model.
   */
  readonly supportsTools: boolean;

  /**
   * Plain text completion.
   *
   * @throws ModelTransientError (empty, timeout, transport)
   * @throws ConfigurationError on missing or rejected credentials
   */
  invoke(args: InvokeArgs, opts: CallOpts): Promise<InvokeResult>;

  /**
   * Completion validated against `schema`. Content that is not JSON or
   * fails validation is a ModelTransientError of kind "malformed".
   */
  structured<S extends z.ZodTypeAny>(args: InvokeArgs, schema: S, opts: CallOpts): Promise<StructuredResult<z.infer<S>>>;

  /**
   * One tool-calling turn over the accumulated history.
   */
  chatWithTools?(args: ChatWithToolsArgs, opts: CallOpts): Promise<ChatWithToolsResult>;
}

export function textOf(blocks: readonly ContentBlock[]): string {
  return blocks
    .filter((block): block is TextBlock => block.type === "text")
    .map((block) => block.text)
    .join("");
}

export function toolUsesOf(blocks: readonly ContentBlock[]): ToolUseBlock[] {
  return blocks.filter((block): block is ToolUseBlock => block.type === "tool_use");
}
