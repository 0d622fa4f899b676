import Anthropic from "@anthropic-ai/sdk";
import type { z } from "zod";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { ConfigurationError } from "./errors.js";
import { parseStructured, requireText, runModelCall, type HttpErrorInfo } from "./call.js";
import type {
  CallOpts,
  ChatMessage,
  ChatWithToolsArgs,
  ChatWithToolsResult,
  ContentBlock,
  InvokeArgs,
  InvokeResult,
  ModelGateway,
  StopReason,
  StructuredResult,
  UsageMetrics,
} from "./types.js";

const MAX_OUTPUT_TOKENS = 4096;

function httpInfo(error: unknown): HttpErrorInfo | undefined {
  if (error instanceof Anthropic.APIError && typeof error.status === "number") {
    const header = error.headers?.["request-id"];
    return {
      status: error.status,
      requestId: typeof header === "string" ? header : undefined,
      message: error.message || "unknown error",
    };
  }
  return undefined;
}

export function toAnthropicMessages(messages: readonly ChatMessage[]): Anthropic.MessageParam[] {
  return messages.map((message): Anthropic.MessageParam => {
    if (typeof message.content === "string") {
      return { role: message.role, content: message.content };
    }
    if (message.role === "user") {
      return {
        role: "user",
        content: message.content.map((block) =>
          block.type === "tool_result"
            ? { type: "tool_result" as const, tool_use_id: block.tool_use_id, content: block.content }
            : { type: "text" as const, text: block.text }
        ),
      };
    }
    return {
      role: "assistant",
      content: message.content.map((block) =>
        block.type === "tool_use"
          ? { type: "tool_use" as const, id: block.id, name: block.name, input: block.input }
          : { type: "text" as const, text: block.text }
      ),
    };
  });
}

function usageOf(usage: Anthropic.Usage): UsageMetrics {
  return { input_tokens: usage.input_tokens, output_tokens: usage.output_tokens };
}

function toContentBlocks(content: Anthropic.ContentBlock[]): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  for (const block of content) {
    if (block.type === "text") {
      blocks.push({ type: "text", text: block.text });
    } else if (block.type === "tool_use") {
      const input = typeof block.input === "object" && block.input !== null ? Object.fromEntries(Object.entries(block.input)) : {};
      blocks.push({ type: "tool_use", id: block.id, name: block.name, input });
    }
  }
  return blocks;
}

function stopReasonOf(reason: Anthropic.Message["stop_reason"]): StopReason {
  return reason ?? "end_turn";
}

/**
 * Messages API gateway.
 */
export class AnthropicGateway implements ModelGateway {
  readonly name = "anthropic" as const;
  readonly model: string;
  readonly temperature: number;
  readonly supportsTools = true;

  // Lazy initialization to allow construction without an API key
  private client: Anthropic | null = null;

  constructor(model: string, temperature: number) {
    this.model = model;
    this.temperature = temperature;
  }

  private getClient(): Anthropic {
    if (this.client) return this.client;
    const apiKey = config.llm.anthropicApiKey;
    if (!apiKey) {
      throw new ConfigurationError(
        "Anthropic API key not configured",
        "ANTHROPIC_API_KEY",
        "Please set ANTHROPIC_API_KEY in your environment or .env file."
      );
    }
    this.client = new Anthropic({ apiKey });
    return this.client;
  }

  private async complete(system: string, args: InvokeArgs, operation: string, opts: CallOpts): Promise<InvokeResult> {
    return runModelCall(
      { provider: this.name, model: this.model, operation, opts, httpInfo },
      async (signal, idempotencyKey) => {
        const response = await this.getClient().messages.create(
          {
            model: this.model,
            max_tokens: MAX_OUTPUT_TOKENS,
            temperature: this.temperature,
            system,
            messages: [...toAnthropicMessages(args.messages ?? []), { role: "user", content: args.user }],
          },
          { signal, headers: { "Idempotency-Key": idempotencyKey } }
        );
        const text = toContentBlocks(response.content)
          .flatMap((block) => (block.type === "text" ? [block.text] : []))
          .join("");
        return { content: requireText(text, this.name), usage: usageOf(response.usage) };
      }
    );
  }

  async invoke(args: InvokeArgs, opts: CallOpts): Promise<InvokeResult> {
    return this.complete(args.system, args, "invoke", opts);
  }

  async structured<S extends z.ZodTypeAny>(
    args: InvokeArgs,
    schema: S,
    opts: CallOpts
  ): Promise<StructuredResult<z.infer<S>>> {
    const system = `${args.system}\n\nRespond with a single JSON object and nothing else.`;
    const result = await this.complete(system, args, "structured", opts);
    return { value: parseStructured(result.content, schema, this.name), usage: result.usage };
  }

  async chatWithTools(args: ChatWithToolsArgs, opts: CallOpts): Promise<ChatWithToolsResult> {
    return runModelCall(
      { provider: this.name, model: this.model, operation: "chat_with_tools", opts, httpInfo },
      async (signal, idempotencyKey) => {
        const response = await this.getClient().messages.create(
          {
            model: this.model,
            max_tokens: MAX_OUTPUT_TOKENS,
            temperature: this.temperature,
            system: args.system,
            messages: toAnthropicMessages(args.messages),
            tools: args.tools.map((tool) => ({
              name: tool.name,
              description: tool.description,
              input_schema: tool.input_schema,
            })),
          },
          { signal, headers: { "Idempotency-Key": idempotencyKey } }
        );

        log.debug(
          { provider: this.name, stop_reason: response.stop_reason, blocks: response.content.length },
          "tool turn complete"
        );

        return {
          content: toContentBlocks(response.content),
          stop_reason: stopReasonOf(response.stop_reason),
          usage: usageOf(response.usage),
        };
      }
    );
  }
}
