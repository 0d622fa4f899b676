import OpenAI from "openai";
import type { z } from "zod";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { ConfigurationError, ModelTransientError } from "./errors.js";
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

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

const MAX_OUTPUT_TOKENS = 4096;

/**
 * GPT-5.x and o-series models only accept the default temperature and
 * take max_completion_tokens instead of max_tokens.
 */
export function usesFixedSampling(model: string): boolean {
  return model.startsWith("gpt-5") || /^o\d/.test(model);
}

function httpInfo(error: unknown): HttpErrorInfo | undefined {
  if (error instanceof OpenAI.APIError && typeof error.status === "number") {
    return {
      status: error.status,
      code: error.code ?? error.type ?? undefined,
      requestId: error.request_id ?? undefined,
      message: error.message || "unknown error",
    };
  }
  return undefined;
}

/**
 * Map gateway chat history onto Chat Completions messages. Tool results
 * become `tool` messages; tool uses become assistant `tool_calls`.
 */
export function toOpenAIMessages(messages: readonly ChatMessage[]): OpenAIMessage[] {
  const out: OpenAIMessage[] = [];

  for (const message of messages) {
    if (message.role === "user") {
      if (typeof message.content === "string") {
        out.push({ role: "user", content: message.content });
        continue;
      }
      const text: string[] = [];
      for (const block of message.content) {
        if (block.type === "tool_result") {
          out.push({ role: "tool", tool_call_id: block.tool_use_id, content: block.content });
        } else {
          text.push(block.text);
        }
      }
      if (text.length > 0) out.push({ role: "user", content: text.join("\n") });
      continue;
    }

    if (typeof message.content === "string") {
      out.push({ role: "assistant", content: message.content });
      continue;
    }

    const text = message.content.flatMap((block) => (block.type === "text" ? [block.text] : []));
    const toolCalls = message.content.flatMap((block) =>
      block.type === "tool_use"
        ? [{ id: block.id, type: "function" as const, function: { name: block.name, arguments: JSON.stringify(block.input) } }]
        : []
    );
    out.push({
      role: "assistant",
      content: text.length > 0 ? text.join("") : null,
      ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
    });
  }

  return out;
}

function parseToolArguments(raw: string, provider: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw || "{}");
  } catch (error) {
    throw new ModelTransientError(`${provider}_tool_arguments_not_json`, "malformed", provider, error);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ModelTransientError(`${provider}_tool_arguments_not_object`, "malformed", provider);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function stopReasonOf(finishReason: string | null | undefined): StopReason {
  switch (finishReason) {
    case "tool_calls":
      return "tool_use";
    case "length":
      return "max_tokens";
    default:
      return "end_turn";
  }
}

function usageOf(usage: OpenAI.Completions.CompletionUsage | undefined): UsageMetrics {
  return {
    input_tokens: usage?.prompt_tokens ?? 0,
    output_tokens: usage?.completion_tokens ?? 0,
  };
}

export type OpenAICompatibleProvider = "openai" | "ollama";

/**
 * Chat Completions gateway. Also serves Ollama through its
 * OpenAI-compatible endpoint (no tool calling there).
 */
export class OpenAIGateway implements ModelGateway {
  readonly name: OpenAICompatibleProvider;
  readonly model: string;
  readonly temperature: number;
  readonly supportsTools: boolean;

  // Lazy initialization to allow construction without an API key
  private client: OpenAI | null = null;

  constructor(provider: OpenAICompatibleProvider, model: string, temperature: number) {
    this.name = provider;
    this.model = model;
    this.temperature = temperature;
    this.supportsTools = provider === "openai";
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;

    if (this.name === "ollama") {
      this.client = new OpenAI({ apiKey: "ollama", baseURL: `${config.llm.ollamaBaseUrl.replace(/\/$/, "")}/v1` });
      return this.client;
    }

    const apiKey = config.llm.openaiApiKey;
    if (!apiKey) {
      throw new ConfigurationError(
        "OpenAI API key not configured",
        "OPENAI_API_KEY",
        "Please set OPENAI_API_KEY in your environment or .env file."
      );
    }
    this.client = new OpenAI({ apiKey });
    return this.client;
  }

  private samplingParams(): { temperature?: number; max_tokens?: number; max_completion_tokens?: number } {
    if (usesFixedSampling(this.model)) {
      return { max_completion_tokens: MAX_OUTPUT_TOKENS };
    }
    return { temperature: this.temperature, max_tokens: MAX_OUTPUT_TOKENS };
  }

  private buildMessages(args: InvokeArgs, system: string): OpenAIMessage[] {
    return [
      { role: "system", content: system },
      ...toOpenAIMessages(args.messages ?? []),
      { role: "user", content: args.user },
    ];
  }

  async invoke(args: InvokeArgs, opts: CallOpts): Promise<InvokeResult> {
    return runModelCall(
      { provider: this.name, model: this.model, operation: "invoke", opts, httpInfo },
      async (signal, idempotencyKey) => {
        const response = await this.getClient().chat.completions.create(
          {
            model: this.model,
            messages: this.buildMessages(args, args.system),
            ...this.samplingParams(),
          },
          { signal, headers: { "Idempotency-Key": idempotencyKey } }
        );
        return {
          content: requireText(response.choices[0]?.message?.content, this.name),
          usage: usageOf(response.usage),
        };
      }
    );
  }

  async structured<S extends z.ZodTypeAny>(
    args: InvokeArgs,
    schema: S,
    opts: CallOpts
  ): Promise<StructuredResult<z.infer<S>>> {
    // json_object mode requires the word JSON in the prompt
    const system = /json/i.test(args.system) ? args.system : `${args.system}\n\nRespond with a single JSON object.`;

    return runModelCall(
      { provider: this.name, model: this.model, operation: "structured", opts, httpInfo },
      async (signal, idempotencyKey) => {
        const response = await this.getClient().chat.completions.create(
          {
            model: this.model,
            messages: this.buildMessages(args, system),
            response_format: { type: "json_object" },
            ...this.samplingParams(),
          },
          { signal, headers: { "Idempotency-Key": idempotencyKey } }
        );
        return {
          value: parseStructured(response.choices[0]?.message?.content, schema, this.name),
          usage: usageOf(response.usage),
        };
      }
    );
  }

  async chatWithTools(args: ChatWithToolsArgs, opts: CallOpts): Promise<ChatWithToolsResult> {
    if (!this.supportsTools) {
      throw new ConfigurationError(`${this.name} does not support tool calling`, "LLM_PROVIDER");
    }

    return runModelCall(
      { provider: this.name, model: this.model, operation: "chat_with_tools", opts, httpInfo },
      async (signal, idempotencyKey) => {
        const response = await this.getClient().chat.completions.create(
          {
            model: this.model,
            messages: [{ role: "system", content: args.system }, ...toOpenAIMessages(args.messages)],
            tools: args.tools.map((tool) => ({
              type: "function" as const,
              function: { name: tool.name, description: tool.description, parameters: tool.input_schema },
            })),
            ...this.samplingParams(),
          },
          { signal, headers: { "Idempotency-Key": idempotencyKey } }
        );

        const choice = response.choices[0];
        if (!choice) {
          throw new ModelTransientError(`${this.name}_empty_response`, "empty", this.name);
        }

        const content: ContentBlock[] = [];
        if (choice.message.content) {
          content.push({ type: "text", text: choice.message.content });
        }
        for (const call of choice.message.tool_calls ?? []) {
          content.push({
            type: "tool_use",
            id: call.id,
            name: call.function.name,
            input: parseToolArguments(call.function.arguments, this.name),
          });
        }

        log.debug(
          { provider: this.name, tool_calls: choice.message.tool_calls?.length ?? 0, finish_reason: choice.finish_reason },
          "tool turn complete"
        );

        return {
          content,
          stop_reason: stopReasonOf(choice.finish_reason),
          usage: usageOf(response.usage),
        };
      }
    );
  }
}
