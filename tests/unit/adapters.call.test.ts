import { describe, it, expect } from "vitest";
import { z } from "zod";
import { parseStructured, requireText } from "../../src/adapters/llm/call.js";
import { ConfigurationError, ModelTransientError, UpstreamHTTPError, UpstreamTimeoutError, toModelError } from "../../src/adapters/llm/errors.js";

const Shape = z.object({ title: z.string(), count: z.number() });

function transient(fn: () => unknown): ModelTransientError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ModelTransientError) return error;
    throw error;
  }
  throw new Error("expected a ModelTransientError");
}

describe("parseStructured", () => {
  it("returns the validated value", () => {
    expect(parseStructured('{"title":"a","count":2}', Shape, "openai")).toEqual({ title: "a", count: 2 });
  });

  it("treats blank content as empty", () => {
    const error = transient(() => parseStructured("  ", Shape, "openai"));
    expect(error.kind).toBe("empty");
    expect(error.message).toBe("openai_empty_response");
  });

  it("does not strip code fences", () => {
    const error = transient(() => parseStructured('```json\n{"title":"a","count":2}\n```', Shape, "anthropic"));
    expect(error.kind).toBe("malformed");
    expect(error.message).toBe("anthropic_response_not_json");
  });

  it("lists schema issues", () => {
    const error = transient(() => parseStructured('{"title":"a"}', Shape, "openai"));
    expect(error.kind).toBe("malformed");
    expect(error.message).toBe("openai_response_invalid_schema: count: Required");
  });
});

describe("requireText", () => {
  it("passes text through", () => {
    expect(requireText("hello", "ollama")).toBe("hello");
  });

  it("rejects null", () => {
    expect(transient(() => requireText(null, "ollama")).kind).toBe("empty");
  });
});

describe("toModelError", () => {
  it("maps timeouts", () => {
    const mapped = toModelError(new UpstreamTimeoutError("timed out", "openai", "invoke", 100), "openai");
    expect(mapped).toBeInstanceOf(ModelTransientError);
    expect(mapped instanceof ModelTransientError && mapped.kind).toBe("timeout");
  });

  it("maps rejected credentials to a configuration error", () => {
    const mapped = toModelError(new UpstreamHTTPError("unauthorized", "anthropic", 401, undefined, undefined, 10), "anthropic");
    expect(mapped).toBeInstanceOf(ConfigurationError);
    expect(mapped instanceof ConfigurationError && mapped.configKey).toBe("anthropic_api_key");
  });

  it("maps other HTTP failures to transport", () => {
    const mapped = toModelError(new UpstreamHTTPError("bad gateway", "openai", 502, undefined, "req_1", 10), "openai");
    expect(mapped instanceof ModelTransientError && mapped.kind).toBe("transport");
  });

  it("passes known errors through", () => {
    const original = new ConfigurationError("missing", "OPENAI_API_KEY");
    expect(toModelError(original, "openai")).toBe(original);
  });

  it("wraps anything else as transport", () => {
    const mapped = toModelError("socket closed", "ollama");
    expect(mapped.message).toBe("socket closed");
    expect(mapped instanceof ModelTransientError && mapped.kind).toBe("transport");
  });
});
