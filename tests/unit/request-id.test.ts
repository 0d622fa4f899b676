import { describe, it, expect } from "vitest";
import { IncomingMessage } from "node:http";
import { Socket } from "node:net";
import { generateRequestId, requestIdFromHeaders } from "../../src/utils/request-id.js";

function incoming(headers: Record<string, string>): IncomingMessage {
  const message = new IncomingMessage(new Socket());
  message.headers = headers;
  return message;
}

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

describe("request-id utilities", () => {
  it("generates unique UUID v4 ids", () => {
    const first = generateRequestId();
    expect(first).toMatch(UUID_V4);
    expect(generateRequestId()).not.toBe(first);
  });

  it("reuses a trimmed incoming X-Request-Id", () => {
    expect(requestIdFromHeaders(incoming({ "x-request-id": "  req-123  " }))).toBe("req-123");
  });

  it("mints an id when the header is missing or blank", () => {
    expect(requestIdFromHeaders(incoming({}))).toMatch(UUID_V4);
    expect(requestIdFromHeaders(incoming({ "x-request-id": "   " }))).toMatch(UUID_V4);
  });
});
