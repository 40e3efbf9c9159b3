import { describe, expect, it } from "vitest";
import {
  createLimitErrorMatcher,
  createUniqueHash,
  parseTimestamp,
  parseUsageLine,
} from "./event-parser.js";

function record(overrides: Record<string, unknown> = {}, message: Record<string, unknown> = {}): string {
  return JSON.stringify({
    timestamp: "2025-01-15T10:00:00.000Z",
    sessionId: "session-1",
    requestId: "req-1",
    message: {
      id: "msg-1",
      model: "claude-sonnet-4-20250514",
      usage: {
        input_tokens: 100,
        output_tokens: 50,
        cache_creation_input_tokens: 10,
        cache_read_input_tokens: 5,
      },
      ...message,
    },
    ...overrides,
  });
}

describe("parseUsageLine", () => {
  it("parses a complete record", () => {
    const result = parseUsageLine(record({ costUSD: 0.25 }), { projectName: "my-project" });
    expect(result).toEqual({
      ok: true,
      event: {
        sessionId: "session-1",
        timestamp: new Date("2025-01-15T10:00:00.000Z"),
        model: "claude-sonnet-4-20250514",
        tokens: {
          inputTokens: 100,
          outputTokens: 50,
          cacheCreationTokens: 10,
          cacheReadTokens: 5,
        },
        costUSD: 0.25,
        isLimitError: false,
        messageId: "msg-1",
        requestId: "req-1",
        projectName: "my-project",
      },
    });
  });

  it("defaults a missing output count to zero", () => {
    const result = parseUsageLine(record({}, { usage: { input_tokens: 42 } }));
    expect(result.ok && result.event.tokens).toEqual({
      inputTokens: 42,
      outputTokens: 0,
      cacheCreationTokens: 0,
      cacheReadTokens: 0,
    });
  });

  it("reads the cost from the message when the record has none", () => {
    const result = parseUsageLine(record({}, { costUSD: 0.5 }));
    expect(result.ok && result.event.costUSD).toBe(0.5);
  });

  it("leaves cost null when neither level has one", () => {
    const result = parseUsageLine(record());
    expect(result.ok && result.event.costUSD).toBeNull();
  });

  it("uses unknown as the project name by default", () => {
    const result = parseUsageLine(record());
    expect(result.ok && result.event.projectName).toBe("unknown");
  });

  it.each([
    ["", "empty"],
    ["   ", "empty"],
    ["{not json", "invalid-json"],
    [JSON.stringify({ type: "summary", summary: "Refactor", leafUuid: "x" }), "summary"],
    [JSON.stringify({ timestamp: "2025-01-15T10:00:00Z", message: {} }), "invalid-schema"],
    [JSON.stringify({ timestamp: "2025-01-15T10:00:00Z" }), "invalid-schema"],
    [record({}, { usage: { input_tokens: -1, output_tokens: 5 } }), "invalid-schema"],
    [record({ timestamp: "2025-01-15 10:00:00" }), "invalid-timestamp"],
    [record({ timestamp: "2025-02-30T10:00:00Z" }), "invalid-timestamp"],
    [record({}, { usage: { cache_read_input_tokens: 10 } }), "missing-tokens"],
    [record({}, { model: "<synthetic>" }), "synthetic-model"],
  ])("rejects %s as %s", (line, reason) => {
    expect(parseUsageLine(line)).toEqual({ ok: false, reason });
  });

  it("flags quota exhaustion errors", () => {
    const line = record(
      { isApiErrorMessage: true },
      {
        content: [{ type: "text", text: "Claude AI usage limit reached|1736935200" }],
      },
    );
    const result = parseUsageLine(line);
    expect(result.ok && result.event.isLimitError).toBe(true);
  });

  it("ignores the phrase outside API error records", () => {
    const line = record({}, { content: [{ type: "text", text: "Claude AI usage limit reached" }] });
    const result = parseUsageLine(line);
    expect(result.ok && result.event.isLimitError).toBe(false);
  });

  it("keeps a synthetic limit error as a zero-usage marker", () => {
    const line = record(
      { isApiErrorMessage: true, costUSD: 1 },
      {
        model: "<synthetic>",
        usage: { input_tokens: 3, output_tokens: 4 },
        content: "Claude AI usage limit reached",
      },
    );
    const result = parseUsageLine(line);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event.model).toBeNull();
      expect(result.event.isLimitError).toBe(true);
      expect(result.event.costUSD).toBe(0);
      expect(result.event.tokens.inputTokens).toBe(0);
    }
  });

  it("accepts a custom limit matcher", () => {
    const line = record({ isApiErrorMessage: true }, { content: "quota exceeded" });
    const result = parseUsageLine(line, { limitErrorMatcher: createLimitErrorMatcher("quota exceeded") });
    expect(result.ok && result.event.isLimitError).toBe(true);
  });
});

describe("parseTimestamp", () => {
  it("accepts offsets and fractional seconds", () => {
    expect(parseTimestamp("2025-01-15T12:30:00+02:00")?.toISOString()).toBe(
      "2025-01-15T10:30:00.000Z",
    );
    expect(parseTimestamp("2025-01-15T10:30:00.123Z")?.toISOString()).toBe(
      "2025-01-15T10:30:00.123Z",
    );
  });

  it("rejects dates without a zone", () => {
    expect(parseTimestamp("2025-01-15T10:30:00")).toBeNull();
  });

  it("rejects leap days outside leap years", () => {
    expect(parseTimestamp("2025-02-29T00:00:00Z")).toBeNull();
    expect(parseTimestamp("2024-02-29T00:00:00Z")?.toISOString()).toBe("2024-02-29T00:00:00.000Z");
  });
});

describe("createUniqueHash", () => {
  it("joins message and request ids", () => {
    expect(createUniqueHash({ messageId: "m", requestId: "r" })).toBe("m:r");
  });

  it("returns null when either id is missing", () => {
    expect(createUniqueHash({ messageId: "m", requestId: null })).toBeNull();
    expect(createUniqueHash({ messageId: null, requestId: "r" })).toBeNull();
  });
});
