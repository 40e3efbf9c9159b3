import { describe, expect, it } from "vitest";
import { toBlockJson, toLimitPredictionJson, toModelBreakdownJson, toSessionJson } from "./report-json.js";
import { createEmptyTokenCounts, type Block, type ModelBreakdown, type Session } from "./types.js";

const SONNET = "claude-sonnet-4-20250514";
const OPUS = "claude-opus-4-20250514";

function breakdown(input: number, costUSD: number): ModelBreakdown {
  return { ...createEmptyTokenCounts(), inputTokens: input, weightedTokens: input, costUSD };
}

describe("toModelBreakdownJson", () => {
  it("lists models by descending cost", () => {
    const rows = toModelBreakdownJson(
      new Map([
        [SONNET, breakdown(100, 0.5)],
        [OPUS, breakdown(10, 2)],
      ]),
    );
    expect(rows.map((row) => row.modelName)).toEqual([OPUS, SONNET]);
    expect(rows[0]).toEqual({
      modelName: OPUS,
      inputTokens: 10,
      outputTokens: 0,
      cacheCreationTokens: 0,
      cacheReadTokens: 0,
      cost: 2,
    });
  });
});

describe("toSessionJson", () => {
  it("serialises dates and sums model usage", () => {
    const session: Session = {
      sessionId: "session-1",
      projectName: "my-project",
      startTime: new Date("2025-01-15T10:00:00.000Z"),
      endTime: null,
      modelUsage: new Map([
        [SONNET, { model: SONNET, ...createEmptyTokenCounts(), inputTokens: 70, outputTokens: 30, messageCount: 2, weightedTokens: 100, costUSD: 0.1 }],
      ]),
      totalWeightedTokens: 100,
      costUSD: 0.1,
      eventCount: 3,
      hasLimitError: true,
    };
    expect(toSessionJson(session)).toEqual({
      sessionId: "session-1",
      projectName: "my-project",
      startTime: "2025-01-15T10:00:00.000Z",
      endTime: null,
      models: [SONNET],
      totalTokens: 100,
      weightedTokens: 100,
      totalCost: 0.1,
      messageCount: 2,
      hasLimitError: true,
    });
  });
});

describe("toBlockJson", () => {
  const start = new Date("2025-01-15T10:00:00.000Z");
  const block: Block = {
    id: start.toISOString(),
    startTime: start,
    nominalEndTime: new Date("2025-01-15T15:00:00.000Z"),
    endTime: new Date("2025-01-15T10:30:00.000Z"),
    actualEndTime: new Date("2025-01-15T10:30:00.000Z"),
    isActive: true,
    isGap: false,
    sessionCount: 2,
    tokenCounts: { ...createEmptyTokenCounts(), inputTokens: 1800 },
    totalTokens: 1800,
    costUSD: 0.9,
    models: [SONNET],
    burnRate: { tokensPerMinute: 60, costPerHour: 1.8 },
    projection: null,
    modelBreakdown: new Map([[SONNET, breakdown(1800, 0.9)]]),
    weightedTotalTokens: 1800,
    contextConsumptionRate: 1,
    hasLimitError: false,
  };

  it("reports sessions as entries and leaves the breakdown out by default", () => {
    const json = toBlockJson(block);
    expect(json.entries).toBe(2);
    expect(json.endTime).toBe("2025-01-15T10:30:00.000Z");
    expect(json.burnRate).toEqual({ tokensPerMinute: 60, costPerHour: 1.8 });
    expect(json).not.toHaveProperty("modelBreakdown");
  });

  it("adds the breakdown on request", () => {
    expect(toBlockJson(block, true).modelBreakdown?.[0]?.modelName).toBe(SONNET);
  });
});

describe("toLimitPredictionJson", () => {
  it("serialises the time", () => {
    expect(
      toLimitPredictionJson({
        factor: "time-reset",
        minutesRemaining: 30,
        at: new Date("2025-01-15T12:30:00.000Z"),
        tokensPerMinute: 10,
        confidence: 0.7,
        tokenLimit: 7000,
      }),
    ).toEqual({
      factor: "time-reset",
      minutesRemaining: 30,
      at: "2025-01-15T12:30:00.000Z",
      tokensPerMinute: 10,
      confidence: 0.7,
      tokenLimit: 7000,
    });
  });
});
