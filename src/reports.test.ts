import { beforeEach, describe, expect, it } from "vitest";
import {
  aggregateMonthly,
  DailyAggregator,
  filterBlocksByDate,
  filterDailyByDate,
  filterSessionsByDate,
  sortBlocks,
  sortDaily,
  sortSessions,
  sumUsage,
  takeRecentBlocks,
  takeRecentDaily,
  takeRecentSessions,
} from "./reports.js";
import { createEmptyTokenCounts, type Block, type Session, type UsageEvent } from "./types.js";

const SONNET = "claude-sonnet-4-20250514";
const OPUS = "claude-opus-4-20250514";

function makeEvent(timestamp: string, overrides: Partial<UsageEvent> = {}): UsageEvent {
  return {
    sessionId: "session-1",
    timestamp: new Date(timestamp),
    model: SONNET,
    tokens: { inputTokens: 100, outputTokens: 50, cacheCreationTokens: 10, cacheReadTokens: 5 },
    costUSD: 0.25,
    isLimitError: false,
    messageId: null,
    requestId: null,
    projectName: "my-project",
    ...overrides,
  };
}

function makeSession(id: string, start: string, costUSD: number): Session {
  return {
    sessionId: id,
    projectName: "my-project",
    startTime: new Date(start),
    endTime: new Date(start),
    modelUsage: new Map(),
    totalWeightedTokens: 0,
    costUSD,
    eventCount: 1,
    hasLimitError: false,
  };
}

function makeBlock(start: string, isGap = false): Block {
  const startTime = new Date(start);
  return {
    id: isGap ? `gap-${startTime.toISOString()}` : startTime.toISOString(),
    startTime,
    nominalEndTime: startTime,
    endTime: startTime,
    actualEndTime: null,
    isActive: false,
    isGap,
    sessionCount: 0,
    tokenCounts: createEmptyTokenCounts(),
    totalTokens: 0,
    costUSD: 0,
    models: [],
    burnRate: null,
    projection: null,
    modelBreakdown: new Map(),
    weightedTotalTokens: 0,
    contextConsumptionRate: null,
    hasLimitError: false,
  };
}

describe("DailyAggregator", () => {
  let aggregator: DailyAggregator;

  beforeEach(() => {
    aggregator = new DailyAggregator({ timezone: "UTC" });
    aggregator.add(makeEvent("2025-02-01T08:00:00.000Z", { costUSD: 0.1 }));
    aggregator.add(makeEvent("2025-01-15T10:00:00.000Z"));
    aggregator.add(makeEvent("2025-01-15T11:00:00.000Z", { model: OPUS, costUSD: 1 }));
    aggregator.add(makeEvent("2025-01-16T09:00:00.000Z", { costUSD: 0.5 }));
  });

  it("groups events by calendar day in ascending order", () => {
    const daily = aggregator.daily();
    expect(daily.map((day) => day.date)).toEqual(["2025-01-15", "2025-01-16", "2025-02-01"]);

    const [first] = daily;
    expect(first?.inputTokens).toBe(200);
    expect(first?.cacheReadTokens).toBe(10);
    expect(first?.totalTokens).toBe(330);
    expect(first?.costUSD).toBe(1.25);
    expect(first?.models).toEqual([SONNET, OPUS]);
    expect(first?.modelBreakdowns.get(OPUS)?.costUSD).toBe(1);
  });

  it("assigns days in the configured zone", () => {
    const tokyo = new DailyAggregator({ timezone: "Asia/Tokyo" });
    tokyo.add(makeEvent("2025-01-15T20:00:00.000Z"));
    expect(tokyo.daily()[0]?.date).toBe("2025-01-16");
  });

  it("counts model-less markers without listing a model", () => {
    const markers = new DailyAggregator({ timezone: "UTC" });
    markers.add(
      makeEvent("2025-01-15T10:00:00.000Z", {
        model: null,
        costUSD: 0,
        isLimitError: true,
        tokens: createEmptyTokenCounts(),
      }),
    );
    const [day] = markers.daily();
    expect(day?.models).toEqual([]);
    expect(day?.totalTokens).toBe(0);
  });

  it("rolls days up into months", () => {
    const monthly = aggregateMonthly(aggregator.daily());
    expect(monthly.map((month) => month.month)).toEqual(["2025-01", "2025-02"]);
    expect(monthly[0]?.totalTokens).toBe(495);
    expect(monthly[0]?.costUSD).toBe(1.75);
    expect(monthly[0]?.modelBreakdowns.get(SONNET)?.inputTokens).toBe(200);
  });

  it("filters and orders days", () => {
    const daily = aggregator.daily();
    expect(filterDailyByDate(daily, "2025-01-16").map((day) => day.date)).toEqual([
      "2025-01-16",
      "2025-02-01",
    ]);
    expect(filterDailyByDate(daily, undefined, "2025-01-15")).toHaveLength(1);
    expect(sortDaily(daily, "desc")[0]?.date).toBe("2025-02-01");
    expect(takeRecentDaily(daily, 2).map((day) => day.date)).toEqual(["2025-01-16", "2025-02-01"]);
  });

  it("sums rows", () => {
    const total = sumUsage(aggregator.daily());
    expect(total.tokens.inputTokens).toBe(400);
    expect(total.totalTokens).toBe(660);
    expect(total.costUSD).toBeCloseTo(1.85, 10);
  });
});

describe("session helpers", () => {
  const sessions = [
    makeSession("a", "2025-01-15T10:00:00.000Z", 1),
    makeSession("b", "2025-01-16T10:00:00.000Z", 3),
    makeSession("c", "2025-01-17T10:00:00.000Z", 1),
  ];

  it("sorts by cost and keeps start order on ties", () => {
    expect(sortSessions(sessions, "desc").map((s) => s.sessionId)).toEqual(["b", "a", "c"]);
    expect(sortSessions(sessions, "asc").map((s) => s.sessionId)).toEqual(["a", "c", "b"]);
  });

  it("filters by start date", () => {
    expect(
      filterSessionsByDate(sessions, "2025-01-16", "2025-01-16", "UTC").map((s) => s.sessionId),
    ).toEqual(["b"]);
  });

  it("takes the newest sessions first", () => {
    expect(takeRecentSessions(sessions, 2).map((s) => s.sessionId)).toEqual(["c", "b"]);
  });
});

describe("block helpers", () => {
  const blocks = [
    makeBlock("2025-01-15T10:00:00.000Z"),
    makeBlock("2025-01-15T15:00:00.000Z", true),
    makeBlock("2025-01-16T10:00:00.000Z"),
    makeBlock("2025-01-17T10:00:00.000Z"),
  ];

  it("drops gaps when filtering", () => {
    expect(filterBlocksByDate(blocks, "2025-01-15", "2025-01-16", "UTC").map((b) => b.id)).toEqual([
      "2025-01-15T10:00:00.000Z",
      "2025-01-16T10:00:00.000Z",
    ]);
  });

  it("takes the latest real blocks in start order", () => {
    expect(takeRecentBlocks(blocks, 2).map((b) => b.id)).toEqual([
      "2025-01-16T10:00:00.000Z",
      "2025-01-17T10:00:00.000Z",
    ]);
    expect(takeRecentBlocks(blocks, 0)).toEqual([]);
  });

  it("sorts newest first on request", () => {
    expect(sortBlocks(blocks, "desc")[0]?.id).toBe("2025-01-17T10:00:00.000Z");
  });
});
