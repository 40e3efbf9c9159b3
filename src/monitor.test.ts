import { stripVTControlCharacters } from "node:util";
import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "./config.js";
import { computeMonitorFrame } from "./monitor.js";
import { formatTokensCompact, progressBar, renderMonitorFrame, usageLevel } from "./monitor-view.js";
import { createEmptyTokenCounts, type Session } from "./types.js";

const NOW = new Date("2025-01-15T12:00:00.000Z");
const SONNET = "claude-sonnet-4-20250514";
const OPUS = "claude-opus-4-20250514";

function makeSession(startMinutesAgo: number, endMinutesAgo: number, tokens: number): Session {
  return {
    sessionId: `session-${startMinutesAgo}`,
    projectName: "my-project",
    startTime: new Date(NOW.getTime() - startMinutesAgo * 60_000),
    endTime: new Date(NOW.getTime() - endMinutesAgo * 60_000),
    modelUsage: new Map([
      [
        SONNET,
        {
          model: SONNET,
          ...createEmptyTokenCounts(),
          inputTokens: tokens,
          messageCount: 1,
          weightedTokens: tokens,
          costUSD: 0,
        },
      ],
    ]),
    totalWeightedTokens: tokens,
    costUSD: 0,
    eventCount: 1,
    hasLimitError: false,
  };
}

const baseOptions = { plan: "pro", timezone: "UTC", activeOnly: false, recent: 5 } as const;

describe("progressBar", () => {
  it("fills in proportion and clamps", () => {
    expect(progressBar(20)).toBe(`${"=".repeat(4)}${"-".repeat(16)}`);
    expect(progressBar(150, 10)).toBe("=".repeat(10));
    expect(progressBar(-5, 4)).toBe("----");
  });
});

describe("formatTokensCompact", () => {
  it("abbreviates thousands and millions", () => {
    expect(formatTokensCompact(950)).toBe("950");
    expect(formatTokensCompact(1_500)).toBe("1.5k");
    expect(formatTokensCompact(2_500_000)).toBe("2.5M");
  });
});

describe("usageLevel", () => {
  it("compares against both thresholds", () => {
    expect(usageLevel(50, 75, 90)).toBe("normal");
    expect(usageLevel(75, 75, 90)).toBe("warning");
    expect(usageLevel(95, 75, 90)).toBe("critical");
  });
});

describe("computeMonitorFrame", () => {
  const sessions = [makeSession(60, 30, 3_000)];

  it("predicts the limit before the block ends", () => {
    const frame = computeMonitorFrame(sessions, baseOptions, { ...DEFAULT_CONFIG }, NOW);

    expect(frame.tokenLimit).toBe(7_000);
    expect(frame.activeBlock?.id).toBe("2025-01-15T11:00:00.000Z");
    expect(frame.resetTime.toISOString()).toBe("2025-01-15T16:00:00.000Z");
    expect(frame.limitPrediction?.factor).toBe("token-limit");
    expect(frame.limitPrediction?.minutesRemaining).toBe(40);
    expect(frame.detectedPlan?.tier).toBe("pro");
    expect(frame.recentBlocks).toHaveLength(1);
  });

  it("uses the configured reset hour", () => {
    const frame = computeMonitorFrame(sessions, { ...baseOptions, resetHour: 12 }, { ...DEFAULT_CONFIG }, NOW);
    expect(frame.resetTime.toISOString()).toBe("2025-01-16T12:00:00.000Z");
  });

  it("reports no prediction without an active block", () => {
    const frame = computeMonitorFrame(
      [makeSession(7 * 60, 7 * 60 - 10, 3_000)],
      { ...baseOptions, activeOnly: true },
      { ...DEFAULT_CONFIG },
      NOW,
    );
    expect(frame.activeBlock).toBeNull();
    expect(frame.limitPrediction).toBeNull();
    expect(frame.recentBlocks).toEqual([]);
    expect(frame.resetTime.toISOString()).toBe("2025-01-15T17:00:00.000Z");
  });
});

describe("renderMonitorFrame", () => {
  it("renders the active block", () => {
    const frame = computeMonitorFrame([makeSession(60, 30, 3_000)], baseOptions, { ...DEFAULT_CONFIG }, NOW);
    const lines = renderMonitorFrame(frame).map((line) => stripVTControlCharacters(line));

    expect(lines).toEqual([
      "  Plan: Pro | 12:00",
      `  ⏰ 4h 00m left [${"=".repeat(4)}${"-".repeat(16)}] ends 16:00`,
      `  Tokens: 3,000 / 7,000 (43%) [${"=".repeat(9)}${"-".repeat(11)}]`,
      "  🔥 100 tokens/min | $0.00/h",
      "  Cost: $0.00 | Used: 43% | Projected: 100%",
      "  Models: sonnet-4",
      "  Limit reached before reset: 12:40 (in 40m)",
      "  Next reset: 16:00",
      "  ",
      "  Recent blocks",
      "  ● 11:00       3,000  $0.00",
    ]);
  });

  it("mentions a detected plan that differs from the selected one", () => {
    const frame = computeMonitorFrame(
      [makeSession(60, 30, 3_000)],
      { ...baseOptions, plan: "max20", activeOnly: true },
      { ...DEFAULT_CONFIG },
      NOW,
    );
    const [header] = renderMonitorFrame(frame).map((line) => stripVTControlCharacters(line));
    expect(header).toBe("  Plan: Max20 (usage suggests Pro, 42% confidence) | 12:00");
  });

  it("warns about the Opus limit on Max5", () => {
    const opusSession: Session = {
      ...makeSession(60, 30, 3_000),
      modelUsage: new Map([
        [
          OPUS,
          {
            model: OPUS,
            ...createEmptyTokenCounts(),
            inputTokens: 3_000,
            messageCount: 1,
            weightedTokens: 15_000,
            costUSD: 0,
          },
        ],
      ]),
      totalWeightedTokens: 15_000,
    };
    const frame = computeMonitorFrame([opusSession], { ...baseOptions, plan: "max5" }, { ...DEFAULT_CONFIG }, NOW);
    const lines = renderMonitorFrame(frame).map((line) => stripVTControlCharacters(line));

    expect(frame.limitPrediction?.tokenLimit).toBe(28_000);
    expect(lines).toContain("  Opus limit on Max5: 12:26 (in 26m)");
  });
});
