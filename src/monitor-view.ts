import pc from "picocolors";
import { MINUTE_MS } from "./constants.js";
import { formatDuration, formatTime } from "./date-utils.js";
import { getPlanDisplayName, type PlanClassification, type PlanTier } from "./plan-classifier.js";
import type { LimitPrediction } from "./projection.js";
import { formatCurrency, formatModelsDisplay, formatNumber } from "./table.js";
import type { Block } from "./types.js";

export interface MonitorFrame {
  now: Date;
  timezone?: string;
  plan: PlanTier;
  tokenLimit: number;
  activeBlock: Block | null;
  recentBlocks: readonly Block[];
  limitPrediction: LimitPrediction | null;
  resetTime: Date;
  detectedPlan: PlanClassification | null;
  warningThreshold: number;
  criticalThreshold: number;
}

type Level = "normal" | "warning" | "critical";

export function progressBar(pct: number, width = 20): string {
  const clampedPct = Math.max(0, Math.min(100, pct));
  const filledWidth = Math.round((clampedPct / 100) * width);
  return "=".repeat(filledWidth) + "-".repeat(width - filledWidth);
}

export function formatTokensCompact(tokens: number): string {
  if (tokens >= 1_000_000) {
    return `${(tokens / 1_000_000).toFixed(1)}M`;
  }
  if (tokens >= 1000) {
    return `${(tokens / 1000).toFixed(1)}k`;
  }
  return String(Math.round(tokens));
}

export function usageLevel(pct: number, warning: number, critical: number): Level {
  if (pct >= critical) {
    return "critical";
  }
  return pct >= warning ? "warning" : "normal";
}

function paint(level: Level, text: string): string {
  switch (level) {
    case "critical":
      return pc.red(text);
    case "warning":
      return pc.yellow(text);
    default:
      return pc.green(text);
  }
}

function percentOf(value: number, limit: number): number {
  return limit > 0 ? Math.round((value * 100) / limit) : 0;
}

function renderActiveBlock(frame: MonitorFrame, block: Block): string[] {
  const { now, timezone, tokenLimit, warningThreshold, criticalThreshold } = frame;
  const lines: string[] = [];

  const blockMinutes = (block.nominalEndTime.getTime() - block.startTime.getTime()) / MINUTE_MS;
  const remainingMinutes = Math.max(0, (block.nominalEndTime.getTime() - now.getTime()) / MINUTE_MS);
  const timePct = blockMinutes > 0 ? ((blockMinutes - remainingMinutes) * 100) / blockMinutes : 0;
  lines.push(
    paint(
      usageLevel(timePct, warningThreshold, criticalThreshold),
      `⏰ ${formatDuration(remainingMinutes)} left [${progressBar(timePct)}] ends ${formatTime(block.nominalEndTime, timezone)}`,
    ),
  );

  const usedPct = percentOf(block.totalTokens, tokenLimit);
  lines.push(
    paint(
      usageLevel(usedPct, warningThreshold, criticalThreshold),
      `Tokens: ${formatNumber(block.totalTokens)} / ${formatNumber(tokenLimit)} (${usedPct}%) [${progressBar(usedPct)}]`,
    ),
  );

  const rate = block.burnRate;
  lines.push(
    rate != null
      ? `🔥 ${formatTokensCompact(rate.tokensPerMinute)} tokens/min | ${formatCurrency(rate.costPerHour)}/h`
      : "🔥 N/A",
  );

  const projectedTokens = block.projection?.totalTokens ?? block.totalTokens;
  const projectedPct = percentOf(projectedTokens, tokenLimit);
  lines.push(
    `Cost: ${formatCurrency(block.costUSD)} | Used: ${usedPct}% | ${paint(
      usageLevel(projectedPct, warningThreshold, criticalThreshold),
      `Projected: ${projectedPct}%`,
    )}`,
  );

  if (block.models.length > 0) {
    lines.push(`Models: ${formatModelsDisplay(block.models).split("\n").join(", ")}`);
  }
  if (block.hasLimitError) {
    lines.push(pc.red("Usage limit reached in this block"));
  }
  return lines;
}

function renderPrediction(frame: MonitorFrame): string | null {
  const prediction = frame.limitPrediction;
  if (prediction == null) {
    return null;
  }
  const when = `${formatTime(prediction.at, frame.timezone)} (in ${formatDuration(prediction.minutesRemaining)})`;
  switch (prediction.factor) {
    case "token-limit":
      return pc.red(`Limit reached before reset: ${when}`);
    case "opus-limit":
      return pc.red(`Opus limit on Max5: ${when}`);
    case "time-reset":
      return `Reset comes first: ${when}`;
  }
}

/**
 * Lines of one monitor screen. Pure: all inputs come from the frame.
 */
export function renderMonitorFrame(frame: MonitorFrame): string[] {
  const lines: string[] = [];
  const detected = frame.detectedPlan;
  const planLine =
    detected != null && detected.tier !== frame.plan
      ? `Plan: ${getPlanDisplayName(frame.plan)} (usage suggests ${getPlanDisplayName(detected.tier)}, ${Math.round(detected.confidence * 100)}% confidence)`
      : `Plan: ${getPlanDisplayName(frame.plan)}`;
  lines.push(pc.bold(`${planLine} | ${formatTime(frame.now, frame.timezone)}`));

  if (frame.activeBlock != null) {
    lines.push(...renderActiveBlock(frame, frame.activeBlock));
  } else {
    lines.push(pc.gray("No active block"));
  }

  const prediction = renderPrediction(frame);
  if (prediction != null) {
    lines.push(prediction);
  }
  lines.push(`Next reset: ${formatTime(frame.resetTime, frame.timezone)}`);

  if (frame.recentBlocks.length > 0) {
    lines.push("");
    lines.push(pc.bold("Recent blocks"));
    for (const block of frame.recentBlocks) {
      const marker = block.isActive ? pc.green("●") : " ";
      lines.push(
        `${marker} ${formatTime(block.startTime, frame.timezone)}  ${formatNumber(block.totalTokens).padStart(10)}  ${formatCurrency(block.costUSD)}`,
      );
    }
  }

  return lines.map((line) => `  ${line}`);
}
