import type { PlanClassification } from "./plan-classifier.js";
import type { LimitPrediction } from "./projection.js";
import type { DailyStats, MonthlyStats, UsageStats } from "./reports.js";
import type { Block, ModelBreakdown, Session, TokenCounts } from "./types.js";
import { getRawTokens } from "./types.js";

export interface ModelBreakdownJson extends TokenCounts {
  modelName: string;
  cost: number;
}

export interface UsageRowJson extends TokenCounts {
  totalTokens: number;
  totalCost: number;
  modelsUsed: string[];
  modelBreakdowns?: ModelBreakdownJson[];
}

export interface DailyJson extends UsageRowJson {
  date: string;
}

export interface MonthlyJson extends UsageRowJson {
  month: string;
}

export interface SessionJson {
  sessionId: string;
  projectName: string;
  startTime: string;
  endTime: string | null;
  models: string[];
  totalTokens: number;
  weightedTokens: number;
  totalCost: number;
  messageCount: number;
  hasLimitError: boolean;
}

export interface BlockJson {
  id: string;
  startTime: string;
  endTime: string;
  nominalEndTime: string;
  actualEndTime: string | null;
  isActive: boolean;
  isGap: boolean;
  entries: number;
  tokenCounts: TokenCounts;
  totalTokens: number;
  costUSD: number;
  models: string[];
  burnRate: { tokensPerMinute: number; costPerHour: number } | null;
  projection: { totalTokens: number; totalCost: number; remainingMinutes: number } | null;
  weightedTotalTokens: number;
  contextConsumptionRate: number | null;
  hasLimitError: boolean;
  modelBreakdown?: ModelBreakdownJson[];
}

export interface TotalsJson extends TokenCounts {
  totalTokens: number;
  totalCost: number;
}

function toTokenCounts(tokens: TokenCounts): TokenCounts {
  return {
    inputTokens: tokens.inputTokens,
    outputTokens: tokens.outputTokens,
    cacheCreationTokens: tokens.cacheCreationTokens,
    cacheReadTokens: tokens.cacheReadTokens,
  };
}

export function toModelBreakdownJson(
  breakdown: ReadonlyMap<string, ModelBreakdown>,
): ModelBreakdownJson[] {
  return [...breakdown]
    .map(([modelName, usage]) => ({ modelName, ...toTokenCounts(usage), cost: usage.costUSD }))
    .sort((a, b) => b.cost - a.cost);
}

function toUsageRowJson(stats: UsageStats, breakdown: boolean): UsageRowJson {
  return {
    ...toTokenCounts(stats),
    totalTokens: stats.totalTokens,
    totalCost: stats.costUSD,
    modelsUsed: [...stats.models],
    ...(breakdown ? { modelBreakdowns: toModelBreakdownJson(stats.modelBreakdowns) } : {}),
  };
}

export function toDailyJson(day: DailyStats, breakdown = false): DailyJson {
  return { date: day.date, ...toUsageRowJson(day, breakdown) };
}

export function toMonthlyJson(month: MonthlyStats, breakdown = false): MonthlyJson {
  return { month: month.month, ...toUsageRowJson(month, breakdown) };
}

export function toSessionJson(session: Session): SessionJson {
  let totalTokens = 0;
  let messageCount = 0;
  for (const usage of session.modelUsage.values()) {
    totalTokens += getRawTokens(usage);
    messageCount += usage.messageCount;
  }
  return {
    sessionId: session.sessionId,
    projectName: session.projectName,
    startTime: session.startTime.toISOString(),
    endTime: session.endTime?.toISOString() ?? null,
    models: [...session.modelUsage.keys()],
    totalTokens,
    weightedTokens: session.totalWeightedTokens,
    totalCost: session.costUSD,
    messageCount,
    hasLimitError: session.hasLimitError,
  };
}

export function toBlockJson(block: Block, breakdown = false): BlockJson {
  return {
    id: block.id,
    startTime: block.startTime.toISOString(),
    endTime: block.endTime.toISOString(),
    nominalEndTime: block.nominalEndTime.toISOString(),
    actualEndTime: block.actualEndTime?.toISOString() ?? null,
    isActive: block.isActive,
    isGap: block.isGap,
    entries: block.sessionCount,
    tokenCounts: toTokenCounts(block.tokenCounts),
    totalTokens: block.totalTokens,
    costUSD: block.costUSD,
    models: [...block.models],
    burnRate: block.burnRate != null ? { ...block.burnRate } : null,
    projection: block.projection != null ? { ...block.projection } : null,
    weightedTotalTokens: block.weightedTotalTokens,
    contextConsumptionRate: block.contextConsumptionRate,
    hasLimitError: block.hasLimitError,
    ...(breakdown ? { modelBreakdown: toModelBreakdownJson(block.modelBreakdown) } : {}),
  };
}

export function toTotalsJson(totals: { tokens: TokenCounts; totalTokens: number; costUSD: number }): TotalsJson {
  return {
    ...toTokenCounts(totals.tokens),
    totalTokens: totals.totalTokens,
    totalCost: totals.costUSD,
  };
}

export interface PlanJson {
  tier: string;
  confidence: number;
  evidence: string[];
  maxObservedTokens: number;
  hasLimitErrors: boolean;
  opusUsagePercentage: number;
}

export function toPlanJson(plan: PlanClassification): PlanJson {
  return { ...plan, evidence: [...plan.evidence] };
}

export interface LimitPredictionJson {
  factor: string;
  minutesRemaining: number;
  at: string;
  tokensPerMinute: number;
  confidence: number;
  tokenLimit: number;
}

export function toLimitPredictionJson(prediction: LimitPrediction): LimitPredictionJson {
  return { ...prediction, at: prediction.at.toISOString() };
}
