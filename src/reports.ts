import { isWithinRange, toDateKey, toMonthKey } from "./date-utils.js";
import { MODEL_PRICING_RULES, type ModelPricing, type ModelRule } from "./models.js";
import { resolveEventCost } from "./session-reconstructor.js";
import {
  addTokenCounts,
  createEmptyTokenCounts,
  getTotalTokens,
  type Block,
  type ModelBreakdown,
  type Session,
  type SortOrder,
  type TokenCounts,
  type UsageEvent,
  type UsageEventSink,
} from "./types.js";

export interface UsageStats extends TokenCounts {
  models: string[];
  /** All four token types */
  totalTokens: number;
  costUSD: number;
  modelBreakdowns: Map<string, ModelBreakdown>;
}

export interface DailyStats extends UsageStats {
  date: string; // YYYY-MM-DD in the report timezone
}

export interface MonthlyStats extends UsageStats {
  month: string; // YYYY-MM
}

export interface DailyAggregatorOptions {
  timezone?: string;
  pricingRules?: readonly ModelRule<ModelPricing>[];
}

function createUsageStats(): UsageStats {
  return {
    ...createEmptyTokenCounts(),
    models: [],
    totalTokens: 0,
    costUSD: 0,
    modelBreakdowns: new Map(),
  };
}

function addModelUsage(
  stats: UsageStats,
  model: string,
  tokens: Readonly<TokenCounts>,
  costUSD: number,
): void {
  if (!stats.models.includes(model)) {
    stats.models.push(model);
  }
  let breakdown = stats.modelBreakdowns.get(model);
  if (breakdown == null) {
    breakdown = { ...createEmptyTokenCounts(), weightedTokens: 0, costUSD: 0 };
    stats.modelBreakdowns.set(model, breakdown);
  }
  addTokenCounts(breakdown, tokens);
  breakdown.costUSD += costUSD;
}

/**
 * Folds events into per-day totals as they stream past, without keeping them
 */
export class DailyAggregator implements UsageEventSink {
  private readonly byDate = new Map<string, DailyStats>();
  private readonly timezone: string | undefined;
  private readonly pricingRules: readonly ModelRule<ModelPricing>[];

  constructor(options: DailyAggregatorOptions = {}) {
    this.timezone = options.timezone;
    this.pricingRules = options.pricingRules ?? MODEL_PRICING_RULES;
  }

  add(event: UsageEvent): void {
    const date = toDateKey(event.timestamp, this.timezone);
    let stats = this.byDate.get(date);
    if (stats == null) {
      stats = { ...createUsageStats(), date };
      this.byDate.set(date, stats);
    }

    const cost = resolveEventCost(event, this.pricingRules);
    addTokenCounts(stats, event.tokens);
    stats.totalTokens += getTotalTokens(event.tokens);
    stats.costUSD += cost;
    if (event.model != null) {
      addModelUsage(stats, event.model, event.tokens, cost);
    }
  }

  /**
   * Days in ascending date order
   */
  daily(): DailyStats[] {
    return [...this.byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
  }
}

export function aggregateMonthly(daily: readonly DailyStats[]): MonthlyStats[] {
  const byMonth = new Map<string, MonthlyStats>();
  for (const day of daily) {
    const month = toMonthKey(day.date);
    let stats = byMonth.get(month);
    if (stats == null) {
      stats = { ...createUsageStats(), month };
      byMonth.set(month, stats);
    }
    addTokenCounts(stats, day);
    stats.totalTokens += day.totalTokens;
    stats.costUSD += day.costUSD;
    for (const model of day.models) {
      const breakdown = day.modelBreakdowns.get(model);
      if (breakdown != null) {
        addModelUsage(stats, model, breakdown, breakdown.costUSD);
      }
    }
  }
  return [...byMonth.values()].sort((a, b) => a.month.localeCompare(b.month));
}

/**
 * Since/until are YYYY-MM-DD keys, already validated by parseDateFilter
 */
export function filterDailyByDate(
  daily: readonly DailyStats[],
  since?: string,
  until?: string,
): DailyStats[] {
  return daily.filter((day) => isWithinRange(day.date, since, until));
}

export function filterSessionsByDate(
  sessions: readonly Session[],
  since?: string,
  until?: string,
  timezone?: string,
): Session[] {
  return sessions.filter((session) =>
    isWithinRange(toDateKey(session.startTime, timezone), since, until),
  );
}

export function filterBlocksByDate(
  blocks: readonly Block[],
  since?: string,
  until?: string,
  timezone?: string,
): Block[] {
  return blocks.filter(
    (block) =>
      !block.isGap && isWithinRange(toDateKey(block.startTime, timezone), since, until),
  );
}

function compareKeys(a: string, b: string, order: SortOrder): number {
  return order === "asc" ? a.localeCompare(b) : b.localeCompare(a);
}

export function sortDaily(daily: readonly DailyStats[], order: SortOrder): DailyStats[] {
  return [...daily].sort((a, b) => compareKeys(a.date, b.date, order));
}

export function sortMonthly(monthly: readonly MonthlyStats[], order: SortOrder): MonthlyStats[] {
  return [...monthly].sort((a, b) => compareKeys(a.month, b.month, order));
}

/**
 * By cost; equal costs keep start-time order
 */
export function sortSessions(sessions: readonly Session[], order: SortOrder): Session[] {
  return [...sessions].sort((a, b) => {
    const byCost = order === "asc" ? a.costUSD - b.costUSD : b.costUSD - a.costUSD;
    return byCost !== 0 ? byCost : a.startTime.getTime() - b.startTime.getTime();
  });
}

export function sortBlocks(blocks: readonly Block[], order: SortOrder): Block[] {
  return [...blocks].sort((a, b) =>
    order === "asc"
      ? a.startTime.getTime() - b.startTime.getTime()
      : b.startTime.getTime() - a.startTime.getTime(),
  );
}

/**
 * The `count` latest days, in ascending date order
 */
export function takeRecentDaily(daily: readonly DailyStats[], count: number): DailyStats[] {
  return sortDaily(daily, "desc").slice(0, count).reverse();
}

/**
 * The `count` most recently started sessions, newest first
 */
export function takeRecentSessions(sessions: readonly Session[], count: number): Session[] {
  return [...sessions]
    .sort((a, b) => b.startTime.getTime() - a.startTime.getTime())
    .slice(0, count);
}

/**
 * The `count` latest non-gap blocks, in start order
 */
export function takeRecentBlocks(blocks: readonly Block[], count: number): Block[] {
  const real = blocks.filter((block) => !block.isGap);
  return count > 0 ? real.slice(-count) : [];
}

export function sumUsage(rows: readonly UsageStats[]): { tokens: TokenCounts; totalTokens: number; costUSD: number } {
  const tokens = createEmptyTokenCounts();
  let totalTokens = 0;
  let costUSD = 0;
  for (const row of rows) {
    addTokenCounts(tokens, row);
    totalTokens += row.totalTokens;
    costUSD += row.costUSD;
  }
  return { tokens, totalTokens, costUSD };
}
