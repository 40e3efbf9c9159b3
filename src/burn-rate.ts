import {
  DEFAULT_BURN_RATE_DECAY_MINUTES,
  DEFAULT_BURN_RATE_WINDOW_MINUTES,
  DEFAULT_MIN_BURN_RATE_SESSIONS,
  MINUTE_MS,
} from "./constants.js";
import type { Block, BurnRate, Session } from "./types.js";

/**
 * Rate over [start, end]. Null when the span is not positive.
 */
export function computeBurnRate(
  tokens: number,
  costUSD: number,
  start: Date,
  end: Date,
): BurnRate | null {
  const minutes = (end.getTime() - start.getTime()) / MINUTE_MS;
  if (minutes <= 0) {
    return null;
  }
  return {
    tokensPerMinute: tokens / minutes,
    costPerHour: (costUSD / minutes) * 60,
  };
}

/**
 * Burn rate of a closed block, measured up to its last activity
 */
export function calculateBlockBurnRate(
  block: Pick<Block, "startTime" | "actualEndTime" | "totalTokens" | "costUSD" | "isGap">,
): BurnRate | null {
  if (block.isGap || block.actualEndTime == null) {
    return null;
  }
  return computeBurnRate(
    block.totalTokens,
    block.costUSD,
    block.startTime,
    block.actualEndTime,
  );
}

export interface BurnRateAnalyzerOptions {
  windowMinutes?: number;
  minSessions?: number;
  decayMinutes?: number;
}

export class BurnRateAnalyzer {
  readonly windowMinutes: number;
  readonly minSessions: number;
  readonly decayMinutes: number;

  constructor(options: BurnRateAnalyzerOptions = {}) {
    this.windowMinutes = options.windowMinutes ?? DEFAULT_BURN_RATE_WINDOW_MINUTES;
    this.minSessions = options.minSessions ?? DEFAULT_MIN_BURN_RATE_SESSIONS;
    this.decayMinutes = options.decayMinutes ?? DEFAULT_BURN_RATE_DECAY_MINUTES;
  }

  private recentSessions(sessions: readonly Session[], now: Date): Session[] {
    const cutoff = now.getTime() - this.windowMinutes * MINUTE_MS;
    return sessions.filter((session) => session.startTime.getTime() >= cutoff);
  }

  /**
   * Weighted tokens per minute across the sessions of the trailing window
   */
  calculateBurnRate(sessions: readonly Session[], now: Date): BurnRate | null {
    const recent = this.recentSessions(sessions, now);
    if (recent.length < this.minSessions) {
      return null;
    }

    let earliestStart = Number.POSITIVE_INFINITY;
    let latestEnd = Number.NEGATIVE_INFINITY;
    let totalTokens = 0;
    let totalCost = 0;
    for (const session of recent) {
      earliestStart = Math.min(earliestStart, session.startTime.getTime());
      latestEnd = Math.max(latestEnd, (session.endTime ?? now).getTime());
      totalTokens += session.totalWeightedTokens;
      totalCost += session.costUSD;
    }

    return computeBurnRate(
      totalTokens,
      totalCost,
      new Date(earliestStart),
      new Date(latestEnd),
    );
  }

  /**
   * Exponentially decayed average: recent sessions count more
   */
  calculateWeightedBurnRate(sessions: readonly Session[], now: Date): BurnRate | null {
    const recent = this.recentSessions(sessions, now);

    let weightedTokens = 0;
    let weightedCost = 0;
    let weightedMinutes = 0;
    let totalWeight = 0;
    for (const session of recent) {
      if (session.endTime == null) {
        continue;
      }
      const duration = (session.endTime.getTime() - session.startTime.getTime()) / MINUTE_MS;
      if (duration <= 0) {
        continue;
      }
      const age = (now.getTime() - session.startTime.getTime()) / MINUTE_MS;
      const weight = Math.exp(-age / this.decayMinutes);
      weightedTokens += session.totalWeightedTokens * weight;
      weightedCost += session.costUSD * weight;
      weightedMinutes += duration * weight;
      totalWeight += weight;
    }

    // Idle sessions with a real span give a zero rate, not none
    if (totalWeight <= 0 || weightedMinutes <= 0) {
      return null;
    }
    return {
      tokensPerMinute: weightedTokens / weightedMinutes,
      costPerHour: (weightedCost / weightedMinutes) * 60,
    };
  }
}
