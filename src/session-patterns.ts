import { HOUR_MS, MINUTE_MS } from "./constants.js";
import { getRawTokens, type Session } from "./types.js";

export interface SessionPattern {
  avgTokensPerMinute: number;
  avgSessionDurationMinutes: number;
  limitHitRate: number;
  /** Share of messages per model, 0..1 */
  modelDistribution: Map<string, number>;
}

export interface UsagePattern {
  totalSessions: number;
  totalWeightedTokens: number;
  /** Raw input + output tokens per model */
  modelTokens: Map<string, number>;
  dominantModel: string | null;
  sessionsPerHour: number;
  hasLimitErrors: boolean;
  averageSessionTokens: number;
  isHeavyUsage: boolean;
  isOpusHeavy: boolean;
}

/**
 * Idle time between consecutive sessions, in milliseconds
 */
export function analyzeSessionGaps(sessions: readonly Session[]): number[] {
  const gaps: number[] = [];
  for (let i = 1; i < sessions.length; i++) {
    const previousEnd = sessions[i - 1]?.endTime;
    const next = sessions[i];
    if (previousEnd != null && next != null) {
      gaps.push(next.startTime.getTime() - previousEnd.getTime());
    }
  }
  return gaps;
}

export function calculateSessionPatterns(sessions: readonly Session[]): SessionPattern {
  let totalMinutes = 0;
  let totalTokens = 0;
  let limitHits = 0;
  const messageCounts = new Map<string, number>();

  for (const session of sessions) {
    if (session.endTime == null) {
      continue;
    }
    totalMinutes += (session.endTime.getTime() - session.startTime.getTime()) / MINUTE_MS;
    totalTokens += session.totalWeightedTokens;
    if (session.hasLimitError) {
      limitHits += 1;
    }
    for (const [model, usage] of session.modelUsage) {
      messageCounts.set(model, (messageCounts.get(model) ?? 0) + usage.messageCount);
    }
  }

  let totalMessages = 0;
  for (const count of messageCounts.values()) {
    totalMessages += count;
  }
  const modelDistribution = new Map<string, number>();
  for (const [model, count] of messageCounts) {
    modelDistribution.set(model, totalMessages > 0 ? count / totalMessages : 0);
  }

  return {
    avgTokensPerMinute: totalMinutes > 0 ? totalTokens / totalMinutes : 0,
    avgSessionDurationMinutes: sessions.length > 0 ? totalMinutes / sessions.length : 0,
    limitHitRate: sessions.length > 0 ? limitHits / sessions.length : 0,
    modelDistribution,
  };
}

export function analyzeUsagePattern(sessions: readonly Session[]): UsagePattern {
  let totalWeightedTokens = 0;
  let hasLimitErrors = false;
  const modelTokens = new Map<string, number>();
  let earliest = Number.POSITIVE_INFINITY;
  let latest = Number.NEGATIVE_INFINITY;

  for (const session of sessions) {
    totalWeightedTokens += session.totalWeightedTokens;
    hasLimitErrors = hasLimitErrors || session.hasLimitError;
    earliest = Math.min(earliest, session.startTime.getTime());
    latest = Math.max(latest, session.startTime.getTime());
    for (const [model, usage] of session.modelUsage) {
      modelTokens.set(model, (modelTokens.get(model) ?? 0) + getRawTokens(usage));
    }
  }

  let dominantModel: string | null = null;
  let dominantTokens = -1;
  for (const [model, tokens] of modelTokens) {
    if (tokens > dominantTokens) {
      dominantModel = model;
      dominantTokens = tokens;
    }
  }

  // whole hours, at least one
  const spanHours =
    sessions.length > 1 ? Math.max(1, Math.floor((latest - earliest) / HOUR_MS)) : 1;
  const sessionsPerHour = sessions.length / spanHours;
  const averageSessionTokens =
    sessions.length > 0 ? Math.floor(totalWeightedTokens / sessions.length) : 0;

  let isOpusHeavy = false;
  if (dominantModel != null) {
    isOpusHeavy = dominantModel.includes("opus");
  } else if (totalWeightedTokens > 0) {
    let opusTokens = 0;
    for (const [model, tokens] of modelTokens) {
      if (model.includes("opus")) {
        opusTokens += tokens;
      }
    }
    isOpusHeavy = opusTokens / totalWeightedTokens > 0.3;
  }

  return {
    totalSessions: sessions.length,
    totalWeightedTokens,
    modelTokens,
    dominantModel,
    sessionsPerHour,
    hasLimitErrors,
    averageSessionTokens,
    isHeavyUsage: sessionsPerHour > 2 || averageSessionTokens > 5000,
    isOpusHeavy,
  };
}
