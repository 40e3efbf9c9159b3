import { BurnRateAnalyzer } from "./burn-rate.js";
import { DEFAULT_PROJECTION_HORIZON_HOURS, MINUTE_MS } from "./constants.js";
import { getConsumptionMultiplier } from "./models.js";
import type { PlanTier } from "./plan-classifier.js";
import {
  getRawTokens,
  type Block,
  type BurnRate,
  type ModelBreakdown,
  type Projection,
  type Session,
} from "./types.js";

export interface ProjectionEngineOptions {
  horizonMinutes?: number;
}

/**
 * Extrapolates the current burn rate up to a token limit
 */
export class ProjectionEngine {
  readonly horizonMinutes: number;

  constructor(options: ProjectionEngineOptions = {}) {
    this.horizonMinutes =
      options.horizonMinutes ?? DEFAULT_PROJECTION_HORIZON_HOURS * 60;
  }

  project(
    currentTokens: number,
    tokenLimit: number,
    burnRate: BurnRate,
    currentCost: number,
  ): Projection | null {
    if (burnRate.tokensPerMinute <= 0) {
      return null;
    }

    const tokensRemaining = Math.max(0, tokenLimit - currentTokens);
    const remainingMinutes = tokensRemaining / burnRate.tokensPerMinute;
    if (remainingMinutes > this.horizonMinutes) {
      return null;
    }

    return {
      totalTokens: currentTokens + Math.trunc(burnRate.tokensPerMinute * remainingMinutes),
      totalCost: currentCost + (burnRate.costPerHour * remainingMinutes) / 60,
      remainingMinutes,
    };
  }

  /**
   * When the limit is reached at the given rate. Null once exhausted or
   * beyond the horizon.
   */
  predictExhaustionTime(
    currentTokens: number,
    tokenLimit: number,
    tokensPerMinute: number,
    now: Date,
  ): Date | null {
    if (tokensPerMinute <= 0) {
      return null;
    }
    const minutes = Math.max(0, tokenLimit - currentTokens) / tokensPerMinute;
    if (minutes <= 0 || minutes > this.horizonMinutes) {
      return null;
    }
    return new Date(now.getTime() + Math.round(minutes * MINUTE_MS));
  }
}

export type LimitingFactor = "token-limit" | "opus-limit" | "time-reset";

export interface LimitPrediction {
  factor: LimitingFactor;
  minutesRemaining: number;
  at: Date;
  tokensPerMinute: number;
  /** 0 to 1, lowered for thin data */
  confidence: number;
  /** Limit after the plan adjustment */
  tokenLimit: number;
}

// Max5 shares its quota between Opus and the other models
const OPUS_LIMITED_SHARE = 0.15;
const OPUS_HEAVY_SHARE = 0.2;
const OPUS_HEAVY_LIMIT_FACTOR = 0.8;

const LOW_RATE_TOKENS_PER_MINUTE = 10;
const LOW_USAGE_WEIGHTED_TOKENS = 1000;

/**
 * Share of raw tokens produced by Opus models, 0 without usage
 */
export function getOpusShare(breakdown: ReadonlyMap<string, ModelBreakdown>): number {
  let total = 0;
  let opus = 0;
  for (const [model, usage] of breakdown) {
    const raw = getRawTokens(usage);
    total += raw;
    if (model.toLowerCase().includes("opus")) {
      opus += raw;
    }
  }
  return total > 0 ? opus / total : 0;
}

/**
 * Effective limit of a plan for the given model mix. Max5 loses a fifth of
 * its limit once Opus passes 20% of the tokens.
 */
export function adjustLimitForPlan(
  baseLimit: number,
  plan: PlanTier | null,
  breakdown: ReadonlyMap<string, ModelBreakdown>,
): number {
  if (plan === "max5" && getOpusShare(breakdown) > OPUS_HEAVY_SHARE) {
    return Math.trunc(baseLimit * OPUS_HEAVY_LIMIT_FACTOR);
  }
  return baseLimit;
}

function predictionConfidence(
  tokensPerMinute: number,
  breakdown: ReadonlyMap<string, ModelBreakdown>,
  weightedTokens: number,
): number {
  let confidence = 1;
  if (tokensPerMinute < LOW_RATE_TOKENS_PER_MINUTE) {
    confidence *= 0.7;
  }
  if (breakdown.size === 0) {
    confidence *= 0.5;
  }
  if (weightedTokens < LOW_USAGE_WEIGHTED_TOKENS) {
    confidence *= 0.8;
  }
  return confidence;
}

/**
 * Scale a raw rate by the weight multipliers of the models that produced it,
 * each in proportion to its share of raw tokens
 */
export function weightedRateForModelMix(
  rawTokensPerMinute: number,
  breakdown: ReadonlyMap<string, ModelBreakdown>,
): number {
  let totalRaw = 0;
  for (const usage of breakdown.values()) {
    totalRaw += getRawTokens(usage);
  }
  if (totalRaw <= 0) {
    return rawTokensPerMinute;
  }

  let rate = 0;
  for (const [model, usage] of breakdown) {
    const share = getRawTokens(usage) / totalRaw;
    rate += rawTokensPerMinute * share * getConsumptionMultiplier(model);
  }
  return rate;
}

export interface UsagePredictorOptions {
  analyzer?: BurnRateAnalyzer;
  projector?: ProjectionEngine;
}

export class UsagePredictor {
  private readonly analyzer: BurnRateAnalyzer;
  private readonly projector: ProjectionEngine;

  constructor(options: UsagePredictorOptions = {}) {
    this.analyzer = options.analyzer ?? new BurnRateAnalyzer();
    this.projector = options.projector ?? new ProjectionEngine();
  }

  /**
   * Time at which the block reaches the limit. Prefers the block's own rate,
   * falls back to the decayed session rate.
   */
  predictBlockCompletion(
    block: Block,
    sessions: readonly Session[],
    tokenLimit: number,
    now: Date,
  ): Date | null {
    const tokensPerMinute =
      block.burnRate?.tokensPerMinute ??
      this.analyzer.calculateWeightedBurnRate(sessions, now)?.tokensPerMinute;
    if (tokensPerMinute == null) {
      return null;
    }
    return this.projector.predictExhaustionTime(
      block.totalTokens,
      tokenLimit,
      tokensPerMinute,
      now,
    );
  }

  /**
   * Whether the weighted token limit or the block reset comes first. With a
   * plan, the limit is adjusted for the block's model mix and Opus-heavy
   * Max5 usage is reported as the Opus limit.
   */
  predictLimitingFactor(
    block: Block,
    sessions: readonly Session[],
    baseLimit: number,
    resetTime: Date,
    now: Date,
    plan: PlanTier | null = null,
  ): LimitPrediction {
    const tokenLimit = adjustLimitForPlan(baseLimit, plan, block.modelBreakdown);
    const tokensPerMinute =
      block.burnRate != null
        ? weightedRateForModelMix(block.burnRate.tokensPerMinute, block.modelBreakdown)
        : (this.analyzer.calculateWeightedBurnRate(sessions, now)?.tokensPerMinute ?? 0);

    const minutesToReset = Math.max(0, (resetTime.getTime() - now.getTime()) / MINUTE_MS);
    const minutesToLimit =
      tokensPerMinute > 0
        ? Math.max(0, tokenLimit - block.weightedTotalTokens) / tokensPerMinute
        : Number.POSITIVE_INFINITY;

    const limitFirst = minutesToLimit < minutesToReset;
    const minutesRemaining = limitFirst ? minutesToLimit : minutesToReset;
    let factor: LimitingFactor = limitFirst ? "token-limit" : "time-reset";
    if (plan === "max5" && getOpusShare(block.modelBreakdown) > OPUS_LIMITED_SHARE) {
      factor = "opus-limit";
    }

    return {
      factor,
      minutesRemaining,
      at: new Date(now.getTime() + Math.round(minutesRemaining * MINUTE_MS)),
      tokensPerMinute,
      confidence: predictionConfidence(tokensPerMinute, block.modelBreakdown, block.weightedTotalTokens),
      tokenLimit,
    };
  }
}
