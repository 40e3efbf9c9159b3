import { buildBlocks, type BlockBuilderOptions } from "./block-builder.js";
import { getEffectiveTokenLimit, type BlockmeterConfig } from "./config.js";
import { getRawTokens, type Block, type Session } from "./types.js";

export const PLAN_TIERS = ["pro", "max5", "max20", "custom-max", "unknown"] as const;

export type PlanTier = (typeof PLAN_TIERS)[number];

/**
 * Tiers a user may select on the command line
 */
export const SELECTABLE_PLANS = ["pro", "max5", "max20", "custom-max"] as const satisfies readonly PlanTier[];

export type SelectablePlan = (typeof SELECTABLE_PLANS)[number];

const PLAN_LIMITS: Readonly<Record<PlanTier, number | null>> = {
  pro: 7_000,
  max5: 35_000,
  max20: 140_000,
  "custom-max": null,
  unknown: null,
};

const PLAN_DISPLAY_NAMES: Readonly<Record<PlanTier, string>> = {
  pro: "Pro",
  max5: "Max5",
  max20: "Max20",
  "custom-max": "Custom Max",
  unknown: "Unknown",
};

const LOOKBACK_DAYS = 7;
const LIMIT_VARIANCE_FACTOR = 1.2;

/**
 * Advisory only; nothing is gated on the detected tier
 */
export interface PlanClassification {
  tier: PlanTier;
  confidence: number;
  evidence: string[];
  maxObservedTokens: number;
  hasLimitErrors: boolean;
  opusUsagePercentage: number;
}

export function getPlanLimit(tier: PlanTier): number | null {
  return PLAN_LIMITS[tier];
}

export function getPlanDisplayName(tier: PlanTier): string {
  return PLAN_DISPLAY_NAMES[tier];
}

export function isSelectablePlan(value: string): value is SelectablePlan {
  return SELECTABLE_PLANS.some((plan) => plan === value);
}

function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function maxBlockTokens(blocks: readonly Block[]): number {
  let max = 0;
  for (const block of blocks) {
    if (!block.isGap) {
      max = Math.max(max, block.totalTokens);
    }
  }
  return max;
}

export function classifyFromBlocks(blocks: readonly Block[]): PlanClassification {
  const evidence: string[] = [];
  const maxObservedTokens = maxBlockTokens(blocks);
  const hasLimitErrors = blocks.some((block) => block.hasLimitError);

  let totalTokens = 0;
  let opusTokens = 0;
  for (const block of blocks) {
    totalTokens += block.totalTokens;
    for (const [model, usage] of block.modelBreakdown) {
      if (model.includes("opus")) {
        opusTokens += getRawTokens(usage);
      }
    }
  }
  const opusUsagePercentage = totalTokens > 0 ? (opusTokens / totalTokens) * 100 : 0;

  let tier: PlanTier;
  let confidence: number;
  const observed = maxObservedTokens.toLocaleString("en-US");
  if (maxObservedTokens > 100_000) {
    tier = "max20";
    confidence = 0.9;
    evidence.push(`Observed ${observed} tokens, exceeds Max5 limit`);
  } else if (maxObservedTokens > 25_000) {
    tier = "max5";
    confidence = 0.85;
    evidence.push(`Observed ${observed} tokens, likely Max5`);
  } else if (maxObservedTokens > 7_000) {
    if (opusUsagePercentage > 20) {
      tier = "custom-max";
      confidence = 0.7;
      evidence.push(
        `High Opus usage (${formatPercent(opusUsagePercentage)}) with ${observed} tokens suggests custom limits`,
      );
    } else {
      tier = "max5";
      confidence = 0.75;
      evidence.push(`Observed ${observed} tokens, likely Max5 or custom Pro`);
    }
  } else {
    tier = "pro";
    confidence = 0.6;
    evidence.push(`Low usage observed (${observed} tokens), likely Pro`);
  }

  const usedBlocks = blocks.filter((block) => !block.isGap && block.totalTokens > 0).length;
  if (usedBlocks < 3) {
    confidence *= 0.7;
    evidence.push("Limited usage data");
  }

  if (hasLimitErrors) {
    confidence += 0.1;
    evidence.push("Observed limit reached errors");
  }

  if (tier === "max5" && opusUsagePercentage > 30) {
    evidence.push(
      `High Opus usage (${formatPercent(opusUsagePercentage)}) may trigger early limits on Max5`,
    );
  }

  return {
    tier,
    confidence: Math.min(1, confidence),
    evidence,
    maxObservedTokens,
    hasLimitErrors,
    opusUsagePercentage,
  };
}

export function classifyFromSessions(
  sessions: readonly Session[],
  now: Date,
): PlanClassification {
  const cutoff = now.getTime() - LOOKBACK_DAYS * 24 * 60 * 60 * 1000;
  const recent = sessions.filter((session) => session.startTime.getTime() >= cutoff);

  if (recent.length === 0) {
    return {
      tier: "unknown",
      confidence: 0,
      evidence: ["No recent sessions found"],
      maxObservedTokens: 0,
      hasLimitErrors: false,
      opusUsagePercentage: 0,
    };
  }

  const evidence: string[] = [];
  let totalWeighted = 0;
  let maxSessionTokens = 0;
  let opusTokens = 0;
  for (const session of recent) {
    totalWeighted += session.totalWeightedTokens;
    maxSessionTokens = Math.max(maxSessionTokens, session.totalWeightedTokens);
    for (const [model, usage] of session.modelUsage) {
      if (model.includes("opus")) {
        opusTokens += getRawTokens(usage);
      }
    }
  }
  const hasLimitErrors = recent.some((session) => session.hasLimitError);
  const opusUsagePercentage = totalWeighted > 0 ? (opusTokens / totalWeighted) * 100 : 0;
  const total = totalWeighted.toLocaleString("en-US");

  let tier: PlanTier;
  let confidence: number;
  if (hasLimitErrors) {
    evidence.push("Observed limit reached errors");
    if (totalWeighted > 100_000) {
      tier = "max20";
      confidence = 0.95;
      evidence.push("Hit limits with high usage");
    } else if (totalWeighted > 25_000) {
      tier = "max5";
      confidence = 0.9;
      evidence.push("Hit limits with moderate usage");
    } else {
      tier = "pro";
      confidence = 0.85;
      evidence.push("Hit limits with low usage");
    }
  } else if (totalWeighted > 80_000) {
    tier = "max20";
    confidence = 0.8;
    evidence.push(`High usage (${total} tokens) without limits`);
  } else if (totalWeighted > 20_000) {
    tier = "max5";
    confidence = 0.75;
    evidence.push(`Moderate usage (${total} tokens), likely Max5`);
  } else {
    tier = "pro";
    confidence = 0.6;
    evidence.push(`Low usage (${total} tokens), likely Pro`);
  }

  if (tier === "max5" && opusUsagePercentage > 25) {
    evidence.push(
      `High Opus usage (${formatPercent(opusUsagePercentage)}) on Max5 may trigger early limits`,
    );
  }

  if (recent.length >= 10) {
    confidence += 0.1;
  } else if (recent.length < 3) {
    confidence *= 0.8;
    evidence.push("Limited session data");
  }

  return {
    tier,
    confidence: Math.min(1, confidence),
    evidence,
    maxObservedTokens: maxSessionTokens,
    hasLimitErrors,
    opusUsagePercentage,
  };
}

/**
 * True when no block exceeds the tier limit by more than 20 %
 */
export function validatePlanAgainstUsage(tier: PlanTier, blocks: readonly Block[]): boolean {
  const limit = getPlanLimit(tier);
  if (limit == null) {
    return true;
  }
  return maxBlockTokens(blocks) <= Math.trunc(limit * LIMIT_VARIANCE_FACTOR);
}

/**
 * Token limit used for projections. Fixed tiers use their own limit, the
 * custom tier uses the largest block seen (or the persisted maximum), the
 * unknown tier falls back to the settings file.
 */
export function resolveTokenLimit(
  tier: PlanTier,
  blocks: readonly Block[],
  config: BlockmeterConfig,
): number {
  const fixed = getPlanLimit(tier);
  if (fixed != null) {
    return fixed;
  }
  if (tier === "custom-max") {
    const observed = Math.max(maxBlockTokens(blocks), config.OBSERVED_MAX_TOKEN);
    return observed > 0 ? observed : getEffectiveTokenLimit(config);
  }
  return getEffectiveTokenLimit(config);
}

/**
 * Block builder options taken from the settings file
 */
export function blockOptionsFromConfig(config: BlockmeterConfig): BlockBuilderOptions {
  return {
    blockDurationMinutes: config.BLOCK_DURATION_HOURS * 60,
    gapThresholdMinutes: config.GAP_THRESHOLD_MINUTES,
    activeWindowMinutes: config.ACTIVE_BLOCK_WINDOW_HOURS * 60,
    projectionHorizonMinutes: config.PROJECTION_HORIZON_HOURS * 60,
  };
}

export interface PlanBlocksOptions {
  now: Date;
  config: BlockmeterConfig;
  plan?: PlanTier;
  /** Takes precedence over the plan */
  tokenLimit?: number;
}

/**
 * Build blocks with the projection limit of the selected plan. A custom plan
 * needs the blocks to know its limit, so those are built twice.
 */
export function buildBlocksForPlan(
  sessions: readonly Session[],
  options: PlanBlocksOptions,
): { blocks: Block[]; tokenLimit: number | null } {
  const base = { ...blockOptionsFromConfig(options.config), now: options.now };
  let tokenLimit = options.tokenLimit ?? null;
  if (tokenLimit == null && options.plan != null) {
    tokenLimit =
      getPlanLimit(options.plan) ??
      resolveTokenLimit(options.plan, buildBlocks(sessions, base), options.config);
  }
  return {
    blocks: buildBlocks(sessions, { ...base, tokenLimit: tokenLimit ?? undefined }),
    tokenLimit,
  };
}
