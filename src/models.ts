import type { TokenCounts } from "./types.js";

/**
 * How a rule recognises a model name
 */
export interface ModelMatcher {
  kind: "prefix" | "contains";
  patterns: readonly string[];
}

export interface ModelRule<T> {
  family: string;
  match: ModelMatcher;
  config: T;
}

export interface ModelWeight {
  consumptionMultiplier: number;
}

export interface ModelPricing {
  inputCostPerMToken: number;
  outputCostPerMToken: number;
  cacheWriteCostPerMToken: number;
  cacheReadCostPerMToken: number;
}

const MILLION = 1_000_000;

/**
 * Capacity multipliers, matched by name prefix. Opus drains a block roughly
 * five times faster than Sonnet.
 */
export const MODEL_WEIGHT_RULES: readonly ModelRule<ModelWeight>[] = [
  {
    family: "opus-4",
    match: { kind: "prefix", patterns: ["claude-opus-4"] },
    config: { consumptionMultiplier: 5.0 },
  },
  {
    family: "sonnet-4",
    match: { kind: "prefix", patterns: ["claude-sonnet-4"] },
    config: { consumptionMultiplier: 1.0 },
  },
  {
    family: "haiku-3.5",
    match: { kind: "prefix", patterns: ["claude-3-5-haiku"] },
    config: { consumptionMultiplier: 0.8 },
  },
];

export const DEFAULT_MODEL_WEIGHT: ModelWeight = { consumptionMultiplier: 1.0 };

const SONNET_PRICING: ModelPricing = {
  inputCostPerMToken: 3.0,
  outputCostPerMToken: 15.0,
  cacheWriteCostPerMToken: 3.75,
  cacheReadCostPerMToken: 0.3,
};

const OPUS_PRICING: ModelPricing = {
  inputCostPerMToken: 15.0,
  outputCostPerMToken: 75.0,
  cacheWriteCostPerMToken: 18.75,
  cacheReadCostPerMToken: 1.5,
};

/**
 * USD per million tokens, matched by substring in list order
 */
export const MODEL_PRICING_RULES: readonly ModelRule<ModelPricing>[] = [
  {
    family: "sonnet-3.5",
    match: { kind: "contains", patterns: ["claude-3-5-sonnet", "claude-sonnet-3-5"] },
    config: SONNET_PRICING,
  },
  {
    family: "haiku-3.5",
    match: { kind: "contains", patterns: ["claude-3-5-haiku", "claude-haiku-3-5"] },
    config: {
      inputCostPerMToken: 0.8,
      outputCostPerMToken: 4.0,
      cacheWriteCostPerMToken: 1.0,
      cacheReadCostPerMToken: 0.08,
    },
  },
  {
    family: "opus-3",
    match: { kind: "contains", patterns: ["claude-3-opus", "claude-opus-3"] },
    config: OPUS_PRICING,
  },
  {
    family: "sonnet-3",
    match: { kind: "contains", patterns: ["claude-3-sonnet", "claude-sonnet-3"] },
    config: SONNET_PRICING,
  },
  {
    family: "haiku-3",
    match: { kind: "contains", patterns: ["claude-3-haiku", "claude-haiku-3"] },
    config: {
      inputCostPerMToken: 0.25,
      outputCostPerMToken: 1.25,
      cacheWriteCostPerMToken: 0.31,
      cacheReadCostPerMToken: 0.025,
    },
  },
  {
    family: "opus-4",
    match: { kind: "contains", patterns: ["claude-opus-4", "claude-4-opus"] },
    config: OPUS_PRICING,
  },
  {
    family: "sonnet-4",
    match: { kind: "contains", patterns: ["claude-sonnet-4", "claude-4-sonnet"] },
    config: SONNET_PRICING,
  },
];

export const DEFAULT_MODEL_PRICING: ModelPricing = SONNET_PRICING;

export function matchesModel(matcher: ModelMatcher, model: string): boolean {
  return matcher.patterns.some((pattern) =>
    matcher.kind === "prefix" ? model.startsWith(pattern) : model.includes(pattern),
  );
}

/**
 * First rule that matches wins; rules are evaluated in list order
 */
export function findModelRule<T>(
  rules: readonly ModelRule<T>[],
  model: string,
): ModelRule<T> | undefined {
  return rules.find((rule) => matchesModel(rule.match, model));
}

export function resolveModelConfig<T>(
  rules: readonly ModelRule<T>[],
  model: string,
  fallback: T,
): T {
  return findModelRule(rules, model)?.config ?? fallback;
}

export function getConsumptionMultiplier(
  model: string,
  rules: readonly ModelRule<ModelWeight>[] = MODEL_WEIGHT_RULES,
): number {
  return resolveModelConfig(rules, model, DEFAULT_MODEL_WEIGHT).consumptionMultiplier;
}

/**
 * Raw tokens scaled by the model's multiplier, truncated to an integer
 */
export function calculateWeightedTokens(
  model: string,
  rawTokens: number,
  rules: readonly ModelRule<ModelWeight>[] = MODEL_WEIGHT_RULES,
): number {
  return Math.floor(rawTokens * getConsumptionMultiplier(model, rules));
}

export function getModelPricing(
  model: string,
  rules: readonly ModelRule<ModelPricing>[] = MODEL_PRICING_RULES,
): ModelPricing {
  return resolveModelConfig(rules, model, DEFAULT_MODEL_PRICING);
}

export function calculateCostUSD(
  model: string,
  tokens: Readonly<TokenCounts>,
  rules: readonly ModelRule<ModelPricing>[] = MODEL_PRICING_RULES,
): number {
  const pricing = getModelPricing(model, rules);
  return (
    (tokens.inputTokens / MILLION) * pricing.inputCostPerMToken +
    (tokens.outputTokens / MILLION) * pricing.outputCostPerMToken +
    (tokens.cacheCreationTokens / MILLION) * pricing.cacheWriteCostPerMToken +
    (tokens.cacheReadTokens / MILLION) * pricing.cacheReadCostPerMToken
  );
}

/**
 * Short display name, e.g. "claude-opus-4-20250514" → "opus-4"
 */
export function simplifyModelName(model: string): string {
  return (
    findModelRule(MODEL_PRICING_RULES, model)?.family ??
    model.split("-").slice(0, 2).join("-")
  );
}
