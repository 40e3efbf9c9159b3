/**
 * Aggregated token counts for different token types
 */
export interface TokenCounts {
  inputTokens: number;
  outputTokens: number;
  cacheCreationTokens: number;
  cacheReadTokens: number;
}

/**
 * One parsed usage record from a JSONL file
 */
export interface UsageEvent {
  readonly sessionId: string | null;
  readonly timestamp: Date;
  readonly model: string | null;
  readonly tokens: Readonly<TokenCounts>;
  readonly costUSD: number | null;
  readonly isLimitError: boolean;
  readonly messageId: string | null;
  readonly requestId: string | null;
  readonly projectName: string;
}

/**
 * Anything that folds accepted events, e.g. the session reconstructor
 */
export interface UsageEventSink {
  add(event: UsageEvent): void;
}

/**
 * Usage of one model inside a session
 */
export interface ModelUsage extends TokenCounts {
  model: string;
  messageCount: number;
  weightedTokens: number;
  costUSD: number;
}

/**
 * All events sharing one session identifier
 */
export interface Session {
  sessionId: string;
  projectName: string;
  startTime: Date;
  endTime: Date | null;
  modelUsage: Map<string, ModelUsage>;
  totalWeightedTokens: number;
  costUSD: number;
  eventCount: number;
  hasLimitError: boolean;
}

/**
 * Consumption velocity
 */
export interface BurnRate {
  tokensPerMinute: number;
  costPerHour: number;
}

/**
 * Where usage ends up when the current burn rate reaches a token limit
 */
export interface Projection {
  totalTokens: number;
  totalCost: number;
  remainingMinutes: number;
}

export interface ModelBreakdown extends TokenCounts {
  weightedTokens: number;
  costUSD: number;
}

/**
 * A fixed-width accounting window (5 hours by default), or a gap between two
 */
export interface Block {
  id: string;
  startTime: Date;
  nominalEndTime: Date; // startTime + block duration, next block start for gaps
  endTime: Date; // actualEndTime when known, else the finalization time
  actualEndTime: Date | null; // last session activity
  isActive: boolean;
  isGap: boolean;
  sessionCount: number;
  tokenCounts: TokenCounts;
  totalTokens: number; // input + output
  costUSD: number;
  models: string[];
  burnRate: BurnRate | null;
  projection: Projection | null;
  modelBreakdown: Map<string, ModelBreakdown>;
  weightedTotalTokens: number;
  contextConsumptionRate: number | null;
  hasLimitError: boolean;
}

export type SortOrder = "asc" | "desc";

export const SORT_ORDERS = ["desc", "asc"] as const satisfies readonly SortOrder[];

export function createEmptyTokenCounts(): TokenCounts {
  return {
    inputTokens: 0,
    outputTokens: 0,
    cacheCreationTokens: 0,
    cacheReadTokens: 0,
  };
}

export function addTokenCounts(target: TokenCounts, source: Readonly<TokenCounts>): void {
  target.inputTokens += source.inputTokens;
  target.outputTokens += source.outputTokens;
  target.cacheCreationTokens += source.cacheCreationTokens;
  target.cacheReadTokens += source.cacheReadTokens;
}

/**
 * Input + output: the tokens that count towards weighted consumption and burn rate
 */
export function getRawTokens(tokens: Readonly<TokenCounts>): number {
  return tokens.inputTokens + tokens.outputTokens;
}

/**
 * Every token type, cache included
 */
export function getTotalTokens(tokens: Readonly<TokenCounts>): number {
  return (
    tokens.inputTokens +
    tokens.outputTokens +
    tokens.cacheCreationTokens +
    tokens.cacheReadTokens
  );
}
