import {
  calculateCostUSD,
  calculateWeightedTokens,
  MODEL_PRICING_RULES,
  MODEL_WEIGHT_RULES,
  type ModelPricing,
  type ModelRule,
  type ModelWeight,
} from "./models.js";
import {
  addTokenCounts,
  getRawTokens,
  type ModelUsage,
  type Session,
  type UsageEvent,
  type UsageEventSink,
} from "./types.js";

export const UNKNOWN_SESSION_ID = "unknown";

export interface SessionReconstructorOptions {
  weightRules?: readonly ModelRule<ModelWeight>[];
  pricingRules?: readonly ModelRule<ModelPricing>[];
}

/**
 * Cost of one event: the recorded value when the client wrote one, else priced
 * from the token counts
 */
export function resolveEventCost(
  event: UsageEvent,
  pricingRules: readonly ModelRule<ModelPricing>[] = MODEL_PRICING_RULES,
): number {
  if (event.costUSD != null) {
    return event.costUSD;
  }
  return event.model != null
    ? calculateCostUSD(event.model, event.tokens, pricingRules)
    : 0;
}

function createModelUsage(model: string): ModelUsage {
  return {
    model,
    inputTokens: 0,
    outputTokens: 0,
    cacheCreationTokens: 0,
    cacheReadTokens: 0,
    messageCount: 0,
    weightedTokens: 0,
    costUSD: 0,
  };
}

/**
 * Groups accepted events by session id and folds them into sessions
 */
export class SessionReconstructor implements UsageEventSink {
  private readonly bySessionId = new Map<string, Session>();
  private readonly weightRules: readonly ModelRule<ModelWeight>[];
  private readonly pricingRules: readonly ModelRule<ModelPricing>[];

  constructor(options: SessionReconstructorOptions = {}) {
    this.weightRules = options.weightRules ?? MODEL_WEIGHT_RULES;
    this.pricingRules = options.pricingRules ?? MODEL_PRICING_RULES;
  }

  add(event: UsageEvent): void {
    const sessionId = event.sessionId ?? UNKNOWN_SESSION_ID;
    let session = this.bySessionId.get(sessionId);
    if (session == null) {
      session = {
        sessionId,
        projectName: event.projectName,
        startTime: event.timestamp,
        endTime: null,
        modelUsage: new Map(),
        totalWeightedTokens: 0,
        costUSD: 0,
        eventCount: 0,
        hasLimitError: false,
      };
      this.bySessionId.set(sessionId, session);
    }
    this.fold(session, event);
  }

  private fold(session: Session, event: UsageEvent): void {
    if (event.timestamp < session.startTime) {
      session.startTime = event.timestamp;
    }
    if (session.endTime == null || event.timestamp > session.endTime) {
      session.endTime = event.timestamp;
    }
    session.eventCount += 1;
    session.hasLimitError = session.hasLimitError || event.isLimitError;

    const cost = resolveEventCost(event, this.pricingRules);
    session.costUSD += cost;

    if (event.model == null) {
      return;
    }

    let usage = session.modelUsage.get(event.model);
    if (usage == null) {
      usage = createModelUsage(event.model);
      session.modelUsage.set(event.model, usage);
    }
    addTokenCounts(usage, event.tokens);
    usage.messageCount += 1;
    usage.costUSD += cost;
    usage.weightedTokens = calculateWeightedTokens(
      event.model,
      getRawTokens(usage),
      this.weightRules,
    );

    session.totalWeightedTokens = 0;
    for (const modelUsage of session.modelUsage.values()) {
      session.totalWeightedTokens += modelUsage.weightedTokens;
    }
  }

  get sessionCount(): number {
    return this.bySessionId.size;
  }

  /**
   * Sessions sorted by start time, ties broken by session id
   */
  sessions(): Session[] {
    return [...this.bySessionId.values()].sort(
      (a, b) =>
        a.startTime.getTime() - b.startTime.getTime() ||
        (a.sessionId < b.sessionId ? -1 : a.sessionId > b.sessionId ? 1 : 0),
    );
  }
}
