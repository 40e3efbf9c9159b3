import { computeBurnRate } from "./burn-rate.js";
import {
  DEFAULT_ACTIVE_BLOCK_WINDOW_HOURS,
  DEFAULT_BLOCK_DURATION_HOURS,
  DEFAULT_GAP_THRESHOLD_MINUTES,
  DEFAULT_PROJECTION_HORIZON_HOURS,
  MINUTE_MS,
} from "./constants.js";
import { BlockBuilderStateError, BlockOrderError } from "./errors.js";
import { ProjectionEngine } from "./projection.js";
import {
  addTokenCounts,
  createEmptyTokenCounts,
  getRawTokens,
  type Block,
  type ModelBreakdown,
  type Session,
} from "./types.js";

export interface BlockBuilderOptions {
  blockDurationMinutes?: number;
  gapThresholdMinutes?: number;
  activeWindowMinutes?: number;
  /** Projections are attached to the active block only when a limit is set */
  tokenLimit?: number;
  projectionHorizonMinutes?: number;
}

function createBlock(startTime: Date, blockDurationMs: number): Block {
  return {
    id: startTime.toISOString(),
    startTime,
    nominalEndTime: new Date(startTime.getTime() + blockDurationMs),
    endTime: startTime,
    actualEndTime: null,
    isActive: false,
    isGap: false,
    sessionCount: 0,
    tokenCounts: createEmptyTokenCounts(),
    totalTokens: 0,
    costUSD: 0,
    models: [],
    burnRate: null,
    projection: null,
    modelBreakdown: new Map(),
    weightedTotalTokens: 0,
    contextConsumptionRate: null,
    hasLimitError: false,
  };
}

function createGapBlock(startTime: Date, endTime: Date): Block {
  return {
    ...createBlock(startTime, endTime.getTime() - startTime.getTime()),
    id: `gap-${startTime.toISOString()}`,
    endTime,
    isGap: true,
  };
}

function foldSession(block: Block, session: Session): void {
  block.sessionCount += 1;

  for (const [model, usage] of session.modelUsage) {
    let breakdown: ModelBreakdown | undefined = block.modelBreakdown.get(model);
    if (breakdown == null) {
      breakdown = { ...createEmptyTokenCounts(), weightedTokens: 0, costUSD: 0 };
      block.modelBreakdown.set(model, breakdown);
    }
    addTokenCounts(breakdown, usage);
    breakdown.weightedTokens += usage.weightedTokens;
    breakdown.costUSD += usage.costUSD;
    addTokenCounts(block.tokenCounts, usage);

    if (!block.models.includes(model)) {
      block.models.push(model);
    }
  }

  block.totalTokens = getRawTokens(block.tokenCounts);
  block.weightedTotalTokens += session.totalWeightedTokens;
  block.costUSD += session.costUSD;
  block.hasLimitError = block.hasLimitError || session.hasLimitError;
  block.contextConsumptionRate =
    block.totalTokens > 0 ? block.weightedTotalTokens / block.totalTokens : null;

  if (
    session.endTime != null &&
    (block.actualEndTime == null || session.endTime > block.actualEndTime)
  ) {
    block.actualEndTime = session.endTime;
  }
}

/**
 * Fixes the displayed end and computes the burn rate over the active span
 */
function closeBlock(block: Block, fallbackEnd: Date): void {
  block.endTime = block.actualEndTime ?? fallbackEnd;
  block.burnRate =
    block.actualEndTime != null
      ? computeBurnRate(block.totalTokens, block.costUSD, block.startTime, block.actualEndTime)
      : null;
}

/**
 * Groups start-ordered sessions into fixed-width blocks. A block opens at the
 * start of the first session that does not fit the current one.
 */
export class BlockBuilder {
  private readonly blockDurationMs: number;
  private readonly gapThresholdMs: number;
  private readonly activeWindowMs: number;
  private readonly tokenLimit: number | undefined;
  private readonly projector: ProjectionEngine;

  private readonly blocks: Block[] = [];
  private current: Block | null = null;
  private previousSession: Session | null = null;
  private finalized = false;

  constructor(options: BlockBuilderOptions = {}) {
    this.blockDurationMs =
      (options.blockDurationMinutes ?? DEFAULT_BLOCK_DURATION_HOURS * 60) * MINUTE_MS;
    this.gapThresholdMs =
      (options.gapThresholdMinutes ?? DEFAULT_GAP_THRESHOLD_MINUTES) * MINUTE_MS;
    this.activeWindowMs =
      (options.activeWindowMinutes ?? DEFAULT_ACTIVE_BLOCK_WINDOW_HOURS * 60) * MINUTE_MS;
    this.tokenLimit = options.tokenLimit;
    this.projector = new ProjectionEngine({
      horizonMinutes:
        options.projectionHorizonMinutes ?? DEFAULT_PROJECTION_HORIZON_HOURS * 60,
    });
  }

  addSession(session: Session): void {
    if (this.finalized) {
      throw new BlockBuilderStateError("Cannot add sessions after finalize()");
    }
    if (this.previousSession != null && session.startTime < this.previousSession.startTime) {
      throw new BlockOrderError(
        session.sessionId,
        session.startTime,
        this.previousSession.startTime,
      );
    }
    this.previousSession = session;

    if (
      this.current == null ||
      session.startTime.getTime() - this.current.startTime.getTime() > this.blockDurationMs
    ) {
      if (this.current != null) {
        closeBlock(this.current, session.startTime);
        this.blocks.push(this.current);
      }
      this.current = createBlock(session.startTime, this.blockDurationMs);
    }

    foldSession(this.current, session);
  }

  finalize(now: Date): Block[] {
    if (this.finalized) {
      throw new BlockBuilderStateError("BlockBuilder has already been finalized");
    }
    this.finalized = true;

    if (this.current != null) {
      closeBlock(this.current, now);
      this.blocks.push(this.current);
      this.current = null;
    }

    const result = this.insertGapBlocks();
    const active = this.markActiveBlock(result, now);
    if (active?.burnRate != null && this.tokenLimit != null) {
      active.projection = this.projector.project(
        active.totalTokens,
        this.tokenLimit,
        active.burnRate,
        active.costUSD,
      );
    }
    return result;
  }

  private insertGapBlocks(): Block[] {
    const result: Block[] = [];
    let previous: Block | undefined;
    for (const block of this.blocks) {
      if (
        previous != null &&
        block.startTime.getTime() - previous.endTime.getTime() > this.gapThresholdMs
      ) {
        result.push(createGapBlock(previous.endTime, block.startTime));
      }
      result.push(block);
      previous = block;
    }
    return result;
  }

  private markActiveBlock(blocks: Block[], now: Date): Block | null {
    let latest: Block | null = null;
    for (const block of blocks) {
      if (!block.isGap && (latest == null || block.startTime > latest.startTime)) {
        latest = block;
      }
    }
    if (latest == null || now.getTime() - latest.startTime.getTime() > this.activeWindowMs) {
      return null;
    }
    latest.isActive = true;
    return latest;
  }
}

/**
 * Sort, feed and finalize in one call
 */
export function buildBlocks(
  sessions: readonly Session[],
  options: BlockBuilderOptions & { now: Date },
): Block[] {
  const builder = new BlockBuilder(options);
  const sorted = [...sessions].sort(
    (a, b) => a.startTime.getTime() - b.startTime.getTime(),
  );
  for (const session of sorted) {
    builder.addSession(session);
  }
  return builder.finalize(options.now);
}
