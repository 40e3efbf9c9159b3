import process from "node:process";
import { setTimeout as sleep } from "node:timers/promises";
import { BurnRateAnalyzer } from "./burn-rate.js";
import { updateObservedMaxIfHigher, type BlockmeterConfig } from "./config.js";
import { MINUTE_MS } from "./constants.js";
import { nextResetTime } from "./date-utils.js";
import { errorMessage, NoDataError } from "./errors.js";
import { log, logger } from "./logger.js";
import { renderMonitorFrame, type MonitorFrame } from "./monitor-view.js";
import {
  buildBlocksForPlan,
  classifyFromBlocks,
  resolveTokenLimit,
  type SelectablePlan,
} from "./plan-classifier.js";
import { ProjectionEngine, UsagePredictor } from "./projection.js";
import { takeRecentBlocks } from "./reports.js";
import type { Block, Session } from "./types.js";
import { loadUsage } from "./usage-loader.js";

export interface MonitorOptions {
  plan: SelectablePlan;
  resetHour?: number;
  timezone?: string;
  /** Hide the recent-block list */
  activeOnly: boolean;
  recent: number;
  intervalSeconds: number;
  claudeDir?: string;
  debug: boolean;
  config: BlockmeterConfig;
  configPath?: string;
  signal: AbortSignal;
}

export const DEFAULT_RECENT_BLOCKS = 5;

/**
 * Everything one screen needs, derived from a fresh set of sessions
 */
export function computeMonitorFrame(
  sessions: readonly Session[],
  options: Pick<MonitorOptions, "plan" | "resetHour" | "timezone" | "activeOnly" | "recent">,
  config: BlockmeterConfig,
  now: Date,
): MonitorFrame {
  const { blocks, tokenLimit: resolvedLimit } = buildBlocksForPlan(sessions, {
    now,
    config,
    plan: options.plan,
  });
  const tokenLimit = resolvedLimit ?? resolveTokenLimit(options.plan, blocks, config);
  const activeBlock: Block | null = blocks.find((block) => block.isActive) ?? null;
  const horizonMinutes = config.PROJECTION_HORIZON_HOURS * 60;

  const resetTime =
    options.resetHour != null
      ? nextResetTime(now, options.resetHour, options.timezone)
      : (activeBlock?.nominalEndTime ??
        new Date(now.getTime() + config.BLOCK_DURATION_HOURS * 60 * MINUTE_MS));

  const predictor = new UsagePredictor({
    analyzer: new BurnRateAnalyzer({ windowMinutes: config.BURN_RATE_WINDOW_MINUTES }),
    projector: new ProjectionEngine({ horizonMinutes }),
  });

  return {
    now,
    timezone: options.timezone,
    plan: options.plan,
    tokenLimit,
    activeBlock,
    recentBlocks: options.activeOnly ? [] : takeRecentBlocks(blocks, options.recent),
    limitPrediction:
      activeBlock != null
        ? predictor.predictLimitingFactor(activeBlock, sessions, tokenLimit, resetTime, now, options.plan)
        : null,
    resetTime,
    detectedPlan: blocks.length > 0 ? classifyFromBlocks(blocks) : null,
    warningThreshold: config.USAGE_WARNING_THRESHOLD,
    criticalThreshold: config.USAGE_CRITICAL_THRESHOLD,
  };
}

/**
 * Re-read the logs and redraw every interval until the signal aborts
 */
export async function runMonitor(options: MonitorOptions): Promise<void> {
  let config = options.config;

  // Clear screen once at startup (skip in debug mode)
  if (!options.debug) {
    process.stdout.write("\x1B[2J\x1B[0;0H");
  }

  while (!options.signal.aborted) {
    const now = new Date();
    try {
      const { sessions } = loadUsage({
        claudeDir: options.claudeDir,
        limitErrorPhrase: config.LIMIT_ERROR_PHRASE,
      });
      const frame = computeMonitorFrame(sessions, options, config, now);

      if (!options.debug) {
        process.stdout.write("\x1B[H\x1B[J");
      }
      log(renderMonitorFrame(frame).join("\n"));

      if (frame.activeBlock != null) {
        config = await updateObservedMaxIfHigher(
          config,
          frame.activeBlock.totalTokens,
          options.configPath,
        );
      }
    } catch (error) {
      if (error instanceof NoDataError) {
        logger.warn(`Waiting for usage data: ${error.message}`);
      } else {
        logger.error(`Error updating monitor: ${errorMessage(error)}`);
      }
    }

    try {
      await sleep(options.intervalSeconds * 1000, undefined, { signal: options.signal });
    } catch (error) {
      if (options.signal.aborted) {
        break;
      }
      throw error;
    }
  }
}
