import { define } from "gunshi";
import { reportArgs } from "../_shared-args.js";
import { BurnRateAnalyzer } from "../burn-rate.js";
import { exitOnKnownError, prepareCommand, printNoData } from "../command-utils.js";
import { formatTime } from "../date-utils.js";
import { ConfigError } from "../errors.js";
import { log, logger } from "../logger.js";
import {
  buildBlocksForPlan,
  classifyFromBlocks,
  getPlanDisplayName,
  SELECTABLE_PLANS,
  validatePlanAgainstUsage,
} from "../plan-classifier.js";
import { ProjectionEngine, UsagePredictor } from "../projection.js";
import { toBlockJson, toLimitPredictionJson, toPlanJson } from "../report-json.js";
import { filterBlocksByDate, sortBlocks, takeRecentBlocks } from "../reports.js";
import { renderBlocksTable } from "../table.js";
import { loadUsage } from "../usage-loader.js";

export const blocksCommand = define({
  name: "blocks",
  description: "Show usage grouped into 5-hour billing blocks",
  args: {
    ...reportArgs,
    active: {
      type: "boolean",
      short: "a",
      description: "Show only the active block with its projection",
      default: false,
    },
    plan: {
      type: "enum",
      short: "p",
      description: "Plan whose token limit drives projections",
      choices: SELECTABLE_PLANS,
    },
    tokenLimit: {
      type: "number",
      short: "t",
      description: "Token limit for projections (overrides --plan)",
    },
  },
  toKebab: true,
  async run(ctx) {
    try {
      const { tokenLimit, plan, active } = ctx.values;
      if (tokenLimit != null && (!Number.isInteger(tokenLimit) || tokenLimit <= 0)) {
        throw new ConfigError(`--token-limit must be a positive integer, got: ${tokenLimit}`);
      }
      const options = await prepareCommand(ctx.values);
      const { sessions } = loadUsage({
        claudeDir: options.claudeDir,
        limitErrorPhrase: options.config.LIMIT_ERROR_PHRASE,
      });

      const now = new Date();
      const { blocks: allBlocks, tokenLimit: limit } = buildBlocksForPlan(sessions, {
        now,
        config: options.config,
        plan,
        tokenLimit,
      });

      let blocks = active
        ? allBlocks.filter((block) => block.isActive)
        : filterBlocksByDate(allBlocks, options.since, options.until, options.timezone);
      if (options.recent != null) {
        blocks = takeRecentBlocks(blocks, options.recent);
      }
      blocks = sortBlocks(blocks, options.order);

      if (blocks.length === 0) {
        if (active) {
          log(options.json ? JSON.stringify({ blocks: [] }, null, 2) : "No active block.");
          return;
        }
        printNoData(options.json, { blocks: [] });
        return;
      }

      const detected = classifyFromBlocks(allBlocks);
      const activeBlock = blocks.find((block) => block.isActive);
      const analyzer = new BurnRateAnalyzer({
        windowMinutes: options.config.BURN_RATE_WINDOW_MINUTES,
      });
      const predictor = new UsagePredictor({
        analyzer,
        projector: new ProjectionEngine({
          horizonMinutes: options.config.PROJECTION_HORIZON_HOURS * 60,
        }),
      });
      const limitPrediction =
        activeBlock != null && limit != null
          ? predictor.predictLimitingFactor(
              activeBlock,
              sessions,
              limit,
              activeBlock.nominalEndTime,
              now,
              tokenLimit == null ? (plan ?? null) : null,
            )
          : null;

      if (options.json) {
        log(
          JSON.stringify(
            {
              blocks: blocks.map((block) => toBlockJson(block, options.breakdown)),
              plan: toPlanJson(detected),
              limitPrediction: limitPrediction != null ? toLimitPredictionJson(limitPrediction) : null,
            },
            null,
            2,
          ),
        );
        return;
      }

      logger.box("Claude Code Token Usage Report - Session Blocks");
      log(renderBlocksTable(blocks, options.timezone));
      logger.info(
        `Usage suggests ${getPlanDisplayName(detected.tier)} (${Math.round(detected.confidence * 100)}% confidence)`,
      );
      for (const line of detected.evidence) {
        logger.debug(`  ${line}`);
      }
      if (plan != null && !validatePlanAgainstUsage(plan, allBlocks)) {
        logger.warn(`Observed usage exceeds the ${getPlanDisplayName(plan)} limit`);
      }

      if (activeBlock == null) {
        return;
      }
      if (activeBlock.projection != null) {
        logger.info(
          `Projected: ${activeBlock.projection.totalTokens.toLocaleString("en-US")} tokens, $${activeBlock.projection.totalCost.toFixed(2)} in ${Math.round(activeBlock.projection.remainingMinutes)} min`,
        );
      }
      const recentRate = analyzer.calculateBurnRate(sessions, now);
      if (recentRate != null) {
        logger.info(
          `Last ${analyzer.windowMinutes} min: ${Math.round(recentRate.tokensPerMinute).toLocaleString("en-US")} weighted tokens/min`,
        );
      }
      if (limit != null) {
        const exhaustion = predictor.predictBlockCompletion(activeBlock, sessions, limit, now);
        if (exhaustion != null) {
          logger.warn(`Token limit reached at ${formatTime(exhaustion, options.timezone)} at the current rate`);
        }
      }
      if (limitPrediction != null) {
        if (limitPrediction.factor === "opus-limit") {
          logger.warn("Opus usage is above the Max5 share; the Opus limit may be reached first");
        }
        logger.debug(
          limitPrediction.factor === "time-reset"
            ? "The block ends before weighted usage reaches the limit"
            : "Weighted usage reaches the limit before the block ends",
        );
      }
    } catch (error) {
      exitOnKnownError(error);
    }
  },
});
