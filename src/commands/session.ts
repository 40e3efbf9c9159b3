import { define } from "gunshi";
import { reportArgs } from "../_shared-args.js";
import { exitOnKnownError, prepareCommand, printNoData } from "../command-utils.js";
import { MINUTE_MS } from "../constants.js";
import { formatDuration } from "../date-utils.js";
import { log, logger } from "../logger.js";
import { classifyFromSessions, getPlanDisplayName } from "../plan-classifier.js";
import { toSessionJson } from "../report-json.js";
import { filterSessionsByDate, sortSessions, takeRecentSessions } from "../reports.js";
import { analyzeSessionGaps, analyzeUsagePattern, calculateSessionPatterns } from "../session-patterns.js";
import { formatNumber, renderSessionTable } from "../table.js";
import type { Session } from "../types.js";
import { loadUsage } from "../usage-loader.js";

export const sessionCommand = define({
  name: "session",
  description: "Show usage report grouped by session",
  args: reportArgs,
  toKebab: true,
  async run(ctx) {
    try {
      const options = await prepareCommand(ctx.values);
      const loaded = loadUsage({
        claudeDir: options.claudeDir,
        timezone: options.timezone,
        limitErrorPhrase: options.config.LIMIT_ERROR_PHRASE,
      });

      let selected = filterSessionsByDate(
        loaded.sessions,
        options.since,
        options.until,
        options.timezone,
      );
      if (options.recent != null) {
        selected = takeRecentSessions(selected, options.recent);
      }
      const sessions = sortSessions(selected, options.order);

      if (sessions.length === 0) {
        printNoData(options.json, { sessions: [], totalCost: 0 });
        return;
      }

      if (options.json) {
        log(
          JSON.stringify(
            {
              sessions: sessions.map(toSessionJson),
              totalCost: sessions.reduce((sum, session) => sum + session.costUSD, 0),
            },
            null,
            2,
          ),
        );
        return;
      }

      logger.box("Claude Code Token Usage Report - Sessions");
      log(renderSessionTable(sessions, options.timezone));
      logSessionPatterns(selected, loaded.sessions);
    } catch (error) {
      exitOnKnownError(error);
    }
  },
});

function logSessionPatterns(selected: readonly Session[], all: readonly Session[]): void {
  const byStart = [...selected].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
  const usage = analyzeUsagePattern(byStart);
  const habits = calculateSessionPatterns(byStart);
  logger.info(
    `${usage.totalSessions} sessions, ${usage.sessionsPerHour.toFixed(1)} per hour, ${formatDuration(habits.avgSessionDurationMinutes)} and ${formatNumber(usage.averageSessionTokens)} weighted tokens on average`,
  );
  if (usage.isHeavyUsage) {
    logger.warn(usage.isOpusHeavy ? "Heavy usage, mostly on Opus" : "Heavy usage");
  }
  if (habits.limitHitRate > 0) {
    logger.info(`${Math.round(habits.limitHitRate * 100)}% of sessions hit the usage limit`);
  }

  const gaps = analyzeSessionGaps(byStart);
  if (gaps.length > 0) {
    logger.debug(`Longest idle time between sessions: ${formatDuration(Math.max(...gaps) / MINUTE_MS)}`);
  }

  const detected = classifyFromSessions(all, new Date());
  logger.debug(
    `Last 7 days suggest ${getPlanDisplayName(detected.tier)} (${Math.round(detected.confidence * 100)}% confidence)`,
  );
  for (const line of detected.evidence) {
    logger.debug(`  ${line}`);
  }
}
