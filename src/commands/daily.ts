import { define } from "gunshi";
import { reportArgs } from "../_shared-args.js";
import { exitOnKnownError, prepareCommand, printNoData } from "../command-utils.js";
import { log, logger } from "../logger.js";
import { toDailyJson, toTotalsJson } from "../report-json.js";
import { filterDailyByDate, sortDaily, sumUsage, takeRecentDaily } from "../reports.js";
import { renderDailyTable } from "../table.js";
import { loadUsage } from "../usage-loader.js";

export const dailyCommand = define({
  name: "daily",
  description: "Show usage report grouped by date",
  args: reportArgs,
  toKebab: true,
  async run(ctx) {
    try {
      const options = await prepareCommand(ctx.values);
      const { daily } = loadUsage({
        claudeDir: options.claudeDir,
        timezone: options.timezone,
        limitErrorPhrase: options.config.LIMIT_ERROR_PHRASE,
      });

      let rows = filterDailyByDate(daily, options.since, options.until);
      if (options.recent != null) {
        rows = takeRecentDaily(rows, options.recent);
      }
      rows = sortDaily(rows, options.order);

      if (rows.length === 0) {
        printNoData(options.json, { daily: [], totals: null });
        return;
      }

      if (options.json) {
        log(
          JSON.stringify(
            {
              daily: rows.map((row) => toDailyJson(row, options.breakdown)),
              totals: toTotalsJson(sumUsage(rows)),
            },
            null,
            2,
          ),
        );
        return;
      }

      logger.box("Claude Code Token Usage Report - Daily");
      log(renderDailyTable(rows, options.breakdown));
    } catch (error) {
      exitOnKnownError(error);
    }
  },
});
