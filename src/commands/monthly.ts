import { define } from "gunshi";
import { sharedArgs } from "../_shared-args.js";
import { exitOnKnownError, prepareCommand, printNoData } from "../command-utils.js";
import { log, logger } from "../logger.js";
import { toMonthlyJson, toTotalsJson } from "../report-json.js";
import { aggregateMonthly, filterDailyByDate, sortMonthly, sumUsage } from "../reports.js";
import { renderMonthlyTable } from "../table.js";
import { loadUsage } from "../usage-loader.js";

export const monthlyCommand = define({
  name: "monthly",
  description: "Show usage report grouped by month",
  args: sharedArgs,
  toKebab: true,
  async run(ctx) {
    try {
      const options = await prepareCommand(ctx.values);
      const { daily } = loadUsage({
        claudeDir: options.claudeDir,
        timezone: options.timezone,
        limitErrorPhrase: options.config.LIMIT_ERROR_PHRASE,
      });

      const monthly = sortMonthly(
        aggregateMonthly(filterDailyByDate(daily, options.since, options.until)),
        options.order,
      );

      if (monthly.length === 0) {
        printNoData(options.json, { monthly: [], totals: null });
        return;
      }

      if (options.json) {
        log(
          JSON.stringify(
            {
              monthly: monthly.map((row) => toMonthlyJson(row, options.breakdown)),
              totals: toTotalsJson(sumUsage(monthly)),
            },
            null,
            2,
          ),
        );
        return;
      }

      logger.box("Claude Code Token Usage Report - Monthly");
      log(renderMonthlyTable(monthly, options.breakdown));
    } catch (error) {
      exitOnKnownError(error);
    }
  },
});
