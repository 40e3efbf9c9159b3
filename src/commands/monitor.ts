import process from "node:process";
import { define } from "gunshi";
import { sharedArgs } from "../_shared-args.js";
import { exitOnKnownError, prepareCommand } from "../command-utils.js";
import { resolveConfigPath } from "../config.js";
import { assertValidResetHour } from "../date-utils.js";
import { ConfigError } from "../errors.js";
import { isDebugEnv } from "../logger.js";
import { DEFAULT_RECENT_BLOCKS, runMonitor } from "../monitor.js";
import { SELECTABLE_PLANS } from "../plan-classifier.js";

export const monitorCommand = define({
  name: "monitor",
  description: "Live view of the active block, refreshed every few seconds",
  args: {
    timezone: sharedArgs.timezone,
    debug: sharedArgs.debug,
    claudeDir: sharedArgs.claudeDir,
    plan: {
      type: "enum",
      short: "p",
      description: "Subscription plan",
      default: "pro",
      choices: SELECTABLE_PLANS,
    },
    resetHour: {
      type: "number",
      description: "Hour of day (0-23) at which limits reset",
    },
    active: {
      type: "boolean",
      short: "a",
      description: "Show only the active block",
      default: false,
    },
    recent: {
      type: "number",
      short: "r",
      description: "Number of recent blocks to list",
      default: DEFAULT_RECENT_BLOCKS,
    },
    interval: {
      type: "number",
      short: "i",
      description: "Refresh interval in seconds",
    },
  },
  toKebab: true,
  async run(ctx) {
    try {
      const { resetHour, interval, plan, active, recent } = ctx.values;
      if (resetHour != null) {
        assertValidResetHour(resetHour);
      }
      if (interval != null && !(interval > 0)) {
        throw new ConfigError(`--interval must be a positive number of seconds, got: ${interval}`);
      }
      const options = await prepareCommand(ctx.values);

      const controller = new AbortController();
      const stop = (): void => controller.abort();
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);

      await runMonitor({
        plan,
        resetHour,
        timezone: options.timezone,
        activeOnly: active,
        recent,
        intervalSeconds: interval ?? options.config.REFRESH_INTERVAL_MS / 1000,
        claudeDir: options.claudeDir,
        debug: ctx.values.debug || isDebugEnv() || options.config.DEBUG_OUTPUT,
        config: options.config,
        configPath: resolveConfigPath(),
        signal: controller.signal,
      });

      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
    } catch (error) {
      exitOnKnownError(error);
    }
  },
});
