import process from "node:process";
import { cli, type CliOptions } from "gunshi";
import { APP_NAME, APP_VERSION } from "../constants.js";
import { blocksCommand } from "./blocks.js";
import { dailyCommand } from "./daily.js";
import { monitorCommand } from "./monitor.js";
import { monthlyCommand } from "./monthly.js";
import { sessionCommand } from "./session.js";

const subCommands: NonNullable<CliOptions["subCommands"]> = new Map();
subCommands.set("daily", dailyCommand);
subCommands.set("monthly", monthlyCommand);
subCommands.set("session", sessionCommand);
subCommands.set("blocks", blocksCommand);
subCommands.set("monitor", monitorCommand);

/**
 * `daily` also runs when no subcommand is given
 */
const mainCommand = dailyCommand;

export async function run(): Promise<void> {
  await cli(process.argv.slice(2), mainCommand, {
    name: APP_NAME,
    version: APP_VERSION,
    description: "Usage blocks, burn rate and projections from Claude Code logs",
    subCommands,
    renderHeader: null,
  });
}
