import type { Args } from "gunshi";
import { SORT_ORDERS } from "./types.js";

export const sharedArgs = {
  since: {
    type: "string",
    short: "s",
    description: "Filter from date (YYYYMMDD)",
  },
  until: {
    type: "string",
    short: "u",
    description: "Filter until date (YYYYMMDD, inclusive)",
  },
  order: {
    type: "enum",
    short: "o",
    description: "Sort order: desc (newest first) or asc (oldest first)",
    default: "desc",
    choices: SORT_ORDERS,
  },
  json: {
    type: "boolean",
    short: "j",
    description: "Output report as JSON",
    default: false,
  },
  breakdown: {
    type: "boolean",
    short: "b",
    description: "Show per-model cost breakdown",
    default: false,
  },
  timezone: {
    type: "string",
    short: "z",
    description: "Timezone for date grouping (IANA, defaults to the system timezone)",
  },
  debug: {
    type: "boolean",
    short: "d",
    description: "Show parse statistics and skipped records",
    default: false,
  },
  claudeDir: {
    type: "string",
    description: "Claude data directories, comma-separated (overrides CLAUDE_CONFIG_DIR)",
  },
} as const satisfies Args;

export const recentArg = {
  recent: {
    type: "number",
    short: "r",
    description: "Only show the most recent N entries",
  },
} as const satisfies Args;

/**
 * Shared args plus `--recent`, for the report commands that support it
 */
export const reportArgs = {
  ...sharedArgs,
  ...recentArg,
} as const satisfies Args;
