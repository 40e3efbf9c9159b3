import process from "node:process";
import { loadConfig, type BlockmeterConfig } from "./config.js";
import { assertValidTimezone, parseDateFilter } from "./date-utils.js";
import { ConfigError, NoDataError } from "./errors.js";
import { enableDebug, isDebugEnv, log, logger, silenceForJson } from "./logger.js";
import type { SortOrder } from "./types.js";

export const NO_DATA_IN_RANGE_MESSAGE = "No data found for the specified date range.";

export interface CommonValues {
  since?: string;
  until?: string;
  order?: SortOrder;
  json?: boolean;
  breakdown?: boolean;
  timezone?: string;
  debug?: boolean;
  claudeDir?: string;
  recent?: number;
}

export interface CommonOptions {
  since?: string; // YYYY-MM-DD
  until?: string;
  order: SortOrder;
  json: boolean;
  breakdown: boolean;
  timezone?: string;
  claudeDir?: string;
  recent?: number;
  config: BlockmeterConfig;
}

/**
 * Validate the shared flags and set the log level. Throws ConfigError before
 * any usage file is touched.
 */
export function parseCommonValues(values: CommonValues): Omit<CommonOptions, "config"> {
  const since = values.since != null ? parseDateFilter(values.since) : undefined;
  const until = values.until != null ? parseDateFilter(values.until) : undefined;
  if (since != null && until != null && since > until) {
    throw new ConfigError(`--since (${values.since}) is after --until (${values.until})`);
  }
  if (values.timezone != null) {
    assertValidTimezone(values.timezone);
  }
  if (values.recent != null && (!Number.isInteger(values.recent) || values.recent <= 0)) {
    throw new ConfigError(`--recent must be a positive integer, got: ${values.recent}`);
  }

  return {
    since,
    until,
    order: values.order ?? "desc",
    json: values.json === true,
    breakdown: values.breakdown === true,
    timezone: values.timezone,
    claudeDir: values.claudeDir,
    recent: values.recent,
  };
}

export async function prepareCommand(values: CommonValues): Promise<CommonOptions> {
  const parsed = parseCommonValues(values);
  const config = await loadConfig();
  if (parsed.json) {
    silenceForJson();
  } else if (values.debug === true || isDebugEnv() || config.DEBUG_OUTPUT) {
    enableDebug();
  }
  return { ...parsed, config };
}

export function printNoData(json: boolean, emptyJson: Record<string, unknown>): void {
  log(json ? JSON.stringify(emptyJson, null, 2) : NO_DATA_IN_RANGE_MESSAGE);
}

/**
 * Known failures end the process with a one-line message; anything else propagates
 */
export function exitOnKnownError(error: unknown): never {
  if (error instanceof ConfigError || error instanceof NoDataError) {
    logger.error(error.message);
    process.exit(1);
  }
  throw error;
}
