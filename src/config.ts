import { readFile, writeFile } from "node:fs/promises";
import { existsSync, mkdirSync } from "node:fs";
import path from "node:path";
import process from "node:process";
import { z } from "zod";
import {
  APP_NAME,
  CONFIG_PATH_ENV,
  DEFAULT_ACTIVE_BLOCK_WINDOW_HOURS,
  DEFAULT_BLOCK_DURATION_HOURS,
  DEFAULT_BURN_RATE_WINDOW_MINUTES,
  DEFAULT_GAP_THRESHOLD_MINUTES,
  DEFAULT_LIMIT_ERROR_PHRASE,
  DEFAULT_PROJECTION_HORIZON_HOURS,
  XDG_CONFIG_DIR,
} from "./constants.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";

// Settings file in the XDG config directory
export const CONFIG_FILE_PATH = path.join(XDG_CONFIG_DIR, `${APP_NAME}.json`);

const configFileSchema = z
  .object({
    TOKEN_LIMIT: z.number().int().positive(),
    OBSERVED_MAX_TOKEN: z.number().int().nonnegative(),
    USE_OBSERVED_IF_HIGHER: z.boolean(),
    BLOCK_DURATION_HOURS: z.number().positive(),
    GAP_THRESHOLD_MINUTES: z.number().nonnegative(),
    ACTIVE_BLOCK_WINDOW_HOURS: z.number().positive(),
    BURN_RATE_WINDOW_MINUTES: z.number().positive(),
    PROJECTION_HORIZON_HOURS: z.number().positive(),
    REFRESH_INTERVAL_MS: z.number().int().min(250),
    USAGE_WARNING_THRESHOLD: z.number().min(0).max(100),
    USAGE_CRITICAL_THRESHOLD: z.number().min(0).max(100),
    LIMIT_ERROR_PHRASE: z.string().min(1),
    DEBUG_OUTPUT: z.boolean(),
  })
  .partial();

// Configuration structure
export interface BlockmeterConfig {
  TOKEN_LIMIT: number;
  OBSERVED_MAX_TOKEN: number;
  USE_OBSERVED_IF_HIGHER: boolean;
  BLOCK_DURATION_HOURS: number;
  GAP_THRESHOLD_MINUTES: number;
  ACTIVE_BLOCK_WINDOW_HOURS: number;
  BURN_RATE_WINDOW_MINUTES: number;
  PROJECTION_HORIZON_HOURS: number;
  REFRESH_INTERVAL_MS: number;
  USAGE_WARNING_THRESHOLD: number;
  USAGE_CRITICAL_THRESHOLD: number;
  LIMIT_ERROR_PHRASE: string;
  DEBUG_OUTPUT: boolean;
}

// Default configuration
export const DEFAULT_CONFIG: Readonly<BlockmeterConfig> = Object.freeze({
  TOKEN_LIMIT: 7000, // base tier weighted tokens per block
  OBSERVED_MAX_TOKEN: 0,
  USE_OBSERVED_IF_HIGHER: true,
  BLOCK_DURATION_HOURS: DEFAULT_BLOCK_DURATION_HOURS,
  GAP_THRESHOLD_MINUTES: DEFAULT_GAP_THRESHOLD_MINUTES,
  ACTIVE_BLOCK_WINDOW_HOURS: DEFAULT_ACTIVE_BLOCK_WINDOW_HOURS,
  BURN_RATE_WINDOW_MINUTES: DEFAULT_BURN_RATE_WINDOW_MINUTES,
  PROJECTION_HORIZON_HOURS: DEFAULT_PROJECTION_HORIZON_HOURS,
  REFRESH_INTERVAL_MS: 2000,
  USAGE_WARNING_THRESHOLD: 75, // % of the token limit
  USAGE_CRITICAL_THRESHOLD: 90,
  LIMIT_ERROR_PHRASE: DEFAULT_LIMIT_ERROR_PHRASE,
  DEBUG_OUTPUT: false,
});

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  return override != null && override !== "" ? override : CONFIG_FILE_PATH;
}

/**
 * Validate a parsed settings object. Invalid fields are dropped with a
 * warning and fall back to their defaults.
 */
export function parseConfig(raw: unknown): BlockmeterConfig {
  const record = z.record(z.unknown()).safeParse(raw);
  if (!record.success) {
    logger.warn("Settings file is not a JSON object, using defaults");
    return { ...DEFAULT_CONFIG };
  }

  let result = configFileSchema.safeParse(record.data);
  if (!result.success) {
    const invalid = new Set(
      result.error.issues.map((issue) => String(issue.path[0])),
    );
    logger.warn(`Ignoring invalid settings: ${[...invalid].join(", ")}`);
    const cleaned = Object.fromEntries(
      Object.entries(record.data).filter(([key]) => !invalid.has(key)),
    );
    result = configFileSchema.safeParse(cleaned);
  }

  return result.success
    ? { ...DEFAULT_CONFIG, ...result.data }
    : { ...DEFAULT_CONFIG };
}

/**
 * Load the settings file, creating it with defaults when it does not exist
 */
export async function loadConfig(
  configPath: string = resolveConfigPath(),
): Promise<BlockmeterConfig> {
  try {
    if (!existsSync(configPath)) {
      await saveConfig(DEFAULT_CONFIG, configPath);
      return { ...DEFAULT_CONFIG };
    }

    const content = await readFile(configPath, "utf8");
    return parseConfig(JSON.parse(content));
  } catch (error) {
    logger.warn(
      `Failed to load ${configPath}, using defaults: ${errorMessage(error)}`,
    );
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Save the settings file
 */
export async function saveConfig(
  config: Readonly<BlockmeterConfig>,
  configPath: string = resolveConfigPath(),
): Promise<void> {
  try {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const content = JSON.stringify(config, null, 2);
    await writeFile(configPath, content, "utf8");
  } catch (error) {
    logger.warn(`Failed to save ${configPath}: ${errorMessage(error)}`);
  }
}

/**
 * Get the effective token limit based on configuration
 * Returns OBSERVED_MAX_TOKEN if USE_OBSERVED_IF_HIGHER=true and OBSERVED_MAX_TOKEN > TOKEN_LIMIT, otherwise TOKEN_LIMIT
 */
export function getEffectiveTokenLimit(config: BlockmeterConfig): number {
  if (
    config.USE_OBSERVED_IF_HIGHER &&
    config.OBSERVED_MAX_TOKEN > config.TOKEN_LIMIT
  ) {
    return config.OBSERVED_MAX_TOKEN;
  }
  return config.TOKEN_LIMIT;
}

/**
 * Update OBSERVED_MAX_TOKEN if blockTotal is higher
 * Automatically saves config if updated
 */
export async function updateObservedMaxIfHigher(
  config: BlockmeterConfig,
  blockTotal: number,
  configPath: string = resolveConfigPath(),
): Promise<BlockmeterConfig> {
  if (blockTotal > config.OBSERVED_MAX_TOKEN) {
    const updatedConfig = {
      ...config,
      OBSERVED_MAX_TOKEN: blockTotal,
    };
    await saveConfig(updatedConfig, configPath);
    logger.debug(
      `Updated OBSERVED_MAX_TOKEN: ${config.OBSERVED_MAX_TOKEN.toLocaleString()} → ${blockTotal.toLocaleString()}`,
    );
    return updatedConfig;
  }
  return config;
}
