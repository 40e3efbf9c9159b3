import { homedir } from "node:os";
import { xdgConfig } from "xdg-basedir";

/**
 * User's home directory path
 */
export const USER_HOME_DIR = homedir();

/**
 * XDG config directory path
 */
export const XDG_CONFIG_DIR = xdgConfig ?? `${USER_HOME_DIR}/.config`;

export const APP_NAME = "blockmeter";
export const APP_VERSION = "0.1.0";

/**
 * Default Claude Code path (legacy location, relative to home)
 */
export const DEFAULT_CLAUDE_CODE_PATH = ".claude";

/**
 * Default Claude config path (new XDG location)
 */
export const DEFAULT_CLAUDE_CONFIG_PATH = `${XDG_CONFIG_DIR}/claude`;

/**
 * Environment variable for custom Claude config directories (comma-separated)
 */
export const CLAUDE_CONFIG_DIR_ENV = "CLAUDE_CONFIG_DIR";

/**
 * Environment variable that forces debug output
 */
export const DEBUG_ENV = "BLOCKMETER_DEBUG";

/**
 * Environment variable overriding the settings file location
 */
export const CONFIG_PATH_ENV = "BLOCKMETER_CONFIG";

/**
 * Projects directory name within Claude data directory
 */
export const CLAUDE_PROJECTS_DIR_NAME = "projects";

export const USAGE_FILE_EXTENSION = ".jsonl";

/**
 * Width of one accounting block (Claude's billing window)
 */
export const DEFAULT_BLOCK_DURATION_HOURS = 5;

/**
 * Idle time between two blocks above which a gap block is inserted
 */
export const DEFAULT_GAP_THRESHOLD_MINUTES = 30;

/**
 * The latest block is only reported active when it started within this window
 */
export const DEFAULT_ACTIVE_BLOCK_WINDOW_HOURS = 6;

export const DEFAULT_BURN_RATE_WINDOW_MINUTES = 60;
export const DEFAULT_MIN_BURN_RATE_SESSIONS = 2;

/**
 * Decay constant of the exponentially weighted burn rate
 */
export const DEFAULT_BURN_RATE_DECAY_MINUTES = 30;

/**
 * Projections further out than this are discarded
 */
export const DEFAULT_PROJECTION_HORIZON_HOURS = 24;

/**
 * Vendor wording of the quota exhaustion error
 */
export const DEFAULT_LIMIT_ERROR_PHRASE = "Claude AI usage limit reached";

/**
 * Placeholder model name the client writes for locally generated messages
 */
export const SYNTHETIC_MODEL_NAME = "<synthetic>";

export const DEFAULT_REFRESH_INTERVAL_SECONDS = 2;

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
