import process from "node:process";
import { createConsola, LogLevels } from "consola";
import { DEBUG_ENV } from "./constants.js";

export const logger = createConsola({
  level: LogLevels.info,
  formatOptions: {
    date: false,
  },
});

/**
 * Report output goes straight to stdout, independent of the log level
 */
export const log = console.log;

export function isDebugEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[DEBUG_ENV];
  return value === "1" || value === "true";
}

export function enableDebug(): void {
  logger.level = LogLevels.debug;
}

/**
 * JSON output must stay machine readable: only errors reach the terminal
 */
export function silenceForJson(): void {
  logger.level = LogLevels.error;
}
