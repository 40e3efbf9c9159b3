import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import {
  CLAUDE_CONFIG_DIR_ENV,
  CLAUDE_PROJECTS_DIR_NAME,
  DEFAULT_CLAUDE_CODE_PATH,
  DEFAULT_CLAUDE_CONFIG_PATH,
  USAGE_FILE_EXTENSION,
  USER_HOME_DIR,
} from "./constants.js";
import { Deduplicator } from "./deduplicator.js";
import { errorMessage, NoDataError } from "./errors.js";
import {
  createLimitErrorMatcher,
  createUniqueHash,
  parseUsageLine,
  type IdentityKeyFn,
  type LimitErrorMatcher,
  type ParseSkipReason,
} from "./event-parser.js";
import { logger } from "./logger.js";
import { DailyAggregator, type DailyStats } from "./reports.js";
import { SessionReconstructor } from "./session-reconstructor.js";
import type { Session, UsageEventSink } from "./types.js";

export interface PipelineStats {
  files: number;
  failedFiles: number;
  lines: number;
  accepted: number;
  duplicates: number;
  skipped: Record<ParseSkipReason, number>;
}

function createPipelineStats(): PipelineStats {
  return {
    files: 0,
    failedFiles: 0,
    lines: 0,
    accepted: 0,
    duplicates: 0,
    skipped: {
      empty: 0,
      summary: 0,
      "invalid-json": 0,
      "invalid-schema": 0,
      "invalid-timestamp": 0,
      "missing-tokens": 0,
      "synthetic-model": 0,
    },
  };
}

/**
 * Split a comma-separated directory list, dropping blanks and duplicates
 */
function splitPathList(value: string): string[] {
  const paths = value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "")
    .map((entry) => path.resolve(entry));
  return [...new Set(paths)];
}

function hasProjectsDir(claudePath: string): boolean {
  try {
    return fs.statSync(path.join(claudePath, CLAUDE_PROJECTS_DIR_NAME)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Claude data directories that contain a projects folder. An explicit list
 * (flag or CLAUDE_CONFIG_DIR) replaces the default locations.
 */
export function getClaudePaths(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const override = explicit ?? env[CLAUDE_CONFIG_DIR_ENV];
  if (override != null && override.trim() !== "") {
    const candidates = splitPathList(override);
    const valid = candidates.filter(hasProjectsDir);
    for (const candidate of candidates) {
      if (!valid.includes(candidate)) {
        logger.warn(`Ignoring ${candidate}: no ${CLAUDE_PROJECTS_DIR_NAME} directory`);
      }
    }
    if (valid.length === 0) {
      throw new NoDataError(
        `No valid Claude data directory found in: ${candidates.join(", ")}`,
      );
    }
    return valid;
  }

  const defaults = [
    DEFAULT_CLAUDE_CONFIG_PATH,
    path.join(USER_HOME_DIR, DEFAULT_CLAUDE_CODE_PATH),
  ].map((entry) => path.resolve(entry));
  const valid = [...new Set(defaults)].filter(hasProjectsDir);
  if (valid.length === 0) {
    throw new NoDataError(
      `No Claude data directory found. Looked in ${defaults.join(" and ")}; set ${CLAUDE_CONFIG_DIR_ENV} to point elsewhere.`,
    );
  }
  return valid;
}

/**
 * Extract project name from Claude JSONL file path
 */
export function extractProjectFromPath(jsonlPath: string): string {
  const segments = jsonlPath.split(/[/\\]/);
  const projectsIndex = segments.lastIndexOf(CLAUDE_PROJECTS_DIR_NAME);

  if (projectsIndex === -1 || projectsIndex + 1 >= segments.length - 1) {
    return "unknown";
  }

  const projectName = segments[projectsIndex + 1];
  return projectName != null && projectName.trim() !== "" ? projectName : "unknown";
}

/**
 * Session id used for records that carry none: the file name without extension
 */
export function sessionIdFromPath(jsonlPath: string): string {
  return path.basename(jsonlPath, USAGE_FILE_EXTENSION);
}

/**
 * Every usage file under <claudePath>/projects/, oldest modification first,
 * ties broken by path
 */
export function findUsageFiles(claudePaths: readonly string[]): string[] {
  const files: { filePath: string; mtimeMs: number }[] = [];

  for (const claudePath of claudePaths) {
    const projectsDir = path.join(claudePath, CLAUDE_PROJECTS_DIR_NAME);
    const entries = fs.readdirSync(projectsDir, { recursive: true, encoding: "utf8" });
    for (const entry of entries) {
      if (!entry.endsWith(USAGE_FILE_EXTENSION)) {
        continue;
      }
      const filePath = path.join(projectsDir, entry);
      try {
        const stats = fs.statSync(filePath);
        if (stats.isFile()) {
          files.push({ filePath, mtimeMs: stats.mtimeMs });
        }
      } catch (error) {
        logger.warn(`Cannot stat ${filePath}: ${errorMessage(error)}`);
      }
    }
  }

  if (files.length === 0) {
    throw new NoDataError(
      `No usage files found under ${claudePaths.map((p) => path.join(p, CLAUDE_PROJECTS_DIR_NAME)).join(", ")}`,
    );
  }

  return files
    .sort(
      (a, b) =>
        a.mtimeMs - b.mtimeMs ||
        (a.filePath < b.filePath ? -1 : a.filePath > b.filePath ? 1 : 0),
    )
    .map((file) => file.filePath);
}

export interface UsagePipelineOptions {
  sinks: readonly UsageEventSink[];
  keyFn?: IdentityKeyFn;
  limitErrorMatcher?: LimitErrorMatcher;
}

/**
 * State of one loading run: the dedup set, the counters and the sinks
 */
export class UsagePipeline {
  private readonly deduplicator: Deduplicator;
  private readonly sinks: readonly UsageEventSink[];
  private readonly limitErrorMatcher: LimitErrorMatcher | undefined;
  private readonly counters = createPipelineStats();

  constructor(options: UsagePipelineOptions) {
    this.sinks = options.sinks;
    this.deduplicator = new Deduplicator(options.keyFn ?? createUniqueHash);
    this.limitErrorMatcher = options.limitErrorMatcher;
  }

  processFile(filePath: string): void {
    this.counters.files += 1;

    let content: string;
    try {
      content = fs.readFileSync(filePath, "utf8");
    } catch (error) {
      this.counters.failedFiles += 1;
      logger.warn(`Failed to read ${filePath}: ${errorMessage(error)}`);
      return;
    }

    const projectName = extractProjectFromPath(filePath);
    const fallbackSessionId = sessionIdFromPath(filePath);
    let accepted = 0;
    let lines = 0;

    for (const line of content.split(/\r?\n/)) {
      if (line.trim() === "") {
        continue;
      }
      lines += 1;
      const result = parseUsageLine(line, {
        projectName,
        limitErrorMatcher: this.limitErrorMatcher,
      });
      if (!result.ok) {
        this.counters.skipped[result.reason] += 1;
        continue;
      }
      if (!this.deduplicator.accept(result.event)) {
        continue;
      }

      const event =
        result.event.sessionId != null
          ? result.event
          : { ...result.event, sessionId: fallbackSessionId };
      for (const sink of this.sinks) {
        sink.add(event);
      }
      accepted += 1;
    }

    this.counters.lines += lines;
    this.counters.accepted += accepted;
    logger.debug(`${path.basename(filePath)}: ${accepted}/${lines} records accepted`);
  }

  get stats(): PipelineStats {
    return {
      ...this.counters,
      duplicates: this.deduplicator.duplicates,
      skipped: { ...this.counters.skipped },
    };
  }
}

export interface LoadUsageOptions {
  /** Comma-separated data directories; defaults to CLAUDE_CONFIG_DIR or the standard locations */
  claudeDir?: string;
  timezone?: string;
  limitErrorPhrase?: string;
}

export interface LoadedUsage {
  sessions: Session[];
  daily: DailyStats[];
  stats: PipelineStats;
}

export function logPipelineStats(stats: PipelineStats): void {
  logger.debug(
    `Processed ${stats.files} files (${stats.failedFiles} failed), ${stats.lines} lines: ${stats.accepted} accepted, ${stats.duplicates} duplicates`,
  );
  for (const [reason, count] of Object.entries(stats.skipped)) {
    if (count > 0) {
      logger.debug(`  skipped ${reason}: ${count}`);
    }
  }
}

/**
 * Read every usage file once and fold it into sessions and daily totals
 */
export function loadUsage(options: LoadUsageOptions = {}): LoadedUsage {
  const claudePaths = getClaudePaths(options.claudeDir);
  logger.debug(`Using Claude data directories: ${claudePaths.join(", ")}`);
  const files = findUsageFiles(claudePaths);

  const reconstructor = new SessionReconstructor();
  const aggregator = new DailyAggregator({ timezone: options.timezone });
  const pipeline = new UsagePipeline({
    sinks: [reconstructor, aggregator],
    limitErrorMatcher:
      options.limitErrorPhrase != null
        ? createLimitErrorMatcher(options.limitErrorPhrase)
        : undefined,
  });

  for (const file of files) {
    pipeline.processFile(file);
  }

  const stats = pipeline.stats;
  logPipelineStats(stats);
  if (stats.accepted === 0) {
    throw new NoDataError("No valid usage records found");
  }

  return {
    sessions: reconstructor.sessions(),
    daily: aggregator.daily(),
    stats,
  };
}
