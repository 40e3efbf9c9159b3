import { mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NoDataError } from "./errors.js";
import { SessionReconstructor } from "./session-reconstructor.js";
import {
  extractProjectFromPath,
  findUsageFiles,
  getClaudePaths,
  loadUsage,
  sessionIdFromPath,
  UsagePipeline,
} from "./usage-loader.js";

function usageLine(fields: { sessionId?: string; id: string; requestId: string; timestamp: string }): string {
  return JSON.stringify({
    timestamp: fields.timestamp,
    sessionId: fields.sessionId,
    requestId: fields.requestId,
    message: {
      id: fields.id,
      model: "claude-sonnet-4-20250514",
      usage: { input_tokens: 100, output_tokens: 50 },
    },
    costUSD: 0.01,
  });
}

describe("usage loading", () => {
  let root: string;
  let claudeDir: string;

  function writeUsageFile(project: string, name: string, lines: string[], mtimeSeconds: number): string {
    const dir = path.join(claudeDir, "projects", project);
    mkdirSync(dir, { recursive: true });
    const filePath = path.join(dir, name);
    writeFileSync(filePath, lines.join("\n"));
    utimesSync(filePath, mtimeSeconds, mtimeSeconds);
    return filePath;
  }

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "blockmeter-usage-"));
    claudeDir = path.join(root, "claude");
    mkdirSync(path.join(claudeDir, "projects"), { recursive: true });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("getClaudePaths", () => {
    it("keeps only directories with a projects folder", () => {
      const missing = path.join(root, "missing");
      expect(getClaudePaths(`${claudeDir}, ${missing}`, {})).toEqual([claudeDir]);
    });

    it("reads the environment when no path is given", () => {
      expect(getClaudePaths(undefined, { CLAUDE_CONFIG_DIR: claudeDir })).toEqual([claudeDir]);
    });

    it("fails when nothing is usable", () => {
      expect(() => getClaudePaths(path.join(root, "missing"), {})).toThrow(NoDataError);
    });
  });

  describe("path helpers", () => {
    it("takes the project from the directory below projects", () => {
      expect(extractProjectFromPath("/home/user/.claude/projects/my-app/abc.jsonl")).toBe("my-app");
      expect(extractProjectFromPath("/home/user/.claude/projects/abc.jsonl")).toBe("unknown");
      expect(extractProjectFromPath("/elsewhere/abc.jsonl")).toBe("unknown");
    });

    it("uses the file name as session id", () => {
      expect(sessionIdFromPath("/x/projects/my-app/abc-123.jsonl")).toBe("abc-123");
    });
  });

  describe("findUsageFiles", () => {
    it("orders files by modification time", () => {
      const newer = writeUsageFile("b", "newer.jsonl", [], 2_000_000);
      const older = writeUsageFile("a", "older.jsonl", [], 1_000_000);
      writeFileSync(path.join(claudeDir, "projects", "a", "notes.txt"), "ignored");
      expect(findUsageFiles([claudeDir])).toEqual([older, newer]);
    });

    it("fails without usage files", () => {
      expect(() => findUsageFiles([claudeDir])).toThrow(NoDataError);
    });
  });

  describe("loadUsage", () => {
    it("parses, deduplicates and folds every file", () => {
      const first = usageLine({ sessionId: "s1", id: "msg-1", requestId: "req-1", timestamp: "2025-01-15T10:00:00Z" });
      writeUsageFile(
        "my-app",
        "session-a.jsonl",
        [
          first,
          first,
          "{broken",
          "",
          JSON.stringify({ type: "summary", summary: "Refactor", leafUuid: "x" }),
          usageLine({ id: "msg-2", requestId: "req-2", timestamp: "2025-01-15T10:05:00Z" }),
        ],
        1_000_000,
      );
      writeUsageFile(
        "other",
        "b.jsonl",
        [first, usageLine({ sessionId: "s2", id: "msg-3", requestId: "req-3", timestamp: "2025-01-15T10:10:00Z" })],
        2_000_000,
      );

      const { sessions, daily, stats } = loadUsage({ claudeDir, timezone: "UTC" });

      expect(stats.files).toBe(2);
      expect(stats.lines).toBe(7);
      expect(stats.accepted).toBe(3);
      expect(stats.duplicates).toBe(2);
      expect(stats.skipped["invalid-json"]).toBe(1);
      expect(stats.skipped.summary).toBe(1);

      expect(sessions.map((session) => session.sessionId)).toEqual(["s1", "session-a", "s2"]);
      expect(sessions[0]?.projectName).toBe("my-app");
      expect(sessions[2]?.projectName).toBe("other");
      expect(daily).toHaveLength(1);
      expect(daily[0]?.inputTokens).toBe(300);
    });

    it("fails when no record is usable", () => {
      writeUsageFile("my-app", "empty.jsonl", ["{broken"], 1_000_000);
      expect(() => loadUsage({ claudeDir })).toThrow("No valid usage records found");
    });
  });

  describe("UsagePipeline", () => {
    it("counts unreadable files and moves on", () => {
      const pipeline = new UsagePipeline({ sinks: [] });
      pipeline.processFile(path.join(root, "does-not-exist.jsonl"));
      expect(pipeline.stats.files).toBe(1);
      expect(pipeline.stats.failedFiles).toBe(1);
    });

    it("applies a custom limit matcher", () => {
      const filePath = writeUsageFile(
        "my-app",
        "limits.jsonl",
        [
          JSON.stringify({
            timestamp: "2025-01-15T10:00:00Z",
            sessionId: "s1",
            isApiErrorMessage: true,
            message: { model: "claude-sonnet-4-20250514", usage: { input_tokens: 1 }, content: "quota exceeded" },
          }),
        ],
        1_000_000,
      );
      const reconstructor = new SessionReconstructor();
      const pipeline = new UsagePipeline({
        sinks: [reconstructor],
        limitErrorMatcher: (data) => data.isApiErrorMessage === true,
      });
      pipeline.processFile(filePath);
      expect(reconstructor.sessions()[0]?.hasLimitError).toBe(true);
    });
  });
});
