import Table from "cli-table3";
import pc from "picocolors";
import { formatDateTime, formatDuration } from "./date-utils.js";
import { simplifyModelName } from "./models.js";
import type { DailyStats, MonthlyStats, UsageStats } from "./reports.js";
import { getRawTokens, getTotalTokens, type Block, type ModelBreakdown, type Session } from "./types.js";

type Align = "left" | "right" | "center";

const USAGE_HEAD = ["Models", "Input", "Output", "Cache Create", "Cache Read", "Total Tokens", "Cost (USD)"];
const USAGE_ALIGNS: Align[] = ["left", "right", "right", "right", "right", "right", "right"];

export function formatNumber(value: number): string {
  return Math.round(value).toLocaleString("en-US");
}

export function formatCurrency(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Simplified, de-duplicated model names, one per line
 */
export function formatModelsDisplay(models: readonly string[]): string {
  return [...new Set(models.map(simplifyModelName))].join("\n");
}

function createTable(head: string[], colAligns: Align[]): Table.Table {
  return new Table({
    head,
    colAligns,
    style: { head: ["cyan"] },
  });
}

function usageCells(stats: UsageStats): string[] {
  return [
    formatModelsDisplay(stats.models),
    formatNumber(stats.inputTokens),
    formatNumber(stats.outputTokens),
    formatNumber(stats.cacheCreationTokens),
    formatNumber(stats.cacheReadTokens),
    formatNumber(stats.totalTokens),
    formatCurrency(stats.costUSD),
  ];
}

function breakdownRows(breakdowns: ReadonlyMap<string, ModelBreakdown>, leading: number): string[][] {
  return [...breakdowns]
    .sort(([, a], [, b]) => b.costUSD - a.costUSD)
    .map(([model, usage]) => [
      ...Array.from({ length: leading }, () => ""),
      pc.gray(`└─ ${simplifyModelName(model)}`),
      pc.gray(formatNumber(usage.inputTokens)),
      pc.gray(formatNumber(usage.outputTokens)),
      pc.gray(formatNumber(usage.cacheCreationTokens)),
      pc.gray(formatNumber(usage.cacheReadTokens)),
      pc.gray(formatNumber(getTotalTokens(usage))),
      pc.gray(formatCurrency(usage.costUSD)),
    ]);
}

function totalRow(rows: readonly UsageStats[]): string[] {
  const sum = (pick: (row: UsageStats) => number): number =>
    rows.reduce((acc, row) => acc + pick(row), 0);
  return [
    pc.yellow("Total"),
    "",
    pc.yellow(formatNumber(sum((row) => row.inputTokens))),
    pc.yellow(formatNumber(sum((row) => row.outputTokens))),
    pc.yellow(formatNumber(sum((row) => row.cacheCreationTokens))),
    pc.yellow(formatNumber(sum((row) => row.cacheReadTokens))),
    pc.yellow(formatNumber(sum((row) => row.totalTokens))),
    pc.yellow(formatCurrency(sum((row) => row.costUSD))),
  ];
}

function renderUsageTable(
  label: string,
  rows: readonly { key: string; stats: UsageStats }[],
  breakdown: boolean,
): string {
  const table = createTable([label, ...USAGE_HEAD], ["left", ...USAGE_ALIGNS]);
  for (const { key, stats } of rows) {
    table.push([key, ...usageCells(stats)]);
    if (breakdown) {
      table.push(...breakdownRows(stats.modelBreakdowns, 1));
    }
  }
  table.push(totalRow(rows.map((row) => row.stats)));
  return table.toString();
}

export function renderDailyTable(daily: readonly DailyStats[], breakdown = false): string {
  return renderUsageTable(
    "Date",
    daily.map((day) => ({ key: day.date, stats: day })),
    breakdown,
  );
}

export function renderMonthlyTable(monthly: readonly MonthlyStats[], breakdown = false): string {
  return renderUsageTable(
    "Month",
    monthly.map((month) => ({ key: month.month, stats: month })),
    breakdown,
  );
}

export function renderSessionTable(sessions: readonly Session[], timezone?: string): string {
  const table = createTable(
    ["Session", "Project", "Started", "Models", "Tokens", "Weighted", "Cost (USD)"],
    ["left", "left", "left", "left", "right", "right", "right"],
  );
  let tokens = 0;
  let weighted = 0;
  let cost = 0;
  for (const session of sessions) {
    let sessionTokens = 0;
    for (const usage of session.modelUsage.values()) {
      sessionTokens += getRawTokens(usage);
    }
    tokens += sessionTokens;
    weighted += session.totalWeightedTokens;
    cost += session.costUSD;
    table.push([
      session.hasLimitError ? pc.red(session.sessionId) : session.sessionId,
      session.projectName,
      formatDateTime(session.startTime, timezone),
      formatModelsDisplay([...session.modelUsage.keys()]),
      formatNumber(sessionTokens),
      formatNumber(session.totalWeightedTokens),
      formatCurrency(session.costUSD),
    ]);
  }
  table.push([
    pc.yellow("Total"),
    "",
    "",
    "",
    pc.yellow(formatNumber(tokens)),
    pc.yellow(formatNumber(weighted)),
    pc.yellow(formatCurrency(cost)),
  ]);
  return table.toString();
}

function blockLabel(block: Block, timezone: string | undefined): string {
  const start = formatDateTime(block.startTime, timezone);
  if (block.isGap) {
    return pc.gray(`${start} (gap)`);
  }
  return block.isActive ? pc.green(`${start} (active)`) : start;
}

export function renderBlocksTable(blocks: readonly Block[], timezone?: string): string {
  const table = createTable(
    ["Block Start", "Duration", "Models", "Tokens", "Weighted", "Tokens/min", "Cost (USD)"],
    ["left", "right", "left", "right", "right", "right", "right"],
  );
  for (const block of blocks) {
    const minutes = (block.endTime.getTime() - block.startTime.getTime()) / 60_000;
    if (block.isGap) {
      table.push([blockLabel(block, timezone), pc.gray(formatDuration(minutes)), "", "", "", "", ""]);
      continue;
    }
    table.push([
      blockLabel(block, timezone),
      formatDuration(minutes),
      formatModelsDisplay(block.models),
      formatNumber(block.totalTokens),
      formatNumber(block.weightedTotalTokens),
      block.burnRate != null ? formatNumber(block.burnRate.tokensPerMinute) : "-",
      formatCurrency(block.costUSD),
    ]);
  }
  return table.toString();
}
