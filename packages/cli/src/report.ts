/**
 * report.ts — usage report rendering (table, json, csv)
 */

import type { UsageGroupSummary, UsageReport } from "@buildwarden/architecture";
import type { ReportFormat } from "./args.js";

const COLUMNS = ["requests", "sessions", "input_tokens", "output_tokens", "total_tokens", "total_cost"] as const;

/** Groups by cost, highest first; ties by name. */
function sortedGroups(report: UsageReport): Array<[string, UsageGroupSummary]> {
  return Object.entries(report.groups).sort(
    ([nameA, a], [nameB, b]) => b.total_cost - a.total_cost || nameA.localeCompare(nameB),
  );
}

function csvCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function formatCsv(report: UsageReport): string {
  const lines = [[report.grouped_by, ...COLUMNS].join(",")];
  for (const [name, group] of sortedGroups(report)) {
    lines.push([csvCell(name), ...COLUMNS.map((column) => String(group[column]))].join(","));
  }
  return lines.join("\n");
}

function formatTable(report: UsageReport): string {
  const header = [report.grouped_by.toUpperCase(), "REQUESTS", "SESSIONS", "INPUT", "OUTPUT", "TOKENS", "COST (USD)"];
  const rows = sortedGroups(report).map(([name, group]) => [
    name,
    String(group.requests),
    String(group.sessions),
    String(group.input_tokens),
    String(group.output_tokens),
    String(group.total_tokens),
    group.total_cost.toFixed(4),
  ]);
  const { summary } = report;
  const total = [
    "total",
    String(summary.total_requests),
    String(summary.total_sessions),
    "",
    "",
    String(summary.total_tokens),
    summary.total_cost_usd.toFixed(4),
  ];

  const widths = header.map((cell, index) =>
    Math.max(cell.length, ...[...rows, total].map((row) => (row[index] ?? "").length)),
  );
  const render = (row: string[]) =>
    row
      .map((cell, index) => (index === 0 ? cell.padEnd(widths[index] ?? 0) : cell.padStart(widths[index] ?? 0)))
      .join("  ")
      .trimEnd();

  return [
    `Usage from ${report.period.start} to ${report.period.end}`,
    "",
    render(header),
    ...(rows.length ? rows.map(render) : ["(no usage recorded)"]),
    render(total),
  ].join("\n");
}

export function formatUsageReport(report: UsageReport, format: ReportFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(report, null, 2);
    case "csv":
      return formatCsv(report);
    case "table":
      return formatTable(report);
  }
}
