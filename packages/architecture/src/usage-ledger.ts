/**
 * usage-ledger.ts — append-only token usage and cost ledger
 *
 * One JSON line per record in <metricsDir>/token-usage-YYYYMM.jsonl. Writers
 * only ever append a single complete line, so concurrent jobs never need to
 * coordinate and a cancelled writer cannot leave a half-rewritten file.
 * Readers skip anything that does not parse as a usage record.
 */

import { appendFile, mkdir, readFile, readdir } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import type {
  CostPeriod,
  ISODateTime,
  ThresholdResult,
  ThresholdSeverity,
  UsageGroupField,
  UsageGroupSummary,
  UsageRecord,
  UsageReport,
} from "./domain.js";
import type { UsageLedgerPort } from "./ports.js";

const USAGE_FILE_PATTERN = /^token-usage-(\d{6})\.jsonl$/;
const ALERT_FILE = "cost-alerts.jsonl";

const PERIOD_WINDOW_MS: Record<Exclude<CostPeriod, "request">, number> = {
  hour: 3_600_000,
  day: 86_400_000,
};

export class LedgerWriteError extends Error {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super(`Failed to append usage record to ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "LedgerWriteError";
  }
}

// Older lines written by shell tooling lack service/success/error_kind.
const usageLineSchema = z.object({
  type: z.literal("usage_captured"),
  timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), "invalid timestamp"),
  session_id: z.string().default("unknown"),
  model: z.string().default("unknown"),
  phase: z.string().default("unknown"),
  service: z.enum(["design", "review", "external"]).default("external"),
  user: z.string().default("unknown"),
  success: z.boolean().default(true),
  error_kind: z
    .enum(["transient", "permanent", "quota-exceeded", "configuration", "cancelled"])
    .nullable()
    .default(null),
  tokens: z.object({
    input: z.number().nonnegative(),
    output: z.number().nonnegative(),
    total: z.number().nonnegative().optional(),
  }),
  cost_usd: z.object({
    input: z.number().nonnegative().default(0),
    output: z.number().nonnegative().default(0),
    total: z.number().nonnegative(),
  }),
});

export function coerceUsageRecord(value: unknown): UsageRecord | null {
  const parsed = usageLineSchema.safeParse(value);
  if (!parsed.success) return null;
  const line = parsed.data;
  return {
    ...line,
    tokens: {
      input: line.tokens.input,
      output: line.tokens.output,
      total: line.tokens.total ?? line.tokens.input + line.tokens.output,
    },
  };
}

export function roundUsd(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

export function usageFileName(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `token-usage-${date.getUTCFullYear()}${month}.jsonl`;
}

function monthKey(date: Date): string {
  return `${date.getUTCFullYear()}${String(date.getUTCMonth() + 1).padStart(2, "0")}`;
}

function groupKey(record: UsageRecord, field: UsageGroupField): string {
  switch (field) {
    case "model":
      return record.model;
    case "phase":
      return record.phase;
    case "user":
      return record.user;
    case "session":
      return record.session_id;
    case "service":
      return record.service;
  }
}

export function severityFor(cost: number, warning: number, critical: number): ThresholdSeverity {
  if (cost >= critical) return "critical";
  if (cost >= warning) return "warning";
  return "ok";
}

export interface ReadRecordsOptions {
  since?: ISODateTime;
  until?: ISODateTime;
}

export interface UsageLedgerOptions {
  now?: () => Date;
}

export class UsageLedger implements UsageLedgerPort {
  private readonly now: () => Date;

  constructor(
    readonly metricsDir: string,
    options: UsageLedgerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async append(record: UsageRecord): Promise<void> {
    const filePath = join(this.metricsDir, usageFileName(new Date(record.timestamp)));
    try {
      await mkdir(this.metricsDir, { recursive: true });
      await appendFile(filePath, JSON.stringify(record) + "\n", "utf-8");
    } catch (err) {
      throw new LedgerWriteError(filePath, err);
    }
  }

  async readRecords(options: ReadRecordsOptions = {}): Promise<UsageRecord[]> {
    const sinceMs = options.since ? Date.parse(options.since) : Number.NEGATIVE_INFINITY;
    const untilMs = options.until ? Date.parse(options.until) : Number.POSITIVE_INFINITY;
    const firstMonth = options.since ? monthKey(new Date(sinceMs)) : null;

    let names: string[];
    try {
      names = await readdir(this.metricsDir);
    } catch {
      return [];
    }

    const records: UsageRecord[] = [];
    for (const name of names.sort()) {
      const match = name.match(USAGE_FILE_PATTERN);
      if (!match?.[1]) continue;
      if (firstMonth && match[1] < firstMonth) continue;

      let content: string;
      try {
        content = await readFile(join(this.metricsDir, name), "utf-8");
      } catch {
        continue;
      }

      for (const line of content.split("\n")) {
        if (!line.trim()) continue;
        let raw: unknown;
        try {
          raw = JSON.parse(line);
        } catch {
          continue;
        }
        const record = coerceUsageRecord(raw);
        if (!record) continue;
        const at = Date.parse(record.timestamp);
        if (at < sinceMs || at > untilMs) continue;
        records.push(record);
      }
    }
    return records;
  }

  /** Total cost since `since`, keyed by group value, or under "total" when ungrouped. */
  async sumCost(since: ISODateTime, groupBy?: UsageGroupField): Promise<Record<string, number>> {
    const records = await this.readRecords({ since });
    const sums = new Map<string, number>();
    if (!groupBy) sums.set("total", 0);
    for (const record of records) {
      const key = groupBy ? groupKey(record, groupBy) : "total";
      sums.set(key, (sums.get(key) ?? 0) + record.cost_usd.total);
    }
    // fromEntries defines own properties, so a "__proto__" group stays a plain key.
    return Object.fromEntries([...sums].map(([key, sum]) => [key, roundUsd(sum)]));
  }

  async countRequests(service: UsageRecord["service"], since: ISODateTime): Promise<number> {
    const records = await this.readRecords({ since });
    return records.filter((record) => record.service === service).length;
  }

  async usageReport(days: number, groupBy: UsageGroupField): Promise<UsageReport> {
    const end = this.now();
    const start = new Date(end.getTime() - days * 86_400_000);
    const records = await this.readRecords({ since: start.toISOString(), until: end.toISOString() });

    const groups = new Map<string, { summary: UsageGroupSummary; sessions: Set<string> }>();
    const sessions = new Set<string>();
    let totalTokens = 0;
    let totalCost = 0;
    for (const record of records) {
      const key = groupKey(record, groupBy);
      let group = groups.get(key);
      if (!group) {
        group = {
          summary: { requests: 0, sessions: 0, total_tokens: 0, input_tokens: 0, output_tokens: 0, total_cost: 0 },
          sessions: new Set(),
        };
        groups.set(key, group);
      }
      group.sessions.add(record.session_id);
      group.summary.requests += 1;
      group.summary.sessions = group.sessions.size;
      group.summary.total_tokens += record.tokens.total;
      group.summary.input_tokens += record.tokens.input;
      group.summary.output_tokens += record.tokens.output;
      group.summary.total_cost = roundUsd(group.summary.total_cost + record.cost_usd.total);
      sessions.add(record.session_id);
      totalTokens += record.tokens.total;
      totalCost += record.cost_usd.total;
    }

    return {
      period: { start: start.toISOString(), end: end.toISOString() },
      summary: {
        total_requests: records.length,
        total_sessions: sessions.size,
        total_tokens: totalTokens,
        total_cost_usd: roundUsd(totalCost),
      },
      grouped_by: groupBy,
      groups: Object.fromEntries([...groups].map(([key, group]) => [key, group.summary])),
    };
  }

  /**
   * Compare the period's cost with the thresholds. A cost equal to a
   * threshold counts as that threshold's severity. "request" looks at the
   * most recent record only.
   */
  async checkThreshold(period: CostPeriod, warning: number, critical: number): Promise<ThresholdResult> {
    const checkedAt = this.now();

    if (period === "request") {
      const records = await this.readRecords();
      let latest: UsageRecord | null = null;
      for (const record of records) {
        if (!latest || Date.parse(record.timestamp) >= Date.parse(latest.timestamp)) latest = record;
      }
      const totalCost = latest ? roundUsd(latest.cost_usd.total) : 0;
      return {
        period,
        severity: severityFor(totalCost, warning, critical),
        totalCost,
        warning,
        critical,
        records: latest ? 1 : 0,
        since: latest?.timestamp ?? null,
        checkedAt: checkedAt.toISOString(),
      };
    }

    const since = new Date(checkedAt.getTime() - PERIOD_WINDOW_MS[period]).toISOString();
    const records = await this.readRecords({ since, until: checkedAt.toISOString() });
    const totalCost = roundUsd(records.reduce((sum, record) => sum + record.cost_usd.total, 0));
    return {
      period,
      severity: severityFor(totalCost, warning, critical),
      totalCost,
      warning,
      critical,
      records: records.length,
      since,
      checkedAt: checkedAt.toISOString(),
    };
  }

  /** Append a non-ok threshold result to cost-alerts.jsonl. */
  async recordAlert(result: ThresholdResult): Promise<boolean> {
    if (result.severity === "ok") return false;
    const filePath = join(this.metricsDir, ALERT_FILE);
    const entry = {
      timestamp: result.checkedAt,
      alert_level: result.severity,
      period: result.period,
      cost: result.totalCost,
      threshold: result.severity === "critical" ? result.critical : result.warning,
      records: result.records,
    };
    try {
      await mkdir(this.metricsDir, { recursive: true });
      await appendFile(filePath, JSON.stringify(entry) + "\n", "utf-8");
    } catch (err) {
      throw new LedgerWriteError(filePath, err);
    }
    return true;
  }
}
