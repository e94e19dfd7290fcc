import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { UsageRecord } from "../domain.js";
import { LedgerWriteError, UsageLedger, coerceUsageRecord, usageFileName } from "../usage-ledger.js";

const NOW = new Date("2026-03-15T12:00:00.000Z");

function minutesAgo(minutes: number): string {
  return new Date(NOW.getTime() - minutes * 60_000).toISOString();
}

function makeRecord(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    type: "usage_captured",
    timestamp: minutesAgo(5),
    session_id: "session-1",
    model: "o3",
    phase: "phase-1",
    service: "design",
    user: "ci",
    success: true,
    error_kind: null,
    tokens: { input: 1000, output: 500, total: 1500 },
    cost_usd: { input: 0.01, output: 0.02, total: 0.03 },
    ...overrides,
  };
}

function withCost(total: number, overrides: Partial<UsageRecord> = {}): UsageRecord {
  return makeRecord({ ...overrides, cost_usd: { input: 0, output: total, total } });
}

describe("UsageLedger", () => {
  let dir: string;
  let ledger: UsageLedger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bw-ledger-"));
    ledger = new UsageLedger(dir, { now: () => NOW });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per record into the month's file", async () => {
    await ledger.append(makeRecord());
    await ledger.append(makeRecord({ session_id: "session-2" }));
    const lines = readFileSync(join(dir, "token-usage-202603.jsonl"), "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? "{}").session_id).toBe("session-2");
  });

  it("keeps every record under 50 concurrent writers", async () => {
    await Promise.all(Array.from({ length: 50 }, (_, i) => ledger.append(makeRecord({ session_id: `s-${i}` }))));
    const records = await ledger.readRecords();
    expect(records).toHaveLength(50);
    expect(new Set(records.map((r) => r.session_id)).size).toBe(50);
  });

  it("skips malformed and foreign lines and fills legacy defaults", async () => {
    const legacy = {
      type: "usage_captured",
      timestamp: "2026-03-15T11:00:00Z",
      session_id: "s1",
      model: "o3",
      phase: "p1",
      user: "ci",
      tokens: { input: 10, output: 5 },
      cost_usd: { input: 0.1, output: 0.2, total: 0.3 },
    };
    writeFileSync(
      join(dir, "token-usage-202603.jsonl"),
      ["not json", JSON.stringify({ type: "capture_failure", timestamp: NOW.toISOString() }), JSON.stringify(legacy), ""].join(
        "\n",
      ),
    );
    const records = await ledger.readRecords();
    expect(records).toHaveLength(1);
    expect(records[0]?.service).toBe("external");
    expect(records[0]?.success).toBe(true);
    expect(records[0]?.error_kind).toBeNull();
    expect(records[0]?.tokens.total).toBe(15);
  });

  it("throws LedgerWriteError when the directory is unusable", async () => {
    const blocked = join(dir, "file");
    writeFileSync(blocked, "");
    const broken = new UsageLedger(join(blocked, "metrics"));
    await expect(broken.append(makeRecord())).rejects.toBeInstanceOf(LedgerWriteError);
  });

  it("sums cost overall and per group", async () => {
    await ledger.append(withCost(0.5));
    await ledger.append(withCost(0.25));
    await ledger.append(withCost(0.1, { model: "gemini-2.5-pro", service: "review" }));
    await ledger.append(withCost(9, { timestamp: "2026-02-01T00:00:00.000Z" }));

    const since = minutesAgo(60);
    expect(await ledger.sumCost(since)).toEqual({ total: 0.85 });
    expect(await ledger.sumCost(since, "model")).toEqual({ o3: 0.75, "gemini-2.5-pro": 0.1 });
    expect(await ledger.countRequests("review", since)).toBe(1);
    expect(await ledger.countRequests("design", since)).toBe(2);
  });

  it("reports zero cost with no records", async () => {
    expect(await ledger.sumCost(minutesAgo(60))).toEqual({ total: 0 });
  });

  it("builds a usage report grouped by phase", async () => {
    await ledger.append(withCost(0.5, { phase: "build" }));
    await ledger.append(withCost(0.25, { phase: "build", session_id: "session-2" }));
    await ledger.append(withCost(1, { phase: "test", timestamp: minutesAgo(60 * 24 * 3) }));
    await ledger.append(withCost(4, { phase: "old", timestamp: minutesAgo(60 * 24 * 10) }));

    const report = await ledger.usageReport(7, "phase");
    expect(report.grouped_by).toBe("phase");
    expect(report.period.end).toBe(NOW.toISOString());
    expect(Object.keys(report.groups).sort()).toEqual(["build", "test"]);
    expect(report.groups.build).toEqual({
      requests: 2,
      sessions: 2,
      total_tokens: 3000,
      input_tokens: 2000,
      output_tokens: 1000,
      total_cost: 0.75,
    });
    expect(report.summary).toEqual({ total_requests: 3, total_sessions: 2, total_tokens: 4500, total_cost_usd: 1.75 });
  });

  it("counts distinct sessions apart from requests", async () => {
    await ledger.append(withCost(0.1, { session_id: "a" }));
    await ledger.append(withCost(0.1, { session_id: "a" }));
    await ledger.append(withCost(0.1, { session_id: "b" }));

    const report = await ledger.usageReport(1, "model");
    expect(report.groups.o3?.requests).toBe(3);
    expect(report.groups.o3?.sessions).toBe(2);
    expect(report.summary.total_requests).toBe(3);
    expect(report.summary.total_sessions).toBe(2);
  });

  it("keeps group names that collide with Object.prototype members as plain keys", async () => {
    await ledger.append(withCost(0.5, { phase: "__proto__" }));
    await ledger.append(withCost(0.25, { phase: "constructor" }));

    const report = await ledger.usageReport(7, "phase");
    expect(Object.keys(report.groups).sort()).toEqual(["__proto__", "constructor"]);
    expect(new Map(Object.entries(report.groups)).get("__proto__")?.total_cost).toBe(0.5);
    expect(report.summary.total_cost_usd).toBe(0.75);
    expect(Object.prototype.hasOwnProperty.call(Object.prototype, "total_cost")).toBe(false);

    const sums = await ledger.sumCost(minutesAgo(60), "phase");
    expect(Object.keys(sums).sort()).toEqual(["__proto__", "constructor"]);
    expect(new Map(Object.entries(sums)).get("__proto__")).toBe(0.5);
  });

  describe("checkThreshold", () => {
    it("is ok with no records", async () => {
      const result = await ledger.checkThreshold("day", 50, 200);
      expect(result.severity).toBe("ok");
      expect(result.totalCost).toBe(0);
      expect(result.records).toBe(0);
    });

    it("treats a cost equal to the warning threshold as a warning", async () => {
      await ledger.append(withCost(49.99));
      await ledger.append(withCost(0.01));
      const result = await ledger.checkThreshold("day", 50, 200);
      expect(result.severity).toBe("warning");
      expect(result.totalCost).toBe(50);
      expect(result.since).toBe(new Date(NOW.getTime() - 86_400_000).toISOString());
    });

    it("treats a cost equal to the critical threshold as critical", async () => {
      await ledger.append(withCost(50));
      const result = await ledger.checkThreshold("hour", 10, 50);
      expect(result.severity).toBe("critical");
    });

    it("only counts the window of the period", async () => {
      await ledger.append(withCost(40, { timestamp: minutesAgo(120) }));
      await ledger.append(withCost(5));
      const hour = await ledger.checkThreshold("hour", 10, 50);
      expect(hour.severity).toBe("ok");
      expect(hour.totalCost).toBe(5);
      const day = await ledger.checkThreshold("day", 10, 50);
      expect(day.severity).toBe("warning");
      expect(day.totalCost).toBe(45);
    });

    it("uses the most recent record for the request period", async () => {
      await ledger.append(withCost(0.2, { timestamp: minutesAgo(1) }));
      await ledger.append(withCost(7, { timestamp: minutesAgo(30) }));
      const result = await ledger.checkThreshold("request", 1, 5);
      expect(result.severity).toBe("ok");
      expect(result.totalCost).toBe(0.2);
      expect(result.records).toBe(1);
      expect(result.since).toBe(minutesAgo(1));
    });

    it("has no reference time for the request period on an empty ledger", async () => {
      const result = await ledger.checkThreshold("request", 1, 5);
      expect(result.since).toBeNull();
      expect(result.severity).toBe("ok");
    });
  });

  it("records alerts only for breaches", async () => {
    const ok = await ledger.checkThreshold("day", 50, 200);
    expect(await ledger.recordAlert(ok)).toBe(false);
    expect(existsSync(join(dir, "cost-alerts.jsonl"))).toBe(false);

    await ledger.append(withCost(60));
    const warning = await ledger.checkThreshold("day", 50, 200);
    expect(await ledger.recordAlert(warning)).toBe(true);
    const alert = JSON.parse(readFileSync(join(dir, "cost-alerts.jsonl"), "utf-8").trim());
    expect(alert).toEqual({
      timestamp: NOW.toISOString(),
      alert_level: "warning",
      period: "day",
      cost: 60,
      threshold: 50,
      records: 1,
    });
  });

  it("returns nothing for a missing metrics directory", async () => {
    const missing = new UsageLedger(join(dir, "nope"));
    expect(await missing.readRecords()).toEqual([]);
  });

  it("skips month files before the window", async () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, "token-usage-202501.jsonl"), JSON.stringify(withCost(3, { timestamp: "2026-03-15T11:59:00.000Z" })) + "\n");
    expect(await ledger.readRecords({ since: minutesAgo(60) })).toEqual([]);
    expect(await ledger.readRecords()).toHaveLength(1);
  });
});

describe("usage record helpers", () => {
  it("names files by UTC month", () => {
    expect(usageFileName(new Date("2026-12-31T23:59:59.000Z"))).toBe("token-usage-202612.jsonl");
    expect(usageFileName(new Date("2026-01-01T00:00:00.000Z"))).toBe("token-usage-202601.jsonl");
  });

  it("rejects records with bad timestamps", () => {
    expect(coerceUsageRecord({ ...makeRecord(), timestamp: "yesterday" })).toBeNull();
  });
});
