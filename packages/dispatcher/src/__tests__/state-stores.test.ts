import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { FailureTracker } from "../failure-tracker.js";
import { IdempotencyGuard } from "../idempotency-guard.js";

const START = Date.parse("2026-04-01T08:00:00.000Z");

describe("IdempotencyGuard", () => {
  let dir: string;
  let nowMs: number;
  let guard: IdempotencyGuard;
  const warnings: string[] = [];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bw-guard-"));
    nowMs = START;
    warnings.length = 0;
    guard = new IdempotencyGuard(dir, {
      now: () => new Date(nowMs),
      diagnostics: { debug() {}, info() {}, warn: (message) => warnings.push(message), error() {} },
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("allows the first invocation and skips a repeat", async () => {
    expect(await guard.check("make-1", 60_000)).toBe("allow");
    expect(await guard.check("make-1", 60_000)).toBe("skip");
    expect(await guard.check("make-2", 60_000)).toBe("allow");
  });

  it("allows again once the record has expired", async () => {
    await guard.check("make-1", 60_000);
    nowMs = START + 59_999;
    expect(await guard.check("make-1", 60_000)).toBe("skip");
    nowMs = START + 60_000;
    expect(await guard.check("make-1", 60_000)).toBe("allow");
  });

  it("prunes expired records on every check", async () => {
    await guard.check("old", 1_000);
    nowMs = START + 5_000;
    await guard.check("new", 1_000);
    expect(Object.keys(guard.read().records)).toEqual(["new"]);
  });

  it("forgets a released signature", async () => {
    await guard.check("make-1", 60_000);
    await guard.release("make-1");
    expect(await guard.check("make-1", 60_000)).toBe("allow");
  });

  it("allows only one of many concurrent checks", async () => {
    const verdicts = await Promise.all(Array.from({ length: 10 }, () => guard.check("race", 60_000)));
    expect(verdicts.filter((verdict) => verdict === "allow")).toHaveLength(1);
  });

  it("fails open when the store cannot be written", async () => {
    const blocker = join(dir, "not-a-dir");
    writeFileSync(blocker, "file", "utf-8");
    const broken = new IdempotencyGuard(join(blocker, "state"), {
      diagnostics: { debug() {}, info() {}, warn: (message) => warnings.push(message), error() {} },
    });
    expect(await broken.check("make-1", 60_000)).toBe("allow");
    expect(await broken.check("make-1", 60_000)).toBe("allow");
    expect(warnings).toHaveLength(2);
    expect(warnings[0]).toContain("guard unavailable, allowing make-1");
  });
});

describe("FailureTracker", () => {
  let dir: string;
  let nowMs: number;
  let tracker: FailureTracker;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bw-failures-"));
    mkdirSync(dir, { recursive: true });
    nowMs = START;
    tracker = new FailureTracker(dir, { now: () => new Date(nowMs) });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("counts consecutive failures and clears on success", async () => {
    expect(await tracker.recordFailure("sig", "e1", "make")).toBe(1);
    expect(await tracker.recordFailure("sig", "e2")).toBe(2);
    const record = await tracker.getRecord("sig");
    expect(record?.lastError).toBe("e2");
    expect(record?.command).toBe("make");

    await tracker.recordSuccess("sig");
    expect(await tracker.getRecord("sig")).toBeNull();
    expect(await tracker.recordFailure("sig", "e3")).toBe(1);
  });

  it("reports the ceiling once the count reaches the maximum", async () => {
    await tracker.recordFailure("sig", "e");
    await tracker.recordFailure("sig", "e");
    expect(await tracker.checkCeiling("sig", 3)).toBe("under-limit");
    await tracker.recordFailure("sig", "e");
    expect(await tracker.checkCeiling("sig", 3)).toBe("at-limit");
    expect(await tracker.checkCeiling("other", 3)).toBe("under-limit");
  });

  it("keeps only the tail of long error output", async () => {
    await tracker.recordFailure("sig", "x".repeat(5000) + "END");
    const record = await tracker.getRecord("sig");
    expect(record?.lastError).toHaveLength(4000);
    expect(record?.lastError.endsWith("END")).toBe(true);
  });

  it("loses no increments under concurrency", async () => {
    await Promise.all(Array.from({ length: 20 }, () => tracker.recordFailure("sig", "boom")));
    expect((await tracker.getRecord("sig"))?.consecutiveCount).toBe(20);
  });

  it("resets every record for a command regardless of spacing", async () => {
    await tracker.recordFailure("a", "e", "make  check");
    await tracker.recordFailure("b", "e", "make check");
    await tracker.recordFailure("c", "e", "make all");
    expect(await tracker.resetCommand("make check")).toBe(2);
    expect((await tracker.list()).map((record) => record.signature)).toEqual(["c"]);
  });

  it("lists the most recently updated first", async () => {
    await tracker.recordFailure("first", "e");
    nowMs += 1_000;
    await tracker.recordFailure("second", "e");
    expect((await tracker.list()).map((record) => record.signature)).toEqual(["second", "first"]);
  });

  it("prunes records older than the retention window", async () => {
    await tracker.recordFailure("stale", "e");
    nowMs = START + 10 * 86_400_000;
    await tracker.recordFailure("fresh", "e");
    expect(await tracker.prune(7)).toBe(1);
    expect(await tracker.getRecord("stale")).toBeNull();
    expect(await tracker.getRecord("fresh")).not.toBeNull();
  });

  it("treats a corrupt store as empty", async () => {
    writeFileSync(join(dir, "failures.json"), "{not json", "utf-8");
    expect(await tracker.recordFailure("sig", "e")).toBe(1);
  });
});
