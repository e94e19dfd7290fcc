import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, rmSync, utimesSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { LockTimeoutError, readJsonState, withFileLock, writeJsonStateAtomic } from "../file-lock.js";

function readCount(path: string): number {
  return readJsonState(path, () => 0, (raw) => (typeof raw === "number" ? raw : null));
}

describe("withFileLock", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bw-lock-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("serializes concurrent read-modify-write cycles", async () => {
    const target = join(dir, "counter.json");
    await Promise.all(
      Array.from({ length: 20 }, () =>
        withFileLock(target, () => {
          writeJsonStateAtomic(target, readCount(target) + 1);
        }, { pollMs: 5 }),
      ),
    );
    expect(readCount(target)).toBe(20);
    expect(readdirSync(dir).sort()).toEqual(["counter.json"]);
  });

  it("times out on a fresh lock held elsewhere", async () => {
    const target = join(dir, "state.json");
    writeFileSync(`${target}.lock`, "");
    await expect(withFileLock(target, () => "ran", { timeoutMs: 60, pollMs: 10 })).rejects.toBeInstanceOf(
      LockTimeoutError,
    );
  });

  it("breaks a stale lock", async () => {
    const target = join(dir, "state.json");
    const lock = `${target}.lock`;
    writeFileSync(lock, "");
    const old = new Date(Date.now() - 120_000);
    utimesSync(lock, old, old);
    await expect(withFileLock(target, () => "ran", { timeoutMs: 30, pollMs: 10 })).resolves.toBe("ran");
    expect(readdirSync(dir)).toEqual([]);
  });

  it("releases the lock when the callback throws", async () => {
    const target = join(dir, "state.json");
    await expect(
      withFileLock(target, () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(withFileLock(target, () => "again", { timeoutMs: 30 })).resolves.toBe("again");
  });
});

describe("JSON state files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bw-state-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("falls back on missing or unparseable files", () => {
    const path = join(dir, "broken.json");
    expect(readCount(path)).toBe(0);
    writeFileSync(path, "{not json");
    expect(readCount(path)).toBe(0);
    writeFileSync(path, '"a string"');
    expect(readCount(path)).toBe(0);
  });

  it("creates parent directories on write", () => {
    const path = join(dir, "nested", "deeper", "value.json");
    writeJsonStateAtomic(path, 5);
    expect(readCount(path)).toBe(5);
    expect(readdirSync(join(dir, "nested", "deeper"))).toEqual(["value.json"]);
  });
});
