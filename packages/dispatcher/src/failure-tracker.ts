/**
 * failure-tracker.ts — consecutive failure counts per command signature
 *
 * Store: <state_dir>/failures.json. Every increment is a locked
 * read-modify-write, so concurrent failures of one signature are never lost.
 */

import { join } from "path";
import {
  normalizeCommand,
  readJsonState,
  withFileLock,
  writeJsonStateAtomic,
  type CeilingVerdict,
  type CommandSignature,
  type FailureRecord,
  type FailureStoreFile,
  type FailureTrackerPort,
} from "@buildwarden/architecture";
import { z } from "zod";

const STORE_FILE = "failures.json";
const MAX_STORED_ERROR = 4000;
const DAY_MS = 86_400_000;

const storeSchema = z.object({
  failures: z.record(
    z.object({
      signature: z.string(),
      consecutiveCount: z.number().int().nonnegative(),
      lastError: z.string().default(""),
      lastUpdated: z.string(),
      command: z.string().optional(),
    }),
  ),
  last_updated: z.string().optional(),
});

export interface FailureTrackerOptions {
  now?: () => Date;
}

export class FailureTracker implements FailureTrackerPort {
  readonly filePath: string;
  private readonly now: () => Date;

  constructor(stateDir: string, options: FailureTrackerOptions = {}) {
    this.filePath = join(stateDir, STORE_FILE);
    this.now = options.now ?? (() => new Date());
  }

  async recordFailure(signature: CommandSignature, errorText: string, command?: string): Promise<number> {
    return this.mutate((store, timestamp) => {
      const previous = store.failures[signature];
      const count = (previous?.consecutiveCount ?? 0) + 1;
      store.failures[signature] = {
        signature,
        consecutiveCount: count,
        lastError: errorText.slice(-MAX_STORED_ERROR),
        lastUpdated: timestamp,
        command: command ?? previous?.command,
      };
      return count;
    });
  }

  async recordSuccess(signature: CommandSignature): Promise<void> {
    await this.mutate((store) => {
      delete store.failures[signature];
    });
  }

  async checkCeiling(signature: CommandSignature, max: number): Promise<CeilingVerdict> {
    const record = await this.getRecord(signature);
    return (record?.consecutiveCount ?? 0) >= max ? "at-limit" : "under-limit";
  }

  async getRecord(signature: CommandSignature): Promise<FailureRecord | null> {
    return this.read().failures[signature] ?? null;
  }

  /** Most recently updated first. */
  async list(): Promise<FailureRecord[]> {
    return Object.values(this.read().failures).sort((a, b) => b.lastUpdated.localeCompare(a.lastUpdated));
  }

  /** Clear every record whose command text matches, whatever its cwd or scope. */
  async resetCommand(command: string): Promise<number> {
    const wanted = normalizeCommand(command);
    return this.mutate((store) => {
      let removed = 0;
      for (const [key, record] of Object.entries(store.failures)) {
        if (record.command !== undefined && normalizeCommand(record.command) === wanted) {
          delete store.failures[key];
          removed += 1;
        }
      }
      return removed;
    });
  }

  /** Drop records not updated within the retention window. */
  async prune(retentionDays: number): Promise<number> {
    const cutoff = this.now().getTime() - retentionDays * DAY_MS;
    return this.mutate((store) => {
      let removed = 0;
      for (const [key, record] of Object.entries(store.failures)) {
        const updated = Date.parse(record.lastUpdated);
        if (Number.isNaN(updated) || updated < cutoff) {
          delete store.failures[key];
          removed += 1;
        }
      }
      return removed;
    });
  }

  read(): FailureStoreFile {
    return readJsonState(
      this.filePath,
      () => ({ version: 1, failures: {}, last_updated: this.now().toISOString() }),
      (raw) => {
        const parsed = storeSchema.safeParse(raw);
        if (!parsed.success) return null;
        return {
          version: 1,
          failures: parsed.data.failures,
          last_updated: parsed.data.last_updated ?? this.now().toISOString(),
        };
      },
    );
  }

  private async mutate<T>(fn: (store: FailureStoreFile, timestamp: string) => T): Promise<T> {
    return withFileLock(this.filePath, () => {
      const store = this.read();
      const timestamp = this.now().toISOString();
      const result = fn(store, timestamp);
      store.last_updated = timestamp;
      writeJsonStateAtomic(this.filePath, store);
      return result;
    });
  }
}
