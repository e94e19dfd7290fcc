/**
 * idempotency-guard.ts — suppress duplicate invocations of the same command
 *
 * Store: <state_dir>/idempotency.json. Check-and-set runs under the file
 * lock so two racing invocations cannot both be allowed. Any persistence
 * problem fails open: a broken guard must never stop a build.
 */

import { join } from "path";
import {
  createDiagnostics,
  describeError,
  readJsonState,
  withFileLock,
  writeJsonStateAtomic,
  type CommandSignature,
  type Diagnostics,
  type GuardVerdict,
  type IdempotencyPort,
  type IdempotencyRecord,
  type IdempotencyStoreFile,
} from "@buildwarden/architecture";
import { z } from "zod";

const STORE_FILE = "idempotency.json";

const storeSchema = z.object({
  records: z.record(
    z.object({
      signature: z.string(),
      lastSeen: z.string(),
      ttlMs: z.number(),
    }),
  ),
});

function emptyStore(): IdempotencyStoreFile {
  return { version: 1, records: {} };
}

function normalize(raw: unknown): IdempotencyStoreFile | null {
  const parsed = storeSchema.safeParse(raw);
  return parsed.success ? { version: 1, records: parsed.data.records } : null;
}

function isExpired(record: IdempotencyRecord, nowMs: number): boolean {
  const seen = Date.parse(record.lastSeen);
  return Number.isNaN(seen) || seen + record.ttlMs <= nowMs;
}

export interface IdempotencyGuardOptions {
  now?: () => Date;
  diagnostics?: Diagnostics;
}

export class IdempotencyGuard implements IdempotencyPort {
  readonly filePath: string;
  private readonly now: () => Date;
  private readonly log: Diagnostics;

  constructor(stateDir: string, options: IdempotencyGuardOptions = {}) {
    this.filePath = join(stateDir, STORE_FILE);
    this.now = options.now ?? (() => new Date());
    this.log = options.diagnostics ?? createDiagnostics("idempotency");
  }

  async check(signature: CommandSignature, ttlMs: number): Promise<GuardVerdict> {
    try {
      return await withFileLock(this.filePath, () => {
        const now = this.now();
        const store = this.read();
        for (const [key, record] of Object.entries(store.records)) {
          if (isExpired(record, now.getTime())) delete store.records[key];
        }

        if (store.records[signature]) {
          writeJsonStateAtomic(this.filePath, store);
          return "skip";
        }

        store.records[signature] = { signature, lastSeen: now.toISOString(), ttlMs };
        writeJsonStateAtomic(this.filePath, store);
        return "allow";
      });
    } catch (err) {
      this.log.warn(`guard unavailable, allowing ${signature}: ${describeError(err)}`);
      return "allow";
    }
  }

  /** Forget a signature so a legitimate retry is not mistaken for a duplicate. */
  async release(signature: CommandSignature): Promise<void> {
    try {
      await withFileLock(this.filePath, () => {
        const store = this.read();
        if (!store.records[signature]) return;
        delete store.records[signature];
        writeJsonStateAtomic(this.filePath, store);
      });
    } catch (err) {
      this.log.warn(`could not release ${signature}: ${describeError(err)}`);
    }
  }

  read(): IdempotencyStoreFile {
    return readJsonState(this.filePath, emptyStore, normalize);
  }
}
