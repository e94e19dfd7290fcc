/**
 * cooldown-store.ts — per-service quota cooldowns
 *
 * Stored at <state_dir>/escalation-cooldowns.json (runtime state). A service
 * with an unexpired entry is not called at all until the entry lapses.
 */

import { join } from "path";
import { z } from "zod";
import {
  readJsonState,
  withFileLock,
  writeJsonStateAtomic,
  type EscalationService,
  type ISODateTime,
} from "@buildwarden/architecture";

const COOLDOWN_FILE = "escalation-cooldowns.json";

export interface CooldownEntry {
  until: ISODateTime;
  reason: string;
}

export interface CooldownStoreData {
  cooldowns: Partial<Record<EscalationService, CooldownEntry>>;
  lastUpdated: ISODateTime;
}

const entrySchema = z.object({ until: z.string(), reason: z.string() });

// A malformed entry for one service drops only that entry.
const storeSchema = z.object({
  cooldowns: z.object({
    design: entrySchema.optional().catch(undefined),
    review: entrySchema.optional().catch(undefined),
  }),
  lastUpdated: z.string().catch(() => new Date().toISOString()),
});

function emptyStore(): CooldownStoreData {
  return { cooldowns: {}, lastUpdated: new Date().toISOString() };
}

function normalize(raw: unknown): CooldownStoreData | null {
  const parsed = storeSchema.safeParse(raw);
  if (!parsed.success) return null;
  const cooldowns: CooldownStoreData["cooldowns"] = {};
  const { design, review } = parsed.data.cooldowns;
  if (design) cooldowns.design = design;
  if (review) cooldowns.review = review;
  return { cooldowns, lastUpdated: parsed.data.lastUpdated };
}

export class CooldownStore {
  readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = join(stateDir, COOLDOWN_FILE);
  }

  read(): CooldownStoreData {
    return readJsonState(this.filePath, emptyStore, normalize);
  }

  /** The active cooldown for a service, or null once it has lapsed. */
  active(service: EscalationService, now: Date = new Date()): CooldownEntry | null {
    const entry = this.read().cooldowns[service];
    if (!entry) return null;
    return Date.parse(entry.until) > now.getTime() ? entry : null;
  }

  async start(service: EscalationService, until: Date, reason: string): Promise<CooldownEntry> {
    const entry: CooldownEntry = { until: until.toISOString(), reason };
    await withFileLock(this.filePath, () => {
      const store = this.read();
      writeJsonStateAtomic(this.filePath, {
        cooldowns: { ...store.cooldowns, [service]: entry },
        lastUpdated: new Date().toISOString(),
      });
    });
    return entry;
  }

  /** Drop a service's cooldown, returning the entry that was removed. */
  async clear(service: EscalationService): Promise<CooldownEntry | null> {
    return withFileLock(this.filePath, () => {
      const store = this.read();
      const { [service]: dropped, ...rest } = store.cooldowns;
      if (!dropped) return null;
      writeJsonStateAtomic(this.filePath, { cooldowns: rest, lastUpdated: new Date().toISOString() });
      return dropped;
    });
  }
}
