/**
 * pipeline-log.ts — shared cross-process pipeline record
 *
 * Layout under the status directory:
 *   pipeline-activity.jsonl   append-only activity history
 *   pipeline-phase.json       current phase pointer (replaced atomically)
 *   pipeline-log.json         materialised { current_phase, activities } view
 *   pipeline-log.meta.json    what the last materialise wrote
 *
 * pipeline-log.json is rebuilt after every write so scripts that only read
 * (or only write) the single document keep working. Activities and phase
 * changes those scripts put into the document are folded back into the
 * activity history before the next write.
 */

import { appendFileSync, closeSync, existsSync, fstatSync, openSync, readFileSync, readSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type { ISODateTime, PipelineLogDocument, PipelineLogEntry, PipelinePhaseRef } from "./domain.js";
import type { PipelineLogPort } from "./ports.js";
import { readJsonState, withFileLock, writeJsonStateAtomic } from "./file-lock.js";

export const ACTIVITY_FILE = "pipeline-activity.jsonl";
export const PHASE_FILE = "pipeline-phase.json";
export const DOCUMENT_FILE = "pipeline-log.json";
export const META_FILE = "pipeline-log.meta.json";

const MAX_DOCUMENT_ACTIVITIES = 1000;
const TAIL_CHUNK_BYTES = 64 * 1024;

export const UNKNOWN_PHASE: PipelinePhaseRef = { id: "unknown", name: "Unknown" };

const phaseSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  started_at: z.string().optional(),
});

const entrySchema = z.object({
  timestamp: z.string(),
  event_type: z.string().min(1),
  details: z.record(z.unknown()).default({}),
  phase_id: z.string().default(UNKNOWN_PHASE.id),
});

const documentSchema = z.object({
  current_phase: phaseSchema.optional(),
  activities: z.array(z.unknown()).default([]),
});

const metaSchema = z.object({
  activities: z.number().int().nonnegative(),
  current_phase: phaseSchema.pick({ id: true, name: true }),
});

type MaterializeMeta = z.infer<typeof metaSchema>;

function parseEntry(raw: unknown): PipelineLogEntry | null {
  const parsed = entrySchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function parsePhase(raw: unknown): PipelinePhaseRef | null {
  const parsed = phaseSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function parseLines(lines: string[]): PipelineLogEntry[] {
  const entries: PipelineLogEntry[] = [];
  for (const line of lines) {
    if (!line.trim()) continue;
    try {
      const entry = parseEntry(JSON.parse(line));
      if (entry) entries.push(entry);
    } catch {
      continue;
    }
  }
  return entries;
}

/** Last `maxLines` non-empty lines of a file, read backwards in chunks. */
export function readTailLines(path: string, maxLines: number): string[] {
  if (maxLines <= 0 || !existsSync(path)) return [];
  const fd = openSync(path, "r");
  try {
    const chunks: Buffer[] = [];
    let position = fstatSync(fd).size;
    let newlines = 0;
    while (position > 0 && newlines <= maxLines) {
      const length = Math.min(TAIL_CHUNK_BYTES, position);
      position -= length;
      const chunk = Buffer.alloc(length);
      readSync(fd, chunk, 0, length, position);
      chunks.unshift(chunk);
      for (const byte of chunk) {
        if (byte === 0x0a) newlines++;
      }
    }
    const lines = Buffer.concat(chunks).toString("utf-8").split("\n");
    // The first segment is partial unless the read reached the start of the file.
    if (position > 0) lines.shift();
    return lines.filter((line) => line.trim()).slice(-maxLines);
  } finally {
    closeSync(fd);
  }
}

export interface PipelineLogOptions {
  now?: () => Date;
  maxActivities?: number;
}

export class PipelineLogStore implements PipelineLogPort {
  readonly activityFile: string;
  readonly phaseFile: string;
  readonly documentFile: string;
  readonly metaFile: string;
  private readonly now: () => Date;
  private readonly maxActivities: number;

  constructor(
    readonly statusDir: string,
    options: PipelineLogOptions = {},
  ) {
    this.activityFile = join(statusDir, ACTIVITY_FILE);
    this.phaseFile = join(statusDir, PHASE_FILE);
    this.documentFile = join(statusDir, DOCUMENT_FILE);
    this.metaFile = join(statusDir, META_FILE);
    this.now = options.now ?? (() => new Date());
    this.maxActivities = options.maxActivities ?? MAX_DOCUMENT_ACTIVITIES;
  }

  async append(eventType: string, details: Record<string, unknown>, phaseId?: string): Promise<PipelineLogEntry> {
    return withFileLock(this.documentFile, () => {
      this.syncDocument();
      const entry: PipelineLogEntry = {
        timestamp: this.timestamp(),
        event_type: eventType,
        details,
        phase_id: phaseId ?? this.readPhase().id,
      };
      appendFileSync(this.activityFile, JSON.stringify(entry) + "\n", "utf-8");
      this.materialize();
      return entry;
    });
  }

  /** Replace the phase pointer and record the change as an activity. */
  async setPhase(id: string, name: string): Promise<PipelinePhaseRef> {
    return withFileLock(this.documentFile, () => {
      this.syncDocument();
      const previous = this.readPhase();
      const phase: PipelinePhaseRef = { id, name, started_at: this.timestamp() };
      writeJsonStateAtomic(this.phaseFile, phase);
      const entry: PipelineLogEntry = {
        timestamp: phase.started_at ?? this.timestamp(),
        event_type: "phase_changed",
        details: { from: previous.id, to: id, name },
        phase_id: id,
      };
      appendFileSync(this.activityFile, JSON.stringify(entry) + "\n", "utf-8");
      this.materialize();
      return phase;
    });
  }

  async currentPhase(): Promise<PipelinePhaseRef> {
    return this.readPhase();
  }

  async readActivities(limit?: number): Promise<PipelineLogEntry[]> {
    if (limit === undefined) return this.readActivityFile();
    return parseLines(readTailLines(this.activityFile, limit));
  }

  async readDocument(): Promise<PipelineLogDocument> {
    return this.readDocumentFile();
  }

  // ─── Internals (called with the lock held, or read-only) ─────────────────

  private timestamp(): ISODateTime {
    return this.now().toISOString();
  }

  private readPhase(): PipelinePhaseRef {
    const pointer = readJsonState<PipelinePhaseRef | null>(this.phaseFile, () => null, parsePhase);
    if (pointer) return pointer;
    return this.readDocumentFile().current_phase;
  }

  private readActivityFile(): PipelineLogEntry[] {
    if (!existsSync(this.activityFile)) return [];
    return parseLines(readFileSync(this.activityFile, "utf-8").split("\n"));
  }

  private readDocumentFile(): PipelineLogDocument {
    const empty = (): PipelineLogDocument => ({ current_phase: { ...UNKNOWN_PHASE }, activities: [] });
    return readJsonState<PipelineLogDocument>(this.documentFile, empty, (raw) => {
      const parsed = documentSchema.safeParse(raw);
      if (!parsed.success) return null;
      const activities: PipelineLogEntry[] = [];
      for (const item of parsed.data.activities) {
        const entry = parseEntry(item);
        if (entry) activities.push(entry);
      }
      return { current_phase: parsed.data.current_phase ?? { ...UNKNOWN_PHASE }, activities };
    });
  }

  private readMeta(): MaterializeMeta | null {
    return readJsonState<MaterializeMeta | null>(this.metaFile, () => null, (raw) => {
      const parsed = metaSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    });
  }

  /**
   * Fold edits made directly to pipeline-log.json into the activity history.
   * Without a meta file, a document with no activity file beside it was
   * written by older tooling and is adopted whole.
   */
  private syncDocument(): void {
    if (!existsSync(this.documentFile)) return;
    const document = this.readDocumentFile();
    const meta = this.readMeta();
    const seen = meta ? meta.activities : existsSync(this.activityFile) ? document.activities.length : 0;

    const external = document.activities.slice(seen);
    if (external.length > 0) {
      appendFileSync(this.activityFile, external.map((entry) => JSON.stringify(entry) + "\n").join(""), "utf-8");
    }

    if (!meta) return;
    const documentPhase = document.current_phase;
    if (documentPhase.id === UNKNOWN_PHASE.id) return;
    if (documentPhase.id === meta.current_phase.id && documentPhase.name === meta.current_phase.name) return;
    writeJsonStateAtomic(this.phaseFile, documentPhase);
    const entry: PipelineLogEntry = {
      timestamp: documentPhase.started_at ?? this.timestamp(),
      event_type: "phase_changed",
      details: { from: meta.current_phase.id, to: documentPhase.id, name: documentPhase.name },
      phase_id: documentPhase.id,
    };
    appendFileSync(this.activityFile, JSON.stringify(entry) + "\n", "utf-8");
  }

  private materialize(): void {
    const currentPhase = this.readPhase();
    const document: PipelineLogDocument = {
      current_phase: currentPhase,
      activities: parseLines(readTailLines(this.activityFile, this.maxActivities)),
    };
    writeJsonStateAtomic(this.documentFile, document);
    const meta: MaterializeMeta = {
      activities: document.activities.length,
      current_phase: { id: currentPhase.id, name: currentPhase.name },
    };
    writeJsonStateAtomic(this.metaFile, meta);
  }
}
