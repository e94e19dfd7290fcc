/**
 * helpers.ts — in-memory stand-ins for the ledger, pipeline log and backends
 */

import type {
  Diagnostics,
  EscalationRequest,
  EscalationService,
  ISODateTime,
  PipelineLogEntry,
  PipelineLogPort,
  PipelinePhaseRef,
  UsageLedgerPort,
  UsageRecord,
} from "@buildwarden/architecture";
import type { BackendReply, EscalationBackend } from "../backends/backend.js";

export const NOW = new Date("2026-05-10T09:00:00.000Z");

export class MemoryLedger implements UsageLedgerPort {
  records: UsageRecord[] = [];
  failWrites = false;

  async append(record: UsageRecord): Promise<void> {
    if (this.failWrites) throw new Error("disk full");
    this.records.push(record);
  }

  async countRequests(service: UsageRecord["service"], since: ISODateTime): Promise<number> {
    return this.records.filter((r) => r.service === service && Date.parse(r.timestamp) >= Date.parse(since)).length;
  }
}

export class MemoryPipelineLog implements PipelineLogPort {
  entries: PipelineLogEntry[] = [];
  phase: PipelinePhaseRef = { id: "phase-3", name: "Rust toolchain" };

  async append(eventType: string, details: Record<string, unknown>, phaseId?: string): Promise<PipelineLogEntry> {
    const entry = { timestamp: NOW.toISOString(), event_type: eventType, details, phase_id: phaseId ?? this.phase.id };
    this.entries.push(entry);
    return entry;
  }

  async currentPhase(): Promise<PipelinePhaseRef> {
    return this.phase;
  }
}

export type Step = BackendReply | Error;

/** Backend that replays scripted replies and errors; the last step repeats. */
export class ScriptedBackend implements EscalationBackend {
  calls = 0;
  problem: string | null = null;

  constructor(
    readonly service: EscalationService,
    private readonly steps: Step[],
    readonly model = service === "design" ? "o3" : "gemini-2.5-pro",
    readonly timeoutMs = 1_000,
  ) {}

  configurationProblem(): string | null {
    return this.problem;
  }

  async send(_request: EscalationRequest, _signal: AbortSignal): Promise<BackendReply> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls += 1;
    if (!step) throw new Error("no scripted step");
    if (step instanceof Error) throw step;
    return step;
  }
}

export function reply(text: string, input = 1000, output = 500, model = "o3"): BackendReply {
  return { text, model, tokenUsage: { input, output } };
}

export function makeRequest(overrides: Partial<EscalationRequest> = {}): EscalationRequest {
  return {
    service: "design",
    context: "command: make llvm\nexit code: 1",
    errorText: "LLVM ERROR: unsupported relocation",
    phaseId: "phase-3",
    priorAttempts: 0,
    ...overrides,
  };
}

export const silentDiagnostics: Diagnostics = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}
