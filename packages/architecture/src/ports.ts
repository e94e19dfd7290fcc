import type {
  CeilingVerdict,
  ClassifiedError,
  CommandSignature,
  DispatchAction,
  EscalationRequest,
  EscalationResponse,
  FailureRecord,
  GuardVerdict,
  ISODateTime,
  PipelineLogEntry,
  PipelinePhaseRef,
  PreDecision,
  ToolInvocation,
  ToolResult,
  UsageRecord,
} from "./domain.js";

export interface IdempotencyPort {
  check(signature: CommandSignature, ttlMs: number): Promise<GuardVerdict>;
  release(signature: CommandSignature): Promise<void>;
}

export interface FailureTrackerPort {
  recordFailure(signature: CommandSignature, errorText: string, command?: string): Promise<number>;
  recordSuccess(signature: CommandSignature): Promise<void>;
  checkCeiling(signature: CommandSignature, max: number): Promise<CeilingVerdict>;
  getRecord(signature: CommandSignature): Promise<FailureRecord | null>;
}

export interface ClassifierPort {
  classify(errorText: string, phaseId?: string): ClassifiedError;
}

export interface PipelineLogPort {
  append(eventType: string, details: Record<string, unknown>, phaseId?: string): Promise<PipelineLogEntry>;
  currentPhase(): Promise<PipelinePhaseRef>;
}

export interface UsageLedgerPort {
  append(record: UsageRecord): Promise<void>;
  countRequests(service: UsageRecord["service"], since: ISODateTime): Promise<number>;
}

export interface EscalationPort {
  escalate(request: EscalationRequest, options?: { signal?: AbortSignal }): Promise<EscalationResponse>;
}

export interface DispatcherPort {
  handlePre(event: ToolInvocation): Promise<PreDecision>;
  handlePost(event: ToolResult): Promise<DispatchAction>;
}
