export type ISODateTime = string;
export type CommandSignature = string;

// ─── Tool invocations ────────────────────────────────────────────────────────

export interface ToolInvocation {
  command: string;
  cwd?: string;
  sessionId?: string;
}

export interface ToolResult extends ToolInvocation {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// ─── Idempotency & failure state ─────────────────────────────────────────────

export type GuardVerdict = "allow" | "skip";
export type CeilingVerdict = "under-limit" | "at-limit";

export interface IdempotencyRecord {
  signature: CommandSignature;
  lastSeen: ISODateTime;
  ttlMs: number;
}

export interface IdempotencyStoreFile {
  version: 1;
  records: Record<CommandSignature, IdempotencyRecord>;
}

export interface FailureRecord {
  signature: CommandSignature;
  consecutiveCount: number;
  lastError: string;
  lastUpdated: ISODateTime;
  command?: string;
}

export interface FailureStoreFile {
  version: 1;
  failures: Record<CommandSignature, FailureRecord>;
  last_updated: ISODateTime;
}

// ─── Classification ──────────────────────────────────────────────────────────

export type ErrorCategory =
  | "known"
  | "design-issue"
  | "implementation-issue"
  | "unclassified";

export interface KnownIssue {
  id: string;
  pattern: string;
  match: "substring" | "regex";
  flags?: string;
  category: Exclude<ErrorCategory, "unclassified">;
  description: string;
  suggestedAction: string;
  phase?: string;
}

export interface ClassifiedError {
  rawText: string;
  category: ErrorCategory;
  matchedPattern: string | null;
  issueId: string | null;
  suggestedAction: string;
}

// ─── Escalation ──────────────────────────────────────────────────────────────

export type EscalationService = "design" | "review";

export type EscalationErrorKind =
  | "transient"
  | "permanent"
  | "quota-exceeded"
  | "configuration"
  | "cancelled";

export interface EscalationRequest {
  service: EscalationService;
  context: string;
  errorText?: string;
  phaseId: string;
  priorAttempts: number;
}

export interface TokenUsage {
  input: number;
  output: number;
}

export interface EscalationResponse {
  service: EscalationService;
  model: string;
  text: string;
  tokenUsage: TokenUsage;
  success: boolean;
  errorKind: EscalationErrorKind | null;
  attempts: number;
}

// ─── Dispatcher decisions ────────────────────────────────────────────────────

export type PreDecision =
  | { kind: "allow"; signature: CommandSignature; warnings: string[] }
  | { kind: "block"; signature: CommandSignature; reason: string };

export type DispatchAction =
  | { kind: "noop"; signature: CommandSignature; classified: ClassifiedError | null; failureCount: number }
  | {
      kind: "escalate";
      signature: CommandSignature;
      classified: ClassifiedError;
      failureCount: number;
      request: EscalationRequest;
    }
  | {
      kind: "fatal";
      signature: CommandSignature;
      classified: ClassifiedError;
      failureCount: number;
      reason: string;
      /** Present only on the run that reached the ceiling. */
      request: EscalationRequest | null;
    };

// ─── Usage ledger ────────────────────────────────────────────────────────────

export type UsageGroupField = "model" | "phase" | "user" | "session" | "service";
export type CostPeriod = "hour" | "day" | "request";
export type ThresholdSeverity = "ok" | "warning" | "critical";

/** One JSONL line in token-usage-YYYYMM.jsonl. Field names are the on-disk contract. */
export interface UsageRecord {
  type: "usage_captured";
  timestamp: ISODateTime;
  session_id: string;
  model: string;
  phase: string;
  service: EscalationService | "external";
  user: string;
  success: boolean;
  error_kind: EscalationErrorKind | null;
  tokens: { input: number; output: number; total: number };
  cost_usd: { input: number; output: number; total: number };
}

export interface UsageGroupSummary {
  /** Ledger records in the group. */
  requests: number;
  /** Distinct session ids in the group. */
  sessions: number;
  total_tokens: number;
  input_tokens: number;
  output_tokens: number;
  total_cost: number;
}

export interface UsageReport {
  period: { start: ISODateTime; end: ISODateTime };
  summary: { total_requests: number; total_sessions: number; total_tokens: number; total_cost_usd: number };
  grouped_by: UsageGroupField;
  groups: Record<string, UsageGroupSummary>;
}

export interface ThresholdResult {
  period: CostPeriod;
  severity: ThresholdSeverity;
  totalCost: number;
  warning: number;
  critical: number;
  records: number;
  since: ISODateTime | null;
  checkedAt: ISODateTime;
}

// ─── Pipeline log ────────────────────────────────────────────────────────────

export interface PipelinePhaseRef {
  id: string;
  name: string;
  started_at?: ISODateTime;
}

export interface PipelineLogEntry {
  timestamp: ISODateTime;
  event_type: string;
  details: Record<string, unknown>;
  phase_id: string;
}

export interface PipelineLogDocument {
  current_phase: PipelinePhaseRef;
  activities: PipelineLogEntry[];
}
