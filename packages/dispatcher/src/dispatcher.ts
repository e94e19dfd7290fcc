/**
 * dispatcher.ts — pre/post routing for wrapped shell commands
 *
 * pre:  failure ceiling, then the command validators, then idempotency.
 *       Any of them can block; validators may also attach warnings.
 * post: success clears the failure record; a failure is counted, classified,
 *       snapshotted when it is about a file, and turned into a DispatchAction.
 *       Reaching the ceiling yields one design escalation, exactly once, then
 *       fatal with no escalation.
 *
 * Bookkeeping (tracker IO, pipeline log) is best effort and never changes
 * the outcome of the wrapped command.
 */

import {
  UNKNOWN_PHASE,
  computeSignature,
  createDiagnostics,
  describeError,
  type ClassifiedError,
  type ClassifierPort,
  type CommandSignature,
  type Diagnostics,
  type DispatchAction,
  type DispatcherPort,
  type EscalationRequest,
  type EscalationService,
  type FailureTrackerPort,
  type IdempotencyPort,
  type PipelineLogPort,
  type PipelinePhaseRef,
  type PreDecision,
  type ToolInvocation,
  type ToolResult,
} from "@buildwarden/architecture";
import type { ErrorSnapshotStore } from "./error-snapshots.js";
import type { PreValidator, ValidationContext, ValidationOutcome } from "./validators/validator.js";

export const ERROR_TAIL_LINES = 100;

export interface DispatcherOptions {
  guard: IdempotencyPort;
  tracker: FailureTrackerPort;
  classifier: ClassifierPort;
  pipelineLog?: PipelineLogPort;
  failureCeiling: number;
  unclassifiedRetryThreshold: number;
  idempotencyTtlMs: number;
  /** Discriminator mixed into every signature, e.g. "<run id>:<attempt>". */
  scope?: string | null;
  validators?: readonly PreValidator[];
  /** Current git branch for the command's cwd; null when unknown. */
  resolveBranch?: (cwd?: string) => string | null;
  snapshots?: ErrorSnapshotStore;
  diagnostics?: Diagnostics;
}

/** Last `max` lines of the output that carries the error: stderr, else stdout. */
export function errorTail(result: Pick<ToolResult, "stdout" | "stderr">, max = ERROR_TAIL_LINES): string {
  const source = result.stderr.trim() ? result.stderr : result.stdout;
  const lines = source.replace(/\s+$/, "").split("\n");
  return lines.slice(-max).join("\n");
}

export interface DecisionInput {
  signature: CommandSignature;
  classified: ClassifiedError;
  failureCount: number;
  failureCeiling: number;
  unclassifiedRetryThreshold: number;
  buildRequest: (service: EscalationService) => EscalationRequest;
}

/** Pure decision table for a failed command. */
export function decideAction(input: DecisionInput): DispatchAction {
  const { signature, classified, failureCount, failureCeiling } = input;

  if (failureCount === failureCeiling) {
    return {
      kind: "fatal",
      signature,
      classified,
      failureCount,
      reason: `failure ceiling reached: ${failureCount} consecutive failures (limit ${failureCeiling})`,
      request: input.buildRequest("design"),
    };
  }
  if (failureCount > failureCeiling) {
    return {
      kind: "fatal",
      signature,
      classified,
      failureCount,
      reason: `failure ceiling exceeded: ${failureCount} consecutive failures (limit ${failureCeiling})`,
      request: null,
    };
  }

  switch (classified.category) {
    case "known":
      return { kind: "noop", signature, classified, failureCount };
    case "design-issue":
      return { kind: "escalate", signature, classified, failureCount, request: input.buildRequest("design") };
    case "implementation-issue":
      return { kind: "escalate", signature, classified, failureCount, request: input.buildRequest("review") };
    case "unclassified":
      return failureCount >= input.unclassifiedRetryThreshold
        ? { kind: "escalate", signature, classified, failureCount, request: input.buildRequest("review") }
        : { kind: "noop", signature, classified, failureCount };
  }
}

export function describeInvocation(result: ToolResult, failureCount: number, classified: ClassifiedError): string {
  const lines = [`command: ${result.command}`];
  if (result.cwd) lines.push(`cwd: ${result.cwd}`);
  lines.push(`exit code: ${result.exitCode}`, `consecutive failures: ${failureCount}`, `classification: ${classified.category}`);
  if (classified.issueId) lines.push(`known issue: ${classified.issueId}`);
  return lines.join("\n");
}

export class EventDispatcher implements DispatcherPort {
  private readonly log: Diagnostics;

  constructor(private readonly options: DispatcherOptions) {
    this.log = options.diagnostics ?? createDiagnostics("dispatcher");
  }

  signatureFor(event: ToolInvocation): CommandSignature {
    return computeSignature({ command: event.command, cwd: event.cwd, scope: this.options.scope ?? undefined });
  }

  async handlePre(event: ToolInvocation): Promise<PreDecision> {
    const signature = this.signatureFor(event);
    const { failureCeiling } = this.options;

    let ceiling: "under-limit" | "at-limit" = "under-limit";
    try {
      ceiling = await this.options.tracker.checkCeiling(signature, failureCeiling);
    } catch (err) {
      this.log.warn(`failure tracker unavailable: ${describeError(err)}`);
    }

    if (ceiling === "at-limit") {
      const reason =
        `Blocked: "${event.command}" has failed ${failureCeiling} or more consecutive times. ` +
        `Automatic retries are disabled until the failure is fixed and cleared with ` +
        `\`buildwarden failures reset "${event.command}"\`.`;
      await this.note("command_blocked", { signature, command: event.command, reason: "failure_ceiling" });
      return { kind: "block", signature, reason };
    }

    const validation = await this.validate(event);
    if (validation.kind === "block") {
      await this.note("command_blocked", {
        signature,
        command: event.command,
        reason: "validation",
        validator: validation.validator,
      });
      return { kind: "block", signature, reason: validation.reason };
    }

    const verdict = await this.options.guard.check(signature, this.options.idempotencyTtlMs);
    if (verdict === "skip") {
      const seconds = Math.round(this.options.idempotencyTtlMs / 1000);
      const reason = `Skipped: "${event.command}" already ran within the last ${seconds}s (duplicate invocation).`;
      await this.note("command_blocked", { signature, command: event.command, reason: "duplicate" });
      return { kind: "block", signature, reason };
    }

    return { kind: "allow", signature, warnings: validation.warnings };
  }

  async handlePost(event: ToolResult): Promise<DispatchAction> {
    const signature = this.signatureFor(event);
    const { tracker } = this.options;

    if (event.exitCode === 0) {
      try {
        await tracker.recordSuccess(signature);
      } catch (err) {
        this.log.warn(`could not clear failures for ${signature}: ${describeError(err)}`);
      }
      await this.note("build_success", { signature, command: event.command });
      return { kind: "noop", signature, classified: null, failureCount: 0 };
    }

    const errorText = errorTail(event);
    let failureCount = 1;
    try {
      failureCount = await tracker.recordFailure(signature, errorText, event.command);
    } catch (err) {
      this.log.warn(`failure tracker unavailable, treating as first failure: ${describeError(err)}`);
    }
    await this.options.guard.release(signature);
    await this.snapshot(signature, event, errorText);

    const phase = await this.phase();
    const classified = this.options.classifier.classify(errorText, phase.id);
    await this.note(
      "build_failure",
      { signature, command: event.command, exit_code: event.exitCode, failure_count: failureCount },
      phase.id,
    );

    const action = decideAction({
      signature,
      classified,
      failureCount,
      failureCeiling: this.options.failureCeiling,
      unclassifiedRetryThreshold: this.options.unclassifiedRetryThreshold,
      buildRequest: (service) => ({
        service,
        context: describeInvocation(event, failureCount, classified),
        errorText,
        phaseId: phase.id,
        priorAttempts: failureCount - 1,
      }),
    });

    await this.note(
      "failure_classified",
      {
        signature,
        category: classified.category,
        matched_pattern: classified.matchedPattern,
        issue_id: classified.issueId,
        action: action.kind,
        service: action.kind === "noop" ? null : (action.request?.service ?? null),
      },
      phase.id,
    );
    return action;
  }

  /** Run every validator in order; the first block wins, warnings accumulate. */
  private async validate(
    event: ToolInvocation,
  ): Promise<{ kind: "pass"; warnings: string[] } | { kind: "block"; reason: string; validator: string }> {
    const validators = this.options.validators ?? [];
    const warnings: string[] = [];
    if (validators.length === 0) return { kind: "pass", warnings };

    const phase = await this.phase();
    let branch: string | null | undefined;
    const context: ValidationContext = {
      phase,
      branch: () => {
        if (branch === undefined) branch = this.options.resolveBranch?.(event.cwd) ?? null;
        return branch;
      },
    };

    for (const validator of validators) {
      let outcome: ValidationOutcome;
      try {
        outcome = validator.validate(event, context);
      } catch (err) {
        this.log.warn(`validator ${validator.name} failed, skipping it: ${describeError(err)}`);
        continue;
      }
      if (outcome.event) await this.note(outcome.event.type, outcome.event.details, phase.id);
      if (outcome.kind === "block") return { kind: "block", reason: outcome.reason, validator: validator.name };
      if (outcome.kind === "warn") warnings.push(outcome.message);
    }
    return { kind: "pass", warnings };
  }

  private async snapshot(signature: CommandSignature, event: ToolResult, errorText: string): Promise<void> {
    if (!this.options.snapshots) return;
    let path: string | null;
    try {
      path = this.options.snapshots.capture(signature, event, errorText);
    } catch (err) {
      this.log.warn(`error snapshot not written: ${describeError(err)}`);
      return;
    }
    if (path) await this.note("error_snapshot", { signature, command: event.command, path });
  }

  private async phase(): Promise<PipelinePhaseRef> {
    if (!this.options.pipelineLog) return UNKNOWN_PHASE;
    try {
      return await this.options.pipelineLog.currentPhase();
    } catch (err) {
      this.log.warn(`could not read current phase: ${describeError(err)}`);
      return UNKNOWN_PHASE;
    }
  }

  private async note(eventType: string, details: Record<string, unknown>, phaseId?: string): Promise<void> {
    if (!this.options.pipelineLog) return;
    try {
      await this.options.pipelineLog.append(eventType, details, phaseId);
    } catch (err) {
      this.log.warn(`pipeline log entry ${eventType} not written: ${describeError(err)}`);
    }
  }
}
