/**
 * validator.ts — checks that run on a shell command before it starts
 *
 * A validator sees the invocation and the current phase. It may let the
 * command through, attach a warning, or block it. Any outcome may carry a
 * pipeline-log event.
 */

import type { PipelinePhaseRef, ToolInvocation } from "@buildwarden/architecture";

export interface ValidationEvent {
  type: string;
  details: Record<string, unknown>;
}

export type ValidationOutcome =
  | { kind: "ok"; event?: ValidationEvent }
  | { kind: "warn"; message: string; event?: ValidationEvent }
  | { kind: "block"; reason: string; event?: ValidationEvent };

export interface ValidationContext {
  phase: PipelinePhaseRef;
  /** Current git branch, resolved on first use; null when unknown. */
  branch(): string | null;
}

export interface PreValidator {
  readonly name: string;
  validate(invocation: ToolInvocation, context: ValidationContext): ValidationOutcome;
}

export const OK: ValidationOutcome = { kind: "ok" };
