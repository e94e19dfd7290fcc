/**
 * prompt-audit.ts — record every submitted prompt in the pipeline log
 *
 * Each prompt becomes one `user_prompt` activity with its phase, session,
 * a rough command type and size metrics, so a run can be traced back to
 * the instructions that drove it.
 */

import type { PipelineLogEntry, PipelineLogPort } from "@buildwarden/architecture";

export type PromptCommandType = "navigation" | "build" | "test" | "vcs" | "general";

const COMMAND_TYPES: Array<[PromptCommandType, RegExp]> = [
  ["navigation", /^(ls|cd|pwd|echo)/],
  ["build", /(build|compile|cargo|make)/],
  ["test", /(test|check|verify)/],
  ["vcs", /(git|commit|push|pull)/],
];

const CHARS_PER_TOKEN = 4;

export function promptCommandType(prompt: string): PromptCommandType {
  return COMMAND_TYPES.find(([, pattern]) => pattern.test(prompt))?.[0] ?? "general";
}

export interface PromptSubmission {
  prompt: string;
  sessionId: string;
  cwd?: string;
}

export interface PromptAuditDetails {
  prompt: string;
  phase: string;
  cwd: string;
  session_id: string;
  user: string;
  metadata: {
    command_type: PromptCommandType;
    prompt_metrics: { length: number; words: number; estimated_tokens: number };
    environment: { runner: string; is_ci: boolean };
  };
}

export function buildPromptAudit(
  submission: PromptSubmission,
  phaseId: string,
  env: NodeJS.ProcessEnv = process.env,
): PromptAuditDetails {
  const { prompt } = submission;
  const words = prompt.split(/\s+/).filter(Boolean).length;
  return {
    prompt,
    phase: phaseId,
    cwd: submission.cwd ?? "",
    session_id: submission.sessionId,
    user: env.USER ?? "unknown",
    metadata: {
      command_type: promptCommandType(prompt),
      prompt_metrics: {
        length: prompt.length,
        words,
        estimated_tokens: Math.floor(prompt.length / CHARS_PER_TOKEN),
      },
      environment: {
        runner: env.RUNNER_NAME ?? "local",
        is_ci: env.GITHUB_ACTIONS === "true",
      },
    },
  };
}

export async function auditPrompt(
  pipelineLog: PipelineLogPort,
  submission: PromptSubmission,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PipelineLogEntry> {
  const phase = await pipelineLog.currentPhase();
  const details = buildPromptAudit(submission, phase.id, env);
  return pipelineLog.append("user_prompt", { ...details }, phase.id);
}
