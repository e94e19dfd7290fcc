/**
 * output.ts — hook results on stdout/stderr and the exit code
 */

import type { HookEventName, HookOutput } from "./types.js";

export function formatContext(hookEventName: HookEventName, additionalContext: string): string {
  const output: HookOutput = { hookSpecificOutput: { hookEventName, additionalContext } };
  return JSON.stringify(output);
}

/** Exit 0, passing text back to the agent as additional context. */
export function succeed(hookEventName: HookEventName, additionalContext?: string): never {
  if (additionalContext) process.stdout.write(formatContext(hookEventName, additionalContext));
  process.exit(0);
}

/** Exit 2: the tool call is blocked and the reason is shown to the agent. */
export function block(reason: string): never {
  process.stderr.write(reason.endsWith("\n") ? reason : `${reason}\n`);
  process.exit(2);
}

export function pass(): never {
  process.exit(0);
}
