#!/usr/bin/env -S npx tsx
/**
 * post-tool-use.ts — PostToolUse hook for shell commands
 *
 * Counts and classifies failures, runs any escalation the dispatcher asks
 * for, and hands the summary back as additional context. A fatal action
 * exits 2 so the agent stops retrying.
 */

import { describeError } from "@buildwarden/architecture";
import { resolveAction } from "../../escalation-runner.js";
import { checkBudget, createDispatchRuntime } from "../../runtime.js";
import { normalizeHookEvent } from "./event.js";
import { block, pass, succeed } from "./output.js";
import { readStdin } from "./stdin.js";

async function main(): Promise<void> {
  const event = normalizeHookEvent(await readStdin());
  if (event.kind === "ignored") pass();

  const runtime = createDispatchRuntime({ cwd: event.invocation.cwd, sessionId: event.sessionId });
  const action = await runtime.dispatcher.handlePost(event.result);
  const resolved = await resolveAction(action, runtime.client);

  const sections = resolved.message ? [resolved.message] : [];
  let blocking = resolved.blocking;
  if (resolved.response) {
    const budget = await checkBudget(runtime);
    if (budget.message) sections.push(budget.message);
    blocking = blocking || budget.failBuild;
  }

  const message = sections.join("\n\n");
  if (blocking) block(message || "buildwarden: command blocked");
  succeed("PostToolUse", message || undefined);
}

main().catch((err) => {
  process.stderr.write(`[buildwarden] post-tool-use hook error: ${describeError(err)}\n`);
  process.exit(0);
});
