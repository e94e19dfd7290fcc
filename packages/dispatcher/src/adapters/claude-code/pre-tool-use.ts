#!/usr/bin/env -S npx tsx
/**
 * pre-tool-use.ts — PreToolUse hook for shell commands
 *
 * Blocks (exit 2) when the command is at its failure ceiling, fails a
 * command validator, or is a duplicate within the idempotency window.
 * Validator warnings go back to the agent as additional context.
 */

import { describeError } from "@buildwarden/architecture";
import { createDispatchRuntime } from "../../runtime.js";
import { normalizeHookEvent } from "./event.js";
import { block, pass, succeed } from "./output.js";
import { readStdin } from "./stdin.js";

async function main(): Promise<void> {
  const event = normalizeHookEvent(await readStdin());
  if (event.kind === "ignored") pass();

  const runtime = createDispatchRuntime({ cwd: event.invocation.cwd, sessionId: event.sessionId });
  const decision = await runtime.dispatcher.handlePre(event.invocation);
  if (decision.kind === "block") block(decision.reason);
  succeed("PreToolUse", decision.warnings.join("\n") || undefined);
}

main().catch((err) => {
  process.stderr.write(`[buildwarden] pre-tool-use hook error: ${describeError(err)}\n`);
  process.exit(0);
});
