#!/usr/bin/env -S npx tsx
/**
 * user-prompt-submit.ts — UserPromptSubmit hook
 *
 * Appends a `user_prompt` activity for every submitted prompt. Never blocks
 * the prompt.
 */

import { z } from "zod";
import { describeError } from "@buildwarden/architecture";
import { auditPrompt } from "../../prompt-audit.js";
import { createDispatchRuntime } from "../../runtime.js";
import { pass } from "./output.js";
import { readStdin } from "./stdin.js";

const promptPayloadSchema = z.object({
  prompt: z.string(),
  session_id: z.string().default("unknown"),
  cwd: z.string().optional(),
});

async function main(): Promise<void> {
  const payload = promptPayloadSchema.safeParse(await readStdin());
  if (!payload.success) pass();

  const { prompt, session_id: sessionId, cwd } = payload.data;
  const runtime = createDispatchRuntime({ cwd, sessionId });
  if (runtime.config.hooks.promptAudit) {
    await auditPrompt(runtime.pipelineLog, { prompt, sessionId, cwd });
  }
  pass();
}

main().catch((err) => {
  process.stderr.write(`[buildwarden] user-prompt-submit hook error: ${describeError(err)}\n`);
  process.exit(0);
});
