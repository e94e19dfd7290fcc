/**
 * event.ts — normalise hook payloads into tool invocations
 *
 * Two payload shapes are accepted: the agent hook protocol (tool_name,
 * tool_input.command, tool_response) and a flat generic form (command,
 * exit_code, stdout, stderr) used by CI wrappers. Anything that is not a
 * shell command is ignored.
 */

import { z } from "zod";
import type { ToolInvocation, ToolResult } from "@buildwarden/architecture";

export const COMMAND_TOOLS = ["Bash"];

const hookPayloadSchema = z.object({
  session_id: z.string().optional(),
  cwd: z.string().optional(),
  hook_event_name: z.string().optional(),
  tool_name: z.string(),
  tool_input: z.object({ command: z.string().optional() }).passthrough(),
  tool_response: z
    .object({
      exit_code: z.number().int().optional(),
      exitCode: z.number().int().optional(),
      stdout: z.string().optional(),
      stderr: z.string().optional(),
      output: z.string().optional(),
      interrupted: z.boolean().optional(),
    })
    .passthrough()
    .optional(),
});

const genericPayloadSchema = z.object({
  command: z.string(),
  exit_code: z.number().int().optional(),
  stdout: z.string().optional(),
  stderr: z.string().optional(),
  cwd: z.string().optional(),
  session_id: z.string().optional(),
});

export type HookEvent =
  | { kind: "command"; sessionId: string; invocation: ToolInvocation; result: ToolResult }
  | { kind: "ignored"; reason: string };

const INTERRUPTED_EXIT_CODE = 130;

export function normalizeHookEvent(raw: unknown): HookEvent {
  if (raw === null || raw === undefined) return { kind: "ignored", reason: "empty payload" };

  const hook = hookPayloadSchema.safeParse(raw);
  if (hook.success) {
    const payload = hook.data;
    if (!COMMAND_TOOLS.includes(payload.tool_name)) {
      return { kind: "ignored", reason: `tool ${payload.tool_name} is not a shell command` };
    }
    const command = payload.tool_input.command?.trim();
    if (!command) return { kind: "ignored", reason: "no command in tool_input" };

    const response = payload.tool_response;
    const sessionId = payload.session_id ?? "unknown";
    const invocation: ToolInvocation = { command, cwd: payload.cwd, sessionId };
    const exitCode =
      response?.exit_code ?? response?.exitCode ?? (response?.interrupted ? INTERRUPTED_EXIT_CODE : 0);
    return {
      kind: "command",
      sessionId,
      invocation,
      result: {
        ...invocation,
        exitCode,
        stdout: response?.stdout ?? response?.output ?? "",
        stderr: response?.stderr ?? "",
      },
    };
  }

  const generic = genericPayloadSchema.safeParse(raw);
  if (generic.success) {
    const payload = generic.data;
    const command = payload.command.trim();
    if (!command) return { kind: "ignored", reason: "empty command" };
    const sessionId = payload.session_id ?? "unknown";
    const invocation: ToolInvocation = { command, cwd: payload.cwd, sessionId };
    return {
      kind: "command",
      sessionId,
      invocation,
      result: {
        ...invocation,
        exitCode: payload.exit_code ?? 0,
        stdout: payload.stdout ?? "",
        stderr: payload.stderr ?? "",
      },
    };
  }

  return { kind: "ignored", reason: "unrecognised payload" };
}
