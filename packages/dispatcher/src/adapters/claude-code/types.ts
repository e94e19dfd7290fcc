/**
 * types.ts — hook protocol shapes
 *
 * The agent sends one JSON object on stdin per hook event and reads JSON from
 * stdout on exit 0; exit 2 blocks the tool call with stderr as the reason.
 */

export interface HookInput {
  session_id: string;
  transcript_path?: string;
  cwd: string;
  hook_event_name: string;
}

export interface BashToolInput {
  command: string;
  description?: string;
  timeout?: number;
}

export interface PreToolUseInput extends HookInput {
  hook_event_name: "PreToolUse";
  tool_name: string;
  tool_input: BashToolInput;
}

export interface PostToolUseInput extends HookInput {
  hook_event_name: "PostToolUse";
  tool_name: string;
  tool_input: BashToolInput;
  tool_response?: {
    exit_code?: number;
    stdout?: string;
    stderr?: string;
    interrupted?: boolean;
  };
}

export interface UserPromptSubmitInput extends HookInput {
  hook_event_name: "UserPromptSubmit";
  prompt: string;
}

/** Shape accepted from wrappers that are not agent hooks. */
export interface GenericCommandInput {
  command: string;
  exit_code?: number;
  stdout?: string;
  stderr?: string;
  cwd?: string;
  session_id?: string;
}

export type HookEventName = "PreToolUse" | "PostToolUse" | "UserPromptSubmit";

export interface HookOutput {
  hookSpecificOutput?: {
    hookEventName: HookEventName;
    additionalContext?: string;
  };
}
