/**
 * Hook protocol adapter. pre-tool-use.ts and post-tool-use.ts run as
 * standalone scripts; this barrel exports their shared pieces.
 */

export type {
  HookInput,
  HookOutput,
  HookEventName,
  BashToolInput,
  PreToolUseInput,
  PostToolUseInput,
  UserPromptSubmitInput,
  GenericCommandInput,
} from "./types.js";

export { readStdin } from "./stdin.js";
export { formatContext, succeed, block, pass } from "./output.js";
export { normalizeHookEvent, COMMAND_TOOLS, type HookEvent } from "./event.js";
export { generateHooksConfig, mergeSettings, readSettings, install, HOOK_MARKER, type HooksConfig } from "./install.js";
