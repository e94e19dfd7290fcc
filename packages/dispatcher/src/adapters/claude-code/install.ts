#!/usr/bin/env -S npx tsx
/**
 * install.ts — register the buildwarden hooks in .claude/settings.json
 *
 * Existing settings and unrelated hook matchers are preserved; earlier
 * buildwarden entries are replaced.
 *
 * Usage:
 *   npx tsx install.ts [--project /path/to/project] [--root /path/to/buildwarden/root]
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

/** Every command we install carries this prefix so reinstalling can find it. */
export const HOOK_MARKER = "BUILDWARDEN_HOOK=1";

const hookEntrySchema = z.object({ type: z.string(), command: z.string(), timeout: z.number().optional() }).passthrough();
// UserPromptSubmit entries carry no matcher.
const hookMatcherSchema = z.object({ matcher: z.string().optional(), hooks: z.array(hookEntrySchema) }).passthrough();
const recordSchema = z.record(z.unknown());

type HookMatcher = z.infer<typeof hookMatcherSchema>;

export interface HooksConfig {
  hooks: {
    PreToolUse: HookMatcher[];
    PostToolUse: HookMatcher[];
    UserPromptSubmit: HookMatcher[];
  };
}

function parseArgs(argv: string[]): { project?: string; root?: string } {
  const result: { project?: string; root?: string } = {};
  for (let i = 0; i < argv.length; i++) {
    const value = argv[i + 1];
    if (argv[i] === "--project" && value) {
      result.project = resolve(value);
      i++;
    } else if (argv[i] === "--root" && value) {
      result.root = resolve(value);
      i++;
    }
  }
  return result;
}

export function generateHooksConfig(adapterDir: string, root?: string): HooksConfig {
  const prefix = root ? `${HOOK_MARKER} BUILDWARDEN_ROOT=${root}` : HOOK_MARKER;
  const entry = (script: string, timeout: number) => ({
    type: "command",
    command: `${prefix} npx tsx ${join(adapterDir, script)}`,
    timeout,
  });

  return {
    hooks: {
      PreToolUse: [{ matcher: "Bash", hooks: [entry("pre-tool-use.ts", 15)] }],
      // Post may wait on an escalation round trip with retries.
      PostToolUse: [{ matcher: "Bash", hooks: [entry("post-tool-use.ts", 600)] }],
      UserPromptSubmit: [{ hooks: [entry("user-prompt-submit.ts", 15)] }],
    },
  };
}

function existingMatchers(value: unknown): HookMatcher[] {
  const parsed = z.array(hookMatcherSchema).safeParse(value);
  return parsed.success ? parsed.data : [];
}

export function mergeSettings(existing: Record<string, unknown>, hooksConfig: HooksConfig): Record<string, unknown> {
  const current = recordSchema.safeParse(existing.hooks);
  const hooks: Record<string, unknown> = current.success ? { ...current.data } : {};

  for (const [event, matchers] of Object.entries(hooksConfig.hooks)) {
    const kept = existingMatchers(hooks[event]).filter(
      (matcher) => !matcher.hooks.some((hook) => hook.command.includes(HOOK_MARKER)),
    );
    hooks[event] = [...kept, ...matchers];
  }

  return { ...existing, hooks };
}

export function readSettings(settingsPath: string): Record<string, unknown> {
  if (!existsSync(settingsPath)) return {};
  try {
    const parsed = recordSchema.safeParse(JSON.parse(readFileSync(settingsPath, "utf-8")));
    if (parsed.success) return parsed.data;
  } catch {
    // fall through to the warning below
  }
  console.warn(`Warning: could not parse existing ${settingsPath}, rewriting it with hooks only.`);
  return {};
}

export function install(argv: string[] = process.argv.slice(2)): string {
  const args = parseArgs(argv);
  const projectDir = args.project ?? process.cwd();
  const adapterDir = dirname(fileURLToPath(import.meta.url));

  const settingsPath = join(projectDir, ".claude", "settings.json");
  const merged = mergeSettings(readSettings(settingsPath), generateHooksConfig(adapterDir, args.root));

  mkdirSync(dirname(settingsPath), { recursive: true });
  writeFileSync(settingsPath, JSON.stringify(merged, null, 2) + "\n", "utf-8");

  console.log(`buildwarden hooks installed to ${settingsPath}`);
  console.log(`  PreToolUse   -> pre-tool-use.ts (Bash)`);
  console.log(`  PostToolUse  -> post-tool-use.ts (Bash)`);
  console.log(`  UserPromptSubmit -> user-prompt-submit.ts`);
  return settingsPath;
}

// Run if executed directly
if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  install();
}
