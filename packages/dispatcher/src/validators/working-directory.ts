/**
 * working-directory.ts — per-phase rules on where commands may run
 *
 * A policy names a phase, a command pattern and the cwd pattern commands
 * matching it must run under. Policies ship in cwd-policies.json; a project
 * adds its own in <status_dir>/cwd-policies.json, consulted first.
 * Commands without a cwd, or run while the phase is unknown, are not checked.
 */

import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { UNKNOWN_PHASE, createDiagnostics, describeError } from "@buildwarden/architecture";
import { OK, type PreValidator } from "./validator.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CWD_POLICIES_FILE = join(__dirname, "cwd-policies.json");
export const PROJECT_CWD_POLICIES_FILE = "cwd-policies.json";

const log = createDiagnostics("cwd-policy");

const policyFileSchema = z.object({
  policies: z.array(
    z.object({
      phase: z.string().min(1),
      commands: z.string().min(1),
      cwd: z.string().min(1),
      severity: z.enum(["warn", "block"]).default("block"),
      message: z.string().min(1),
    }),
  ),
});

export type CwdPolicy = z.infer<typeof policyFileSchema>["policies"][number];

export function loadCwdPolicies(path: string = DEFAULT_CWD_POLICIES_FILE): CwdPolicy[] {
  return policyFileSchema.parse(JSON.parse(readFileSync(path, "utf-8"))).policies;
}

/** Project policies first, then the bundled ones. An unreadable project file is reported and ignored. */
export function loadProjectCwdPolicies(statusDir?: string): CwdPolicy[] {
  const defaults = loadCwdPolicies();
  if (!statusDir) return defaults;
  const projectFile = join(statusDir, PROJECT_CWD_POLICIES_FILE);
  if (!existsSync(projectFile)) return defaults;
  try {
    return [...loadCwdPolicies(projectFile), ...defaults];
  } catch (err) {
    log.warn(`ignoring ${projectFile}: ${describeError(err)}`);
    return defaults;
  }
}

interface CompiledPolicy {
  policy: CwdPolicy;
  commands: RegExp;
  cwd: RegExp;
}

function compile(policy: CwdPolicy): CompiledPolicy | null {
  try {
    return { policy, commands: new RegExp(policy.commands), cwd: new RegExp(policy.cwd) };
  } catch (err) {
    log.warn(`skipping cwd policy for ${policy.phase}: ${describeError(err)}`);
    return null;
  }
}

export function createWorkingDirectoryValidator(policies: readonly CwdPolicy[]): PreValidator {
  const compiled = policies.flatMap((policy) => compile(policy) ?? []);

  return {
    name: "working-directory",

    validate(invocation, context) {
      const { cwd } = invocation;
      if (!cwd || context.phase.id === UNKNOWN_PHASE.id) return OK;

      const rule = compiled.find(
        ({ policy, commands }) => policy.phase === context.phase.id && commands.test(invocation.command),
      );
      if (!rule || rule.cwd.test(cwd)) return OK;

      const text = `${rule.policy.message}. Current directory: ${cwd}`;
      const event = {
        type: "cwd_policy_violation",
        details: { phase: context.phase.id, command: invocation.command, cwd, severity: rule.policy.severity },
      };
      return rule.policy.severity === "warn"
        ? { kind: "warn", message: text, event }
        : { kind: "block", reason: text, event };
    },
  };
}
