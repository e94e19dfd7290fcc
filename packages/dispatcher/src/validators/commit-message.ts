/**
 * commit-message.ts — conventional commit messages for `git commit -m`
 *
 * Only messages given inline are checked; an interactive commit (no -m or
 * --message) passes. WIP/TODO/FIXME subjects are refused on main and master.
 */

import { normalizeCommand } from "@buildwarden/architecture";
import { OK, type PreValidator, type ValidationOutcome } from "./validator.js";

export const COMMIT_TYPES = [
  "feat",
  "fix",
  "docs",
  "style",
  "refactor",
  "perf",
  "test",
  "build",
  "ci",
  "chore",
  "revert",
] as const;

const COMMIT_COMMAND = /^git\s+commit\b/;
const CONVENTIONAL = new RegExp(`^(${COMMIT_TYPES.join("|")})(\\(.+\\))?: .{1,100}$`);
// -m "…", -am "…", --message="…" and their single-quoted forms.
const MESSAGE_FORMS = [
  /(?:^|\s)-[a-zA-Z]*m\s*"([^"]+)"/,
  /--message[=\s]"([^"]+)"/,
  /(?:^|\s)-[a-zA-Z]*m\s*'([^']+)'/,
  /--message[=\s]'([^']+)'/,
];
const WIP_MARKERS = /(WIP|wip|TODO|FIXME)/;
const PROTECTED_BRANCHES = ["main", "master"];

export const MIN_SUBJECT_LENGTH = 10;
export const MAX_SUBJECT_LENGTH = 100;

/** The inline message of a `git commit`, or null when none is given. */
export function extractCommitMessage(command: string): string | null {
  for (const form of MESSAGE_FORMS) {
    const match = form.exec(command);
    if (match?.[1]) return match[1];
  }
  return null;
}

function rejected(message: string, reason: string, text: string): ValidationOutcome {
  return { kind: "block", reason: text, event: { type: "commit_rejected", details: { message, reason } } };
}

export const commitMessageValidator: PreValidator = {
  name: "commit-message",

  validate(invocation, context) {
    if (!COMMIT_COMMAND.test(normalizeCommand(invocation.command))) return OK;
    const message = extractCommitMessage(invocation.command);
    if (message === null) return OK;

    const subject = message.split("\n")[0] ?? "";
    if (!CONVENTIONAL.test(subject)) {
      return rejected(
        message,
        "format_violation",
        [
          "Commit message does not follow conventional format.",
          "Expected: <type>[(scope)]: <description>",
          `Types: ${COMMIT_TYPES.join("|")}`,
          "Example: feat(llvm): add support for m68k relocations",
          `Your message: ${subject}`,
        ].join("\n"),
      );
    }
    if (subject.length < MIN_SUBJECT_LENGTH) {
      return rejected(
        message,
        "too_short",
        `Commit message too short (${subject.length} characters, minimum ${MIN_SUBJECT_LENGTH}).`,
      );
    }

    const branch = context.branch();
    if (branch !== null && PROTECTED_BRANCHES.includes(branch) && WIP_MARKERS.test(message)) {
      return rejected(message, "wip_on_protected_branch", `WIP/TODO commits are not allowed on ${branch}.`);
    }

    const [, type = "", scope] = /^([a-z]+)(?:\(([^)]+)\))?/.exec(subject) ?? [];
    const event = {
      type: "commit_validated",
      details: { type, scope: scope ?? "none", length: subject.length, branch: branch ?? "unknown" },
    };
    if (subject.length > MAX_SUBJECT_LENGTH) {
      return {
        kind: "warn",
        message: `Commit message summary should be under ${MAX_SUBJECT_LENGTH} characters (currently ${subject.length}).`,
        event,
      };
    }
    return { kind: "ok", event };
  },
};
