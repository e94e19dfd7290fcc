/**
 * classifier.ts — match failure output against an ordered table of known signatures
 *
 * First match wins. Entries are substrings or regular expressions and may be
 * limited to one pipeline phase. Classification is pure: the table is loaded
 * once and never consulted again from disk.
 */

import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import {
  createDiagnostics,
  describeError,
  type ClassifiedError,
  type ClassifierPort,
  type ErrorCategory,
  type KnownIssue,
} from "@buildwarden/architecture";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_KNOWN_ISSUES_FILE = join(__dirname, "known-issues.json");
export const PROJECT_KNOWN_ISSUES_FILE = "known-issues.json";

const log = createDiagnostics("classifier");

const UNCLASSIFIED_ACTION = "No known signature matched; the failure is escalated for review if it repeats.";

const DEFAULT_ACTIONS: Record<ErrorCategory, string> = {
  known: "Apply the documented fix for this issue and re-run.",
  "design-issue": "Escalate to the design service for an approach.",
  "implementation-issue": "Escalate to the review service for a code fix.",
  unclassified: UNCLASSIFIED_ACTION,
};

// `auto_fix` is the older name for `suggested_action`; entries without a category are known issues.
const issueFileSchema = z.object({
  issues: z.array(
    z.object({
      id: z.string().min(1),
      pattern: z.string().min(1),
      match: z.enum(["substring", "regex"]).default("substring"),
      flags: z.string().optional(),
      category: z.enum(["known", "design-issue", "implementation-issue"]).default("known"),
      description: z.string().default(""),
      suggested_action: z.string().optional(),
      auto_fix: z.string().optional(),
      phase: z.string().optional(),
    }),
  ),
});

export function parseKnownIssues(raw: unknown): KnownIssue[] {
  return issueFileSchema.parse(raw).issues.map((entry) => ({
    id: entry.id,
    pattern: entry.pattern,
    match: entry.match,
    flags: entry.flags,
    category: entry.category,
    description: entry.description,
    suggestedAction: entry.suggested_action ?? entry.auto_fix ?? DEFAULT_ACTIONS[entry.category],
    phase: entry.phase,
  }));
}

export function loadKnownIssues(path: string = DEFAULT_KNOWN_ISSUES_FILE): KnownIssue[] {
  return parseKnownIssues(JSON.parse(readFileSync(path, "utf-8")));
}

type Matcher = (text: string) => boolean;

function compile(issue: KnownIssue): Matcher | null {
  if (issue.match === "substring") {
    return (text) => text.includes(issue.pattern);
  }
  try {
    const regex = new RegExp(issue.pattern, (issue.flags ?? "").replace(/[gy]/g, ""));
    return (text) => regex.test(text);
  } catch (err) {
    log.warn(`skipping known issue ${issue.id}: ${describeError(err)}`);
    return null;
  }
}

export interface Classifier extends ClassifierPort {
  readonly issues: readonly KnownIssue[];
}

export function createClassifier(issues: readonly KnownIssue[]): Classifier {
  const compiled = issues.flatMap((issue) => {
    const matches = compile(issue);
    return matches ? [{ issue, matches }] : [];
  });

  return {
    issues,
    classify(errorText: string, phaseId?: string): ClassifiedError {
      for (const { issue, matches } of compiled) {
        if (issue.phase && phaseId && issue.phase !== phaseId) continue;
        if (!matches(errorText)) continue;
        return {
          rawText: errorText,
          category: issue.category,
          matchedPattern: issue.pattern,
          issueId: issue.id,
          suggestedAction: issue.suggestedAction,
        };
      }
      return {
        rawText: errorText,
        category: "unclassified",
        matchedPattern: null,
        issueId: null,
        suggestedAction: UNCLASSIFIED_ACTION,
      };
    },
  };
}

/**
 * Classifier over the project's own table (<statusDir>/known-issues.json),
 * consulted before the bundled defaults. An unreadable project table is
 * reported and ignored.
 */
export function loadClassifier(statusDir?: string): Classifier {
  const defaults = loadKnownIssues();
  if (!statusDir) return createClassifier(defaults);

  const projectFile = join(statusDir, PROJECT_KNOWN_ISSUES_FILE);
  if (!existsSync(projectFile)) return createClassifier(defaults);
  try {
    return createClassifier([...loadKnownIssues(projectFile), ...defaults]);
  } catch (err) {
    log.warn(`ignoring ${projectFile}: ${describeError(err)}`);
    return createClassifier(defaults);
  }
}

/** Operator-facing summary: category, matched pattern, next action. */
export function summarizeClassification(classified: ClassifiedError, failureCount?: number): string {
  const lines = [
    classified.matchedPattern
      ? `Failure classified as ${classified.category} (${classified.issueId ?? "pattern"}: "${classified.matchedPattern}")`
      : `Failure classified as ${classified.category}`,
  ];
  if (failureCount !== undefined) lines.push(`Consecutive failures: ${failureCount}`);
  lines.push(`Next: ${classified.suggestedAction}`);
  return lines.join("\n");
}
