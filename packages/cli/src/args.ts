/**
 * args.ts — argv to a typed command
 *
 * Usage:
 *   buildwarden run [--cwd <dir>] -- <command...>
 *   buildwarden status append <event_type> <json> [--phase <id>]
 *   buildwarden status phase
 *   buildwarden status set-phase <id> <name>
 *   buildwarden usage [--days <n>] [--group-by phase|model|user|session|service] [--format table|json|csv]
 *   buildwarden cost check [--period hour|day|request]
 *   buildwarden failures list
 *   buildwarden failures reset <command>
 *   buildwarden prune [--days <n>]
 *   buildwarden cooldown list
 *   buildwarden cooldown clear <design|review>
 *   buildwarden classify <error text> [--phase <id>]
 *   buildwarden escalate --service design|review --context <text> [--error <text>]
 */

import { z } from "zod";
import type { CostPeriod, EscalationService, UsageGroupField } from "@buildwarden/architecture";

export type ReportFormat = "table" | "json" | "csv";

export type CliCommand =
  | { name: "help" }
  | { name: "run"; command: string; cwd?: string }
  | { name: "status-append"; eventType: string; details: Record<string, unknown>; phase?: string }
  | { name: "status-phase" }
  | { name: "status-set-phase"; id: string; phaseName: string }
  | { name: "usage"; days: number; groupBy: UsageGroupField; format: ReportFormat }
  | { name: "cost-check"; periods: CostPeriod[] }
  | { name: "failures-list" }
  | { name: "failures-reset"; command: string }
  | { name: "prune"; days?: number }
  | { name: "cooldown-list" }
  | { name: "cooldown-clear"; service: EscalationService }
  | { name: "classify"; text: string; phase?: string }
  | { name: "escalate"; service: EscalationService; context: string; errorText?: string };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage:
  buildwarden run [--cwd <dir>] -- <command...>
  buildwarden status append <event_type> <json> [--phase <id>]
  buildwarden status phase
  buildwarden status set-phase <id> <name>
  buildwarden usage [--days 7] [--group-by phase|model|user|session|service] [--format table|json|csv]
  buildwarden cost check [--period hour|day|request]
  buildwarden failures list
  buildwarden failures reset <command>
  buildwarden prune [--days <n>]
  buildwarden cooldown list
  buildwarden cooldown clear <design|review>
  buildwarden classify <error text> [--phase <id>]
  buildwarden escalate --service design|review --context <text> [--error <text>]`;

const GROUP_FIELDS: UsageGroupField[] = ["phase", "model", "user", "session", "service"];
const FORMATS: ReportFormat[] = ["table", "json", "csv"];
const PERIODS: CostPeriod[] = ["hour", "day", "request"];
const SERVICES: EscalationService[] = ["design", "review"];

function oneOf<T extends string>(flag: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw new UsageError(`unknown ${flag} value: "${value}" (valid: ${allowed.join(", ")})`);
  return match;
}

/** Split flags (`--name value`) from positional arguments. */
function splitFlags(args: string[], known: readonly string[]): { flags: Map<string, string>; positional: string[] } {
  const flags = new Map<string, string>();
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const name = arg.slice(2);
    if (!known.includes(name)) throw new UsageError(`unknown option: ${arg}`);
    const value = args[i + 1];
    if (value === undefined) throw new UsageError(`missing value for ${arg}`);
    flags.set(name, value);
    i++;
  }
  return { flags, positional };
}

function required(positional: string[], index: number, what: string): string {
  const value = positional[index];
  if (value === undefined || value === "") throw new UsageError(`missing ${what}`);
  return value;
}

function parseRun(args: string[]): CliCommand {
  const separator = args.indexOf("--");
  const before = separator === -1 ? args : args.slice(0, separator);
  const after = separator === -1 ? [] : args.slice(separator + 1);
  const { flags, positional } = splitFlags(before, ["cwd"]);
  const words = [...positional, ...after];
  if (words.length === 0) throw new UsageError("missing command to run");
  return { name: "run", command: words.join(" "), cwd: flags.get("cwd") };
}

const detailsSchema = z.record(z.unknown());

function parseStatus(args: string[]): CliCommand {
  const { flags, positional } = splitFlags(args, ["phase"]);
  const action = required(positional, 0, "status action (append, phase, set-phase)");
  if (action === "phase") return { name: "status-phase" };
  if (action === "set-phase") {
    const id = required(positional, 1, "phase id");
    required(positional, 2, "phase name");
    return { name: "status-set-phase", id, phaseName: positional.slice(2).join(" ") };
  }
  if (action !== "append") throw new UsageError(`unknown status action: "${action}"`);

  const eventType = required(positional, 1, "event type");
  const rawDetails = positional[2] ?? "{}";
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(rawDetails);
  } catch {
    throw new UsageError(`details must be a JSON object: ${rawDetails}`);
  }
  const details = detailsSchema.safeParse(parsedJson);
  if (!details.success) throw new UsageError(`details must be a JSON object: ${rawDetails}`);
  return { name: "status-append", eventType, details: details.data, phase: flags.get("phase") };
}

function parseDays(raw: string): number {
  const days = Number(raw);
  if (!Number.isFinite(days) || days <= 0) throw new UsageError(`--days must be a positive number, got "${raw}"`);
  return days;
}

function parseUsage(args: string[]): CliCommand {
  const { flags } = splitFlags(args, ["days", "group-by", "format"]);
  const days = parseDays(flags.get("days") ?? "7");
  return {
    name: "usage",
    days,
    groupBy: oneOf("--group-by", flags.get("group-by") ?? "phase", GROUP_FIELDS),
    format: oneOf("--format", flags.get("format") ?? "table", FORMATS),
  };
}

function parseCost(args: string[]): CliCommand {
  const { flags, positional } = splitFlags(args, ["period"]);
  const action = required(positional, 0, "cost action (check)");
  if (action !== "check") throw new UsageError(`unknown cost action: "${action}"`);
  const period = flags.get("period");
  return { name: "cost-check", periods: period ? [oneOf("--period", period, PERIODS)] : [...PERIODS] };
}

function parseFailures(args: string[]): CliCommand {
  const action = required(args, 0, "failures action (list, reset)");
  if (action === "list") return { name: "failures-list" };
  if (action === "reset") {
    const command = args.slice(1).join(" ").trim();
    if (!command) throw new UsageError("missing command to reset");
    return { name: "failures-reset", command };
  }
  throw new UsageError(`unknown failures action: "${action}"`);
}

function parsePrune(args: string[]): CliCommand {
  const { flags, positional } = splitFlags(args, ["days"]);
  if (positional.length > 0) throw new UsageError(`unexpected argument: "${positional[0]}"`);
  const days = flags.get("days");
  return { name: "prune", days: days === undefined ? undefined : parseDays(days) };
}

function parseCooldown(args: string[]): CliCommand {
  const action = required(args, 0, "cooldown action (list, clear)");
  if (action === "list") return { name: "cooldown-list" };
  if (action === "clear") {
    return { name: "cooldown-clear", service: oneOf("service", required(args, 1, "service to clear"), SERVICES) };
  }
  throw new UsageError(`unknown cooldown action: "${action}"`);
}

function parseClassify(args: string[]): CliCommand {
  const { flags, positional } = splitFlags(args, ["phase"]);
  const text = positional.join(" ");
  if (!text.trim()) throw new UsageError("missing error text to classify");
  return { name: "classify", text, phase: flags.get("phase") };
}

function parseEscalate(args: string[]): CliCommand {
  const { flags } = splitFlags(args, ["service", "context", "error"]);
  const service = flags.get("service");
  const context = flags.get("context");
  if (!service) throw new UsageError("missing --service");
  if (!context) throw new UsageError("missing --context");
  return {
    name: "escalate",
    service: oneOf("--service", service, SERVICES),
    context,
    errorText: flags.get("error"),
  };
}

/** Parse arguments after the executable name. */
export function parseCli(args: string[]): CliCommand {
  const [command, ...rest] = args;
  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { name: "help" };
    case "run":
      return parseRun(rest);
    case "status":
      return parseStatus(rest);
    case "usage":
      return parseUsage(rest);
    case "cost":
      return parseCost(rest);
    case "failures":
      return parseFailures(rest);
    case "prune":
      return parsePrune(rest);
    case "cooldown":
      return parseCooldown(rest);
    case "classify":
      return parseClassify(rest);
    case "escalate":
      return parseEscalate(rest);
    default:
      throw new UsageError(`unknown command: "${command}"`);
  }
}
