/**
 * commands.ts — execute a parsed command against a dispatch runtime
 *
 * Exit codes:
 *   0   success
 *   1   internal error or bad usage
 *   3   critical cost breach with fail_on_critical enabled (run: only when
 *       the wrapped command itself succeeded)
 *   75  run blocked before the command started (ceiling or duplicate)
 *   *   run: the wrapped command's own exit code
 */

import { describeError } from "@buildwarden/architecture";
import {
  checkBudget,
  resolveAction,
  summarizeClassification,
  type CreateRuntimeOptions,
  type DispatchRuntime,
} from "@buildwarden/dispatcher";
import { USAGE, type CliCommand } from "./args.js";
import { formatUsageReport } from "./report.js";
import { runShell, type ShellResult } from "./shell.js";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_COST_CRITICAL = 3;
export const EXIT_BLOCKED = 75;

export interface CliIO {
  /** Command results (stdout). */
  out(text: string): void;
  /** Diagnostics and summaries (stderr). */
  err(text: string): void;
  /** Raw copies of the wrapped command's streams; defaults to out/err. */
  tee?: { stdout(chunk: string): void; stderr(chunk: string): void };
}

export interface CommandContext {
  createRuntime(options: CreateRuntimeOptions): DispatchRuntime;
  io: CliIO;
  runShell?: typeof runShell;
}

async function run(command: string, cwd: string | undefined, ctx: CommandContext): Promise<number> {
  const runtime = ctx.createRuntime({ cwd });
  const { dispatcher } = runtime;
  const invocation = { command, cwd };

  const pre = await dispatcher.handlePre(invocation);
  if (pre.kind === "block") {
    ctx.io.err(pre.reason);
    return EXIT_BLOCKED;
  }
  for (const warning of pre.warnings) ctx.io.err(`warning: ${warning}`);

  const shell = ctx.runShell ?? runShell;
  let result: ShellResult;
  try {
    result = await shell(command, {
      cwd,
      onStdout: (chunk) => (ctx.io.tee ? ctx.io.tee.stdout(chunk) : ctx.io.out(chunk)),
      onStderr: (chunk) => (ctx.io.tee ? ctx.io.tee.stderr(chunk) : ctx.io.err(chunk)),
    });
  } catch (err) {
    // Could not start at all: report it as a failed command so it is counted.
    result = { exitCode: 127, stdout: "", stderr: `buildwarden: could not start command: ${describeError(err)}` };
    ctx.io.err(result.stderr);
  }

  const action = await dispatcher.handlePost({ ...invocation, ...result });
  const resolved = await resolveAction(action, runtime.client);
  if (resolved.message) ctx.io.err(resolved.message);

  // Spend from other sessions counts too, so the budget is checked after every run.
  // Alerts are only recorded when this run paid for an escalation.
  const budget = await checkBudget(runtime, { recordAlerts: resolved.response !== null });
  if (budget.message) ctx.io.err(budget.message);
  if (budget.failBuild && result.exitCode === 0) return EXIT_COST_CRITICAL;
  return result.exitCode;
}

export async function executeCommand(command: CliCommand, ctx: CommandContext): Promise<number> {
  const { io } = ctx;

  switch (command.name) {
    case "help":
      io.out(USAGE);
      return EXIT_OK;

    case "run":
      return run(command.command, command.cwd, ctx);

    case "status-append": {
      const { pipelineLog } = ctx.createRuntime({});
      const entry = await pipelineLog.append(command.eventType, command.details, command.phase);
      io.out(JSON.stringify(entry));
      return EXIT_OK;
    }

    case "status-phase": {
      const { pipelineLog } = ctx.createRuntime({});
      io.out(JSON.stringify(await pipelineLog.currentPhase()));
      return EXIT_OK;
    }

    case "status-set-phase": {
      const { pipelineLog } = ctx.createRuntime({});
      io.out(JSON.stringify(await pipelineLog.setPhase(command.id, command.phaseName)));
      return EXIT_OK;
    }

    case "usage": {
      const { ledger } = ctx.createRuntime({});
      const report = await ledger.usageReport(command.days, command.groupBy);
      io.out(formatUsageReport(report, command.format));
      return EXIT_OK;
    }

    case "cost-check": {
      const runtime = ctx.createRuntime({});
      const budget = await checkBudget(runtime, { periods: command.periods });
      io.out(JSON.stringify({ checks: budget.results, fail_build: budget.failBuild }, null, 2));
      return budget.failBuild ? EXIT_COST_CRITICAL : EXIT_OK;
    }

    case "failures-list": {
      const { tracker } = ctx.createRuntime({});
      const records = await tracker.list();
      if (records.length === 0) {
        io.out("No recorded failures.");
        return EXIT_OK;
      }
      for (const record of records) {
        io.out(`${record.consecutiveCount}\t${record.lastUpdated}\t${record.command ?? record.signature}`);
      }
      return EXIT_OK;
    }

    case "failures-reset": {
      const { tracker } = ctx.createRuntime({});
      const removed = await tracker.resetCommand(command.command);
      io.out(`Cleared ${removed} failure record${removed === 1 ? "" : "s"} for "${command.command}".`);
      return EXIT_OK;
    }

    case "prune": {
      const { config, tracker, snapshots, pipelineLog } = ctx.createRuntime({});
      const days = command.days ?? config.failure.retentionDays;
      const failures = await tracker.prune(days);
      const removedSnapshots = snapshots.prune(days);
      await pipelineLog.append("maintenance", {
        action: "prune",
        failures_removed: failures,
        snapshots_removed: removedSnapshots,
        retention_days: days,
      });
      io.out(`Pruned ${failures} failure record(s) and ${removedSnapshots} error snapshot(s) older than ${days} days.`);
      return EXIT_OK;
    }

    case "cooldown-list": {
      const { cooldowns } = ctx.createRuntime({});
      const entries = Object.entries(cooldowns.read().cooldowns);
      if (entries.length === 0) {
        io.out("No escalation cooldowns.");
        return EXIT_OK;
      }
      for (const [service, entry] of entries) {
        io.out(`${service}\t${entry.until}\t${entry.reason}`);
      }
      return EXIT_OK;
    }

    case "cooldown-clear": {
      const { cooldowns, pipelineLog } = ctx.createRuntime({});
      const cleared = await cooldowns.clear(command.service);
      if (!cleared) {
        io.out(`No cooldown for the ${command.service} service.`);
        return EXIT_OK;
      }
      await pipelineLog.append("cooldown_cleared", {
        service: command.service,
        until: cleared.until,
        reason: cleared.reason,
      });
      io.out(`Cleared ${command.service} cooldown (was until ${cleared.until}: ${cleared.reason}).`);
      return EXIT_OK;
    }

    case "classify": {
      const { classifier } = ctx.createRuntime({});
      io.out(summarizeClassification(classifier.classify(command.text, command.phase)));
      return EXIT_OK;
    }

    case "escalate": {
      const runtime = ctx.createRuntime({});
      const phase = await runtime.pipelineLog.currentPhase();
      const response = await runtime.client.escalate({
        service: command.service,
        context: command.context,
        errorText: command.errorText,
        phaseId: phase.id,
        priorAttempts: 0,
      });
      if (!response.success) {
        io.err(`${response.service} escalation ${response.errorKind ?? "failed"}: ${response.text}`);
        return EXIT_ERROR;
      }
      io.out(response.text);
      return EXIT_OK;
    }
  }
}
