/**
 * runtime.ts — wire every store and service from configuration
 *
 * Hook scripts and CLI commands are short-lived processes; each builds one
 * runtime rooted at the project that owns the hook's cwd.
 */

import {
  PipelineLogStore,
  UsageLedger,
  createDiagnostics,
  describeError,
  loadConfig,
  type BuildwardenConfig,
  type CostPeriod,
  type LoadConfigOptions,
  type ThresholdResult,
} from "@buildwarden/architecture";
import {
  CooldownStore,
  createEscalationClient,
  type EscalationClient,
  type FetchLike,
  type Sleep,
} from "@buildwarden/escalation";
import { loadClassifier, type Classifier } from "./classifier.js";
import { EventDispatcher } from "./dispatcher.js";
import { ErrorSnapshotStore } from "./error-snapshots.js";
import { FailureTracker } from "./failure-tracker.js";
import { currentBranch } from "./git-branch.js";
import { IdempotencyGuard } from "./idempotency-guard.js";
import { commitMessageValidator } from "./validators/commit-message.js";
import type { PreValidator } from "./validators/validator.js";
import { createWorkingDirectoryValidator, loadProjectCwdPolicies } from "./validators/working-directory.js";

export interface DispatchRuntime {
  config: BuildwardenConfig;
  guard: IdempotencyGuard;
  tracker: FailureTracker;
  classifier: Classifier;
  pipelineLog: PipelineLogStore;
  ledger: UsageLedger;
  cooldowns: CooldownStore;
  snapshots: ErrorSnapshotStore;
  client: EscalationClient;
  dispatcher: EventDispatcher;
}

export interface CreateRuntimeOptions extends LoadConfigOptions {
  config?: BuildwardenConfig;
  sessionId?: string;
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
  /** Branch lookup for commit checks; defaults to CI env, then git. */
  resolveBranch?: (cwd?: string) => string | null;
}

export function createDispatchRuntime(options: CreateRuntimeOptions = {}): DispatchRuntime {
  const config = options.config ?? loadConfig(options);
  const { paths } = config;

  const guard = new IdempotencyGuard(paths.stateDir, { now: options.now });
  const tracker = new FailureTracker(paths.stateDir, { now: options.now });
  const classifier = loadClassifier(paths.statusDir);
  const pipelineLog = new PipelineLogStore(paths.statusDir, { now: options.now });
  const ledger = new UsageLedger(paths.metricsDir, { now: options.now });
  const cooldowns = new CooldownStore(paths.stateDir);
  const snapshots = new ErrorSnapshotStore(paths.statusDir, { now: options.now, env: options.env });
  const client = createEscalationClient(config, {
    ledger,
    pipelineLog,
    cooldowns,
    sessionId: options.sessionId,
    fetch: options.fetch,
    sleep: options.sleep,
    now: options.now,
  });

  const validators: PreValidator[] = [];
  if (config.hooks.commitMessages) validators.push(commitMessageValidator);
  if (config.hooks.workingDirectory) {
    validators.push(createWorkingDirectoryValidator(loadProjectCwdPolicies(paths.statusDir)));
  }

  const dispatcher = new EventDispatcher({
    guard,
    tracker,
    classifier,
    pipelineLog,
    failureCeiling: config.failure.ceiling,
    unclassifiedRetryThreshold: config.failure.unclassifiedRetryThreshold,
    idempotencyTtlMs: config.idempotency.ttlMs,
    scope: config.idempotency.scope,
    validators,
    resolveBranch: options.resolveBranch ?? ((cwd) => currentBranch(cwd, options.env)),
    snapshots: config.hooks.errorSnapshots ? snapshots : undefined,
  });

  return { config, guard, tracker, classifier, pipelineLog, ledger, cooldowns, snapshots, client, dispatcher };
}

export interface BudgetCheck {
  results: ThresholdResult[];
  /** One line per breached period, or null when every period is ok. */
  message: string | null;
  /** Only set when fail_on_critical is enabled and a period is critical. */
  failBuild: boolean;
}

const BUDGET_PERIODS: CostPeriod[] = ["request", "hour", "day"];

export function formatThreshold(result: ThresholdResult): string {
  return (
    `Cost ${result.severity}: ${result.period} spend $${result.totalCost.toFixed(4)} ` +
    `(warning $${result.warning}, critical $${result.critical})`
  );
}

export interface CheckBudgetOptions {
  periods?: CostPeriod[];
  /** Append a cost alert for each breach. Defaults to true. */
  recordAlerts?: boolean;
}

/** Check every budget period, recording an alert for each breach. */
export async function checkBudget(
  runtime: Pick<DispatchRuntime, "config" | "ledger">,
  options: CheckBudgetOptions = {},
): Promise<BudgetCheck> {
  const periods = options.periods ?? BUDGET_PERIODS;
  const recordAlerts = options.recordAlerts ?? true;
  const log = createDiagnostics("budget");
  const results: ThresholdResult[] = [];
  for (const period of periods) {
    const thresholds = runtime.config.budget[period];
    try {
      const result = await runtime.ledger.checkThreshold(period, thresholds.warning, thresholds.critical);
      results.push(result);
      if (recordAlerts && result.severity !== "ok") await runtime.ledger.recordAlert(result);
    } catch (err) {
      log.warn(`${period} threshold not checked: ${describeError(err)}`);
    }
  }

  const breaches = results.filter((result) => result.severity !== "ok");
  return {
    results,
    message: breaches.length ? breaches.map(formatThreshold).join("\n") : null,
    failBuild: runtime.config.budget.failOnCritical && breaches.some((result) => result.severity === "critical"),
  };
}
