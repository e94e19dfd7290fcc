import { existsSync, readFileSync, statSync } from "fs";
import { dirname, isAbsolute, join, resolve } from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { CostPeriod } from "./domain.js";
import { createDiagnostics, describeError } from "./diagnostics.js";

export interface BackendConfig {
  endpoint: string;
  apiKey: string | null;
  model: string;
  timeoutMs: number;
  maxTokens: number;
}

export interface ReviewBackendConfig extends BackendConfig {
  dailyRequestLimit: number;
}

export interface CostThresholds {
  warning: number;
  critical: number;
}

export interface BuildwardenConfig {
  root: string;
  paths: {
    stateDir: string;
    statusDir: string;
    metricsDir: string;
  };
  failure: {
    ceiling: number;
    unclassifiedRetryThreshold: number;
    retentionDays: number;
  };
  idempotency: {
    ttlMs: number;
    scope: string | null;
  };
  escalation: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    quotaCooldownMs: number;
    design: BackendConfig;
    review: ReviewBackendConfig;
  };
  budget: Record<CostPeriod, CostThresholds> & { failOnCritical: boolean };
  /** Optional checks and records around each hook event. */
  hooks: {
    commitMessages: boolean;
    workingDirectory: boolean;
    errorSnapshots: boolean;
    promptAudit: boolean;
  };
}

export interface LoadConfigOptions {
  root?: string;
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  onWarning?: (message: string) => void;
}

const log = createDiagnostics("config");

// ─── File schema (snake_case, every key optional) ───────────────────────────

const thresholdsSchema = z
  .object({
    warning: z.number().nonnegative(),
    critical: z.number().nonnegative(),
  })
  .partial();

const backendSchema = z
  .object({
    endpoint: z.string().url(),
    api_key: z.string().min(1),
    model: z.string().min(1),
    timeout_seconds: z.number().positive(),
    max_tokens: z.number().int().positive(),
  })
  .partial();

const configFileSchema = z
  .object({
    paths: z
      .object({
        state_dir: z.string().min(1),
        status_dir: z.string().min(1),
        metrics_dir: z.string().min(1),
      })
      .partial(),
    failure: z
      .object({
        ceiling: z.number().int().positive(),
        unclassified_retry_threshold: z.number().int().positive(),
        retention_days: z.number().positive(),
      })
      .partial(),
    idempotency: z
      .object({
        ttl_seconds: z.number().nonnegative(),
        scope: z.string(),
      })
      .partial(),
    escalation: z
      .object({
        max_attempts: z.number().int().positive(),
        base_delay_ms: z.number().int().nonnegative(),
        max_delay_ms: z.number().int().nonnegative(),
        quota_cooldown_minutes: z.number().nonnegative(),
        design: backendSchema,
        review: backendSchema.extend({ daily_request_limit: z.number().int().positive().optional() }),
      })
      .partial(),
    budget: z
      .object({
        hour: thresholdsSchema,
        day: thresholdsSchema,
        request: thresholdsSchema,
        fail_on_critical: z.boolean(),
      })
      .partial(),
    hooks: z
      .object({
        commit_messages: z.boolean(),
        working_directory: z.boolean(),
        error_snapshots: z.boolean(),
        prompt_audit: z.boolean(),
      })
      .partial(),
  })
  .partial();

type ConfigFile = z.infer<typeof configFileSchema>;

// ─── Defaults ────────────────────────────────────────────────────────────────

const DEFAULT_STATE_DIR = ".buildwarden/state";
const DEFAULT_STATUS_DIR = "docs/ci-status";
const DEFAULT_METRICS_DIR = "docs/ci-status/metrics";

const DEFAULT_BUDGET: Record<CostPeriod, CostThresholds> = {
  hour: { warning: 10, critical: 50 },
  day: { warning: 50, critical: 200 },
  request: { warning: 1, critical: 5 },
};

export function defaultConfig(root: string): BuildwardenConfig {
  return {
    root,
    paths: {
      stateDir: join(root, DEFAULT_STATE_DIR),
      statusDir: join(root, DEFAULT_STATUS_DIR),
      metricsDir: join(root, DEFAULT_METRICS_DIR),
    },
    failure: { ceiling: 3, unclassifiedRetryThreshold: 2, retentionDays: 30 },
    idempotency: { ttlMs: 300_000, scope: null },
    escalation: {
      maxAttempts: 3,
      baseDelayMs: 2_000,
      maxDelayMs: 30_000,
      quotaCooldownMs: 60 * 60_000,
      design: {
        endpoint: "https://api.openai.com/v1",
        apiKey: null,
        model: "o3",
        timeoutMs: 180_000,
        maxTokens: 4096,
      },
      review: {
        endpoint: "https://generativelanguage.googleapis.com/v1beta",
        apiKey: null,
        model: "gemini-2.5-pro",
        timeoutMs: 60_000,
        maxTokens: 2048,
        dailyRequestLimit: 1000,
      },
    },
    budget: {
      hour: { ...DEFAULT_BUDGET.hour },
      day: { ...DEFAULT_BUDGET.day },
      request: { ...DEFAULT_BUDGET.request },
      failOnCritical: false,
    },
    hooks: {
      commitMessages: true,
      workingDirectory: true,
      errorSnapshots: true,
      promptAudit: true,
    },
  };
}

// ─── Root detection ──────────────────────────────────────────────────────────

function isDir(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolve the project root. Priority:
 *   1. BUILDWARDEN_ROOT
 *   2. nearest ancestor of cwd holding .buildwarden/ or .git
 *   3. cwd itself
 */
export function resolveProjectRoot(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.BUILDWARDEN_ROOT;
  if (explicit) return resolve(explicit);

  let current = resolve(cwd);
  for (;;) {
    if (isDir(join(current, ".buildwarden")) || existsSync(join(current, ".git"))) return current;
    const parent = dirname(current);
    if (parent === current) return resolve(cwd);
    current = parent;
  }
}

// ─── Env helpers ─────────────────────────────────────────────────────────────

function readNumber(value: string | undefined, fallback: number, min = 0): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function readString(value: string | undefined): string | null {
  return value && value.trim() ? value.trim() : null;
}

function inRoot(root: string, path: string): string {
  return isAbsolute(path) ? path : join(root, path);
}

function readConfigFile(path: string, warn: (message: string) => void): ConfigFile {
  if (!existsSync(path)) return {};
  try {
    const parsed: unknown = parseYaml(readFileSync(path, "utf-8"));
    if (parsed === null || parsed === undefined) return {};
    const result = configFileSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid document";
      warn(`ignoring ${path} (${where})`);
      return {};
    }
    return result.data;
  } catch (err) {
    warn(`could not read ${path}: ${describeError(err)}`);
    return {};
  }
}

function mergeThresholds(
  base: CostThresholds,
  file: z.infer<typeof thresholdsSchema> | undefined,
  env: NodeJS.ProcessEnv,
  period: CostPeriod,
): CostThresholds {
  const key = period.toUpperCase();
  return {
    warning: readNumber(env[`BUILDWARDEN_COST_${key}_WARNING`], file?.warning ?? base.warning),
    critical: readNumber(env[`BUILDWARDEN_COST_${key}_CRITICAL`], file?.critical ?? base.critical),
  };
}

function defaultScope(env: NodeJS.ProcessEnv): string | null {
  const runId = readString(env.GITHUB_RUN_ID);
  if (!runId) return null;
  return `${runId}:${readString(env.GITHUB_RUN_ATTEMPT) ?? "1"}`;
}

/**
 * Load configuration: defaults, then .buildwarden/config.yaml, then env.
 * A broken config file degrades to defaults with a warning.
 */
export function loadConfig(options: LoadConfigOptions = {}): BuildwardenConfig {
  const env = options.env ?? process.env;
  const warn = options.onWarning ?? ((message: string) => log.warn(message));
  const root = options.root ?? resolveProjectRoot(options.cwd, env);
  const base = defaultConfig(root);

  const configPath =
    options.configPath ?? readString(env.BUILDWARDEN_CONFIG) ?? join(root, ".buildwarden", "config.yaml");
  const file = readConfigFile(inRoot(root, configPath), warn);

  const design = file.escalation?.design;
  const review = file.escalation?.review;

  return {
    root,
    paths: {
      stateDir: inRoot(root, file.paths?.state_dir ?? DEFAULT_STATE_DIR),
      statusDir: inRoot(root, file.paths?.status_dir ?? DEFAULT_STATUS_DIR),
      metricsDir: inRoot(root, file.paths?.metrics_dir ?? DEFAULT_METRICS_DIR),
    },
    failure: {
      ceiling: readNumber(env.BUILDWARDEN_FAILURE_CEILING, file.failure?.ceiling ?? base.failure.ceiling, 1),
      unclassifiedRetryThreshold: readNumber(
        env.BUILDWARDEN_UNCLASSIFIED_RETRIES,
        file.failure?.unclassified_retry_threshold ?? base.failure.unclassifiedRetryThreshold,
        1,
      ),
      retentionDays: file.failure?.retention_days ?? base.failure.retentionDays,
    },
    idempotency: {
      ttlMs:
        readNumber(
          env.BUILDWARDEN_IDEMPOTENCY_TTL,
          file.idempotency?.ttl_seconds ?? base.idempotency.ttlMs / 1000,
        ) * 1000,
      scope: readString(env.BUILDWARDEN_IDEMPOTENCY_SCOPE) ?? file.idempotency?.scope ?? defaultScope(env),
    },
    escalation: {
      maxAttempts: file.escalation?.max_attempts ?? base.escalation.maxAttempts,
      baseDelayMs: file.escalation?.base_delay_ms ?? base.escalation.baseDelayMs,
      maxDelayMs: file.escalation?.max_delay_ms ?? base.escalation.maxDelayMs,
      quotaCooldownMs:
        file.escalation?.quota_cooldown_minutes !== undefined
          ? file.escalation.quota_cooldown_minutes * 60_000
          : base.escalation.quotaCooldownMs,
      design: {
        endpoint: readString(env.O3_ENDPOINT) ?? design?.endpoint ?? base.escalation.design.endpoint,
        apiKey: readString(env.OPENAI_API_KEY) ?? design?.api_key ?? null,
        model: readString(env.O3_MODEL) ?? design?.model ?? base.escalation.design.model,
        timeoutMs:
          design?.timeout_seconds !== undefined ? design.timeout_seconds * 1000 : base.escalation.design.timeoutMs,
        maxTokens: design?.max_tokens ?? base.escalation.design.maxTokens,
      },
      review: {
        endpoint: readString(env.GEMINI_ENDPOINT) ?? review?.endpoint ?? base.escalation.review.endpoint,
        apiKey: readString(env.GEMINI_API_KEY) ?? review?.api_key ?? null,
        model: readString(env.GEMINI_MODEL) ?? review?.model ?? base.escalation.review.model,
        timeoutMs:
          review?.timeout_seconds !== undefined ? review.timeout_seconds * 1000 : base.escalation.review.timeoutMs,
        maxTokens: review?.max_tokens ?? base.escalation.review.maxTokens,
        dailyRequestLimit: review?.daily_request_limit ?? base.escalation.review.dailyRequestLimit,
      },
    },
    budget: {
      hour: mergeThresholds(base.budget.hour, file.budget?.hour, env, "hour"),
      day: mergeThresholds(base.budget.day, file.budget?.day, env, "day"),
      request: mergeThresholds(base.budget.request, file.budget?.request, env, "request"),
      failOnCritical: readBoolean(
        env.BUILDWARDEN_FAIL_ON_CRITICAL_COST,
        file.budget?.fail_on_critical ?? base.budget.failOnCritical,
      ),
    },
    hooks: {
      commitMessages: file.hooks?.commit_messages ?? base.hooks.commitMessages,
      workingDirectory: file.hooks?.working_directory ?? base.hooks.workingDirectory,
      errorSnapshots: file.hooks?.error_snapshots ?? base.hooks.errorSnapshots,
      promptAudit: file.hooks?.prompt_audit ?? base.hooks.promptAudit,
    },
  };
}
