/**
 * client.ts — AI escalation client
 *
 * One escalation runs as a bounded attempt loop:
 *
 *   pending -> success
 *           -> transient   -> (backoff) pending, until maxAttempts
 *           -> permanent   (terminal, never retried)
 *           -> quota       (terminal, starts a cooldown for the service)
 *
 * Configuration problems, active cooldowns, the review daily limit and caller
 * cancellation end the call without (or before another) network attempt.
 * Every outcome writes one usage record and one pipeline-log entry; both
 * writes are best effort.
 */

import {
  createDiagnostics,
  describeError,
  type Diagnostics,
  type EscalationErrorKind,
  type EscalationPort,
  type EscalationRequest,
  type EscalationResponse,
  type PipelineLogPort,
  type TokenUsage,
  type UsageLedgerPort,
  type UsageRecord,
} from "@buildwarden/architecture";
import type { EscalationBackend } from "./backends/backend.js";
import type { CooldownStore } from "./cooldown-store.js";
import { EscalationError, describeKind } from "./errors.js";
import { priceUsage, type PriceTable } from "./pricing.js";

const DAY_MS = 86_400_000;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface EscalationClientOptions {
  design: EscalationBackend;
  review: EscalationBackend;
  ledger: UsageLedgerPort;
  pipelineLog?: PipelineLogPort;
  cooldowns?: CooldownStore;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  quotaCooldownMs?: number;
  /** Review requests allowed per rolling 24 hours. */
  reviewDailyLimit?: number;
  sessionId?: string;
  user?: string;
  priceTable?: PriceTable;
  sleep?: Sleep;
  now?: () => Date;
  diagnostics?: Diagnostics;
}

interface Outcome {
  text: string;
  model: string;
  tokenUsage: TokenUsage;
  errorKind: EscalationErrorKind | null;
  attempts: number;
}

const ZERO_USAGE: TokenUsage = { input: 0, output: 0 };

export const defaultSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export class EscalationClient implements EscalationPort {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly quotaCooldownMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly log: Diagnostics;

  constructor(private readonly options: EscalationClientOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 2_000;
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.quotaCooldownMs = options.quotaCooldownMs ?? 60 * 60_000;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.log = options.diagnostics ?? createDiagnostics("escalation");
  }

  async escalate(request: EscalationRequest, options: { signal?: AbortSignal } = {}): Promise<EscalationResponse> {
    const backend = request.service === "design" ? this.options.design : this.options.review;
    const outcome = await this.run(backend, request, options.signal);
    const response: EscalationResponse = {
      service: request.service,
      model: outcome.model,
      text: outcome.text,
      tokenUsage: outcome.tokenUsage,
      success: outcome.errorKind === null,
      errorKind: outcome.errorKind,
      attempts: outcome.attempts,
    };
    await this.record(request, response);
    return response;
  }

  private async run(backend: EscalationBackend, request: EscalationRequest, signal?: AbortSignal): Promise<Outcome> {
    const fail = (errorKind: EscalationErrorKind, text: string, attempts: number): Outcome => ({
      text,
      model: backend.model,
      tokenUsage: ZERO_USAGE,
      errorKind,
      attempts,
    });

    const problem = backend.configurationProblem();
    if (problem) return fail("configuration", problem, 0);

    const blocked = await this.quotaBlock(backend);
    if (blocked) return fail("quota-exceeded", blocked, 0);

    let lastMessage = "";
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) return fail("cancelled", `${backend.service} escalation cancelled`, attempt - 1);

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), backend.timeoutMs);
      const onCallerAbort = () => controller.abort();
      signal?.addEventListener("abort", onCallerAbort, { once: true });

      try {
        const reply = await backend.send(request, controller.signal);
        return { text: reply.text, model: reply.model, tokenUsage: reply.tokenUsage, errorKind: null, attempts: attempt };
      } catch (err) {
        if (signal?.aborted) return fail("cancelled", `${backend.service} escalation cancelled`, attempt);

        let kind: EscalationErrorKind = err instanceof EscalationError ? err.kind : "transient";
        lastMessage = describeError(err);
        if (controller.signal.aborted) {
          kind = "transient";
          lastMessage = `${backend.service} request timed out after ${backend.timeoutMs}ms`;
        }

        if (kind === "quota-exceeded") {
          await this.startCooldown(backend, lastMessage);
          return fail(kind, lastMessage, attempt);
        }
        if (kind !== "transient") return fail(kind, lastMessage, attempt);

        this.log.warn(`${backend.service} attempt ${attempt}/${this.maxAttempts} failed: ${lastMessage}`);
        if (attempt < this.maxAttempts) {
          await this.sleep(backoffDelay(attempt, this.baseDelayMs, this.maxDelayMs), signal);
        }
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onCallerAbort);
      }
    }

    return fail("transient", `${backend.service} gave up after ${this.maxAttempts} attempts: ${lastMessage}`, this.maxAttempts);
  }

  /** Reason the backend may not be called right now, or null. */
  private async quotaBlock(backend: EscalationBackend): Promise<string | null> {
    const now = this.now();
    const cooldown = this.options.cooldowns?.active(backend.service, now);
    if (cooldown) {
      return `${backend.service} service cooling down until ${cooldown.until} (${cooldown.reason})`;
    }

    const limit = this.options.reviewDailyLimit;
    if (backend.service !== "review" || limit === undefined) return null;
    try {
      const since = new Date(now.getTime() - DAY_MS).toISOString();
      const used = await this.options.ledger.countRequests("review", since);
      if (used >= limit) return `review service daily request limit reached (${used}/${limit})`;
    } catch (err) {
      this.log.warn(`could not read request count: ${describeError(err)}`);
    }
    return null;
  }

  private async startCooldown(backend: EscalationBackend, reason: string): Promise<void> {
    const store = this.options.cooldowns;
    if (!store) return;
    const until = new Date(this.now().getTime() + this.quotaCooldownMs);
    try {
      await store.start(backend.service, until, reason);
      this.log.warn(`${backend.service} ${describeKind("quota-exceeded")}; cooling down until ${until.toISOString()}`);
    } catch (err) {
      this.log.error("could not persist cooldown", err);
    }
  }

  private async record(request: EscalationRequest, response: EscalationResponse): Promise<void> {
    const tokens = response.tokenUsage;
    const usage: UsageRecord = {
      type: "usage_captured",
      timestamp: this.now().toISOString(),
      session_id: this.options.sessionId ?? "unknown",
      model: response.model,
      phase: request.phaseId,
      service: request.service,
      user: this.options.user ?? process.env.USER ?? "unknown",
      success: response.success,
      error_kind: response.errorKind,
      tokens: { input: tokens.input, output: tokens.output, total: tokens.input + tokens.output },
      cost_usd: response.success
        ? priceUsage(response.model, tokens, this.options.priceTable)
        : { input: 0, output: 0, total: 0 },
    };

    try {
      await this.options.ledger.append(usage);
    } catch (err) {
      this.log.error("usage record not written", err);
    }

    if (!this.options.pipelineLog) return;
    try {
      await this.options.pipelineLog.append(
        "escalation_response",
        {
          service: request.service,
          model: response.model,
          success: response.success,
          error_kind: response.errorKind,
          attempts: response.attempts,
          tokens: usage.tokens,
          cost_usd: usage.cost_usd.total,
          request: {
            context: request.context,
            error_text: request.errorText ?? null,
            prior_attempts: request.priorAttempts,
          },
          response: response.text,
        },
        request.phaseId,
      );
    } catch (err) {
      this.log.error("pipeline log entry not written", err);
    }
  }
}
