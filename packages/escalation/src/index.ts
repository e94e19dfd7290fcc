import type { BuildwardenConfig, PipelineLogPort, UsageLedgerPort } from "@buildwarden/architecture";
import type { FetchLike } from "./backends/backend.js";
import { DesignBackend } from "./backends/design-backend.js";
import { ReviewBackend } from "./backends/review-backend.js";
import { EscalationClient, type Sleep } from "./client.js";
import { CooldownStore } from "./cooldown-store.js";

export * from "./errors.js";
export * from "./backends/backend.js";
export * from "./backends/design-backend.js";
export * from "./backends/review-backend.js";
export * from "./cooldown-store.js";
export * from "./pricing.js";
export * from "./client.js";

export interface CreateEscalationClientOptions {
  ledger: UsageLedgerPort;
  pipelineLog?: PipelineLogPort;
  sessionId?: string;
  cooldowns?: CooldownStore;
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
}

/** Wire both backends, the cooldown store and the retry policy from configuration. */
export function createEscalationClient(
  config: BuildwardenConfig,
  options: CreateEscalationClientOptions,
): EscalationClient {
  const { escalation } = config;
  return new EscalationClient({
    design: new DesignBackend(escalation.design, options.fetch),
    review: new ReviewBackend(escalation.review, options.fetch),
    ledger: options.ledger,
    pipelineLog: options.pipelineLog,
    cooldowns: options.cooldowns ?? new CooldownStore(config.paths.stateDir),
    maxAttempts: escalation.maxAttempts,
    baseDelayMs: escalation.baseDelayMs,
    maxDelayMs: escalation.maxDelayMs,
    quotaCooldownMs: escalation.quotaCooldownMs,
    reviewDailyLimit: escalation.review.dailyRequestLimit,
    sessionId: options.sessionId,
    sleep: options.sleep,
    now: options.now,
  });
}
