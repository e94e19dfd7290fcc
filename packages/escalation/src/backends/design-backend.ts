/**
 * design-backend.ts — deep-reasoning backend on the OpenAI chat completions API
 *
 * Used sparingly: design-level failures and the single escalation at the
 * failure ceiling. Priced per token.
 */

import { z } from "zod";
import type { BackendConfig, EscalationRequest } from "@buildwarden/architecture";
import { EscalationError } from "../errors.js";
import { buildPrompt, postJson, type BackendReply, type EscalationBackend, type FetchLike } from "./backend.js";

const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().nonnegative(),
      completion_tokens: z.number().nonnegative(),
    })
    .optional(),
});

export class DesignBackend implements EscalationBackend {
  readonly service = "design" as const;
  readonly model: string;
  readonly timeoutMs: number;

  constructor(
    private readonly config: BackendConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
  }

  configurationProblem(): string | null {
    if (!this.config.apiKey) {
      return "Design service not configured: set O3_ENDPOINT and OPENAI_API_KEY to enable design escalations.";
    }
    return null;
  }

  async send(request: EscalationRequest, signal: AbortSignal): Promise<BackendReply> {
    const apiKey = this.config.apiKey;
    if (!apiKey) throw new EscalationError("configuration", this.configurationProblem() ?? "missing API key");

    const raw = await postJson(
      this.fetchImpl,
      this.service,
      `${this.config.endpoint.replace(/\/+$/, "")}/chat/completions`,
      { Authorization: `Bearer ${apiKey}` },
      {
        model: this.model,
        messages: [{ role: "user", content: buildPrompt(request) }],
        max_completion_tokens: this.config.maxTokens,
      },
      signal,
    );

    const parsed = completionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EscalationError("permanent", "design service returned an unexpected response shape");
    }
    const data = parsed.data;
    return {
      text: data.choices[0]?.message.content ?? "",
      model: data.model ?? this.model,
      tokenUsage: {
        input: data.usage?.prompt_tokens ?? 0,
        output: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}
