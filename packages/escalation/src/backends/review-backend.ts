/**
 * review-backend.ts — code-review backend on the Gemini generateContent API
 *
 * Free-tier oriented. A 429 here means the daily quota is spent, which the
 * client turns into a cooldown.
 */

import { z } from "zod";
import type { EscalationRequest, ReviewBackendConfig } from "@buildwarden/architecture";
import { EscalationError } from "../errors.js";
import { buildPrompt, postJson, type BackendReply, type EscalationBackend, type FetchLike } from "./backend.js";

const TEMPERATURE = 0.2;

const generateSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).default([]),
        }),
      }),
    )
    .min(1),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().nonnegative().default(0),
      candidatesTokenCount: z.number().nonnegative().default(0),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

export class ReviewBackend implements EscalationBackend {
  readonly service = "review" as const;
  readonly model: string;
  readonly timeoutMs: number;
  readonly dailyRequestLimit: number;

  constructor(
    private readonly config: ReviewBackendConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.dailyRequestLimit = config.dailyRequestLimit;
  }

  configurationProblem(): string | null {
    if (!this.config.apiKey) {
      return "Review service not configured: set GEMINI_API_KEY to enable review escalations.";
    }
    return null;
  }

  async send(request: EscalationRequest, signal: AbortSignal): Promise<BackendReply> {
    const apiKey = this.config.apiKey;
    if (!apiKey) throw new EscalationError("configuration", this.configurationProblem() ?? "missing API key");

    const raw = await postJson(
      this.fetchImpl,
      this.service,
      `${this.config.endpoint.replace(/\/+$/, "")}/models/${this.model}:generateContent`,
      { "x-goog-api-key": apiKey },
      {
        contents: [{ parts: [{ text: buildPrompt(request) }] }],
        generationConfig: { temperature: TEMPERATURE, maxOutputTokens: this.config.maxTokens },
      },
      signal,
    );

    const parsed = generateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EscalationError("permanent", "review service returned an unexpected response shape");
    }
    const data = parsed.data;
    const text = (data.candidates[0]?.content.parts ?? [])
      .map((part) => part.text ?? "")
      .join("");
    return {
      text,
      model: data.modelVersion ?? this.model,
      tokenUsage: {
        input: data.usageMetadata?.promptTokenCount ?? 0,
        output: data.usageMetadata?.candidatesTokenCount ?? 0,
      },
    };
  }
}
