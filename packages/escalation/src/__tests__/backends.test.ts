import { describe, it, expect } from "vitest";
import { defaultConfig } from "@buildwarden/architecture";
import type { FetchLike } from "../backends/backend.js";
import { DesignBackend } from "../backends/design-backend.js";
import { ReviewBackend } from "../backends/review-backend.js";
import { EscalationError } from "../errors.js";
import { jsonResponse, makeRequest } from "./helpers.js";

interface Captured {
  url: string;
  init: RequestInit;
}

function stubFetch(response: () => Response, calls: Captured[] = []): FetchLike {
  return async (url, init) => {
    calls.push({ url, init });
    return response();
  };
}

function bodyOf(call: Captured | undefined): unknown {
  return typeof call?.init.body === "string" ? JSON.parse(call.init.body) : null;
}

const escalation = defaultConfig("/work").escalation;
const designConfig = { ...escalation.design, apiKey: "test-secret", endpoint: "http://design.test/v1/" };
const reviewConfig = { ...escalation.review, apiKey: "test-secret", endpoint: "http://review.test/v1beta" };

async function errorOf(promise: Promise<unknown>): Promise<EscalationError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof EscalationError) return err;
    throw err;
  }
  throw new Error("expected an EscalationError");
}

describe("DesignBackend", () => {
  it("posts a chat completion with a bearer token", async () => {
    const calls: Captured[] = [];
    const backend = new DesignBackend(
      designConfig,
      stubFetch(
        () =>
          jsonResponse({
            model: "o3-2025-04-16",
            choices: [{ message: { content: "Emit the relocation in the writer." } }],
            usage: { prompt_tokens: 12, completion_tokens: 34 },
          }),
        calls,
      ),
    );

    const result = await backend.send(makeRequest({ priorAttempts: 2 }), new AbortController().signal);

    expect(result).toEqual({
      text: "Emit the relocation in the writer.",
      model: "o3-2025-04-16",
      tokenUsage: { input: 12, output: 34 },
    });
    expect(calls[0]?.url).toBe("http://design.test/v1/chat/completions");
    expect(calls[0]?.init.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    const body = bodyOf(calls[0]);
    expect(body).toMatchObject({ model: "o3", max_completion_tokens: 4096 });
    expect(JSON.stringify(body)).toContain("Prior attempts: 2");
  });

  it("reports missing credentials", () => {
    const backend = new DesignBackend({ ...designConfig, apiKey: null });
    expect(backend.configurationProblem()).toBe(
      "Design service not configured: set O3_ENDPOINT and OPENAI_API_KEY to enable design escalations.",
    );
  });

  it("maps HTTP failures onto error kinds", async () => {
    const signal = new AbortController().signal;
    const unauthorized = await errorOf(
      new DesignBackend(designConfig, stubFetch(() => new Response("bad key", { status: 401 }))).send(makeRequest(), signal),
    );
    expect(unauthorized.kind).toBe("permanent");
    expect(unauthorized.status).toBe(401);
    expect(unauthorized.message).toBe("design error 401: bad key");

    const limited = await errorOf(
      new DesignBackend(designConfig, stubFetch(() => new Response("slow down", { status: 429 }))).send(makeRequest(), signal),
    );
    expect(limited.kind).toBe("transient");

    const unavailable = await errorOf(
      new DesignBackend(designConfig, stubFetch(() => new Response("", { status: 503 }))).send(makeRequest(), signal),
    );
    expect(unavailable.kind).toBe("transient");
  });

  it("treats network errors as transient", async () => {
    const failing: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    const err = await errorOf(new DesignBackend(designConfig, failing).send(makeRequest(), new AbortController().signal));
    expect(err.kind).toBe("transient");
    expect(err.message).toBe("design network error: fetch failed");
  });

  it("rejects an unexpected response shape", async () => {
    const backend = new DesignBackend(designConfig, stubFetch(() => jsonResponse({ choices: [] })));
    const err = await errorOf(backend.send(makeRequest(), new AbortController().signal));
    expect(err.kind).toBe("permanent");
  });
});

describe("ReviewBackend", () => {
  it("calls generateContent with the API key header", async () => {
    const calls: Captured[] = [];
    const backend = new ReviewBackend(
      reviewConfig,
      stubFetch(
        () =>
          jsonResponse({
            candidates: [{ content: { parts: [{ text: "Looks " }, { text: "fine." }] } }],
            usageMetadata: { promptTokenCount: 40, candidatesTokenCount: 8 },
          }),
        calls,
      ),
    );

    const result = await backend.send(makeRequest({ service: "review" }), new AbortController().signal);

    expect(result).toEqual({ text: "Looks fine.", model: "gemini-2.5-pro", tokenUsage: { input: 40, output: 8 } });
    expect(calls[0]?.url).toBe("http://review.test/v1beta/models/gemini-2.5-pro:generateContent");
    expect(calls[0]?.init.headers).toEqual({ "Content-Type": "application/json", "x-goog-api-key": "test-secret" });
    expect(bodyOf(calls[0])).toMatchObject({ generationConfig: { temperature: 0.2, maxOutputTokens: 2048 } });
  });

  it("treats 429 as an exhausted quota", async () => {
    const backend = new ReviewBackend(reviewConfig, stubFetch(() => new Response("quota", { status: 429 })));
    const err = await errorOf(backend.send(makeRequest({ service: "review" }), new AbortController().signal));
    expect(err.kind).toBe("quota-exceeded");
  });

  it("reports missing credentials", () => {
    expect(new ReviewBackend({ ...reviewConfig, apiKey: null }).configurationProblem()).toContain("GEMINI_API_KEY");
    expect(new ReviewBackend(reviewConfig).configurationProblem()).toBeNull();
  });

  it("counts missing usage metadata as zero tokens", async () => {
    const backend = new ReviewBackend(
      reviewConfig,
      stubFetch(() => jsonResponse({ candidates: [{ content: { parts: [{ text: "ok" }] } }] })),
    );
    const result = await backend.send(makeRequest({ service: "review" }), new AbortController().signal);
    expect(result.tokenUsage).toEqual({ input: 0, output: 0 });
  });
});
