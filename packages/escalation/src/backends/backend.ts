import type { EscalationRequest, EscalationService, TokenUsage } from "@buildwarden/architecture";
import { EscalationError, kindForStatus } from "../errors.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface BackendReply {
  text: string;
  model: string;
  tokenUsage: TokenUsage;
}

export interface EscalationBackend {
  readonly service: EscalationService;
  readonly model: string;
  readonly timeoutMs: number;
  /** Operator-facing reason the backend cannot be called, or null when ready. */
  configurationProblem(): string | null;
  send(request: EscalationRequest, signal: AbortSignal): Promise<BackendReply>;
}

const MAX_ERROR_BODY = 500;

export function buildPrompt(request: EscalationRequest): string {
  const lines = [
    request.service === "design"
      ? "A CI build step failed in a way that looks like a design-level problem. Propose a concrete fix."
      : "Review this CI failure and suggest the smallest code change that resolves it.",
    "",
    `Phase: ${request.phaseId}`,
    `Prior attempts: ${request.priorAttempts}`,
    "",
    "Context:",
    request.context,
  ];
  if (request.errorText) {
    lines.push("", "Error output:", request.errorText);
  }
  return lines.join("\n");
}

/**
 * POST a JSON body and return the parsed JSON reply. Failures are thrown as
 * EscalationError; an aborted request surfaces as transient and the caller
 * decides whether it was a timeout or a cancellation.
 */
export async function postJson(
  fetchImpl: FetchLike,
  service: EscalationService,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal: AbortSignal,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (error: unknown) {
    if (signal.aborted) throw new EscalationError("transient", `${service} request aborted`);
    const msg = error instanceof Error ? error.message : String(error);
    throw new EscalationError("transient", `${service} network error: ${msg}`);
  }

  if (!response.ok) {
    const errText = await response.text().catch(() => "(unreadable body)");
    throw new EscalationError(
      kindForStatus(response.status, service),
      `${service} error ${response.status}: ${errText.slice(0, MAX_ERROR_BODY)}`,
      response.status,
    );
  }

  try {
    return await response.json();
  } catch {
    if (signal.aborted) throw new EscalationError("transient", `${service} request aborted`);
    throw new EscalationError("permanent", `${service} returned a non-JSON body`, response.status);
  }
}
