import {
  describeError,
  type DispatchAction,
  type EscalationPort,
  type EscalationResponse,
} from "@buildwarden/architecture";
import { describeKind } from "@buildwarden/escalation";
import { summarizeClassification } from "./classifier.js";

export interface ResolvedAction {
  action: DispatchAction;
  response: EscalationResponse | null;
  /** Text to surface to the operator or agent; null when there is nothing to say. */
  message: string | null;
  /** True when the wrapping step should stop (fatal). */
  blocking: boolean;
}

function responseSection(response: EscalationResponse): string {
  if (response.success) {
    return `${response.service} service (${response.model}) response:\n${response.text}`;
  }
  const kind = response.errorKind ?? "transient";
  return `${response.service} escalation ${kind} (${describeKind(kind)}): ${response.text}`;
}

/** Execute the escalation an action asks for and assemble the operator message. */
export async function resolveAction(
  action: DispatchAction,
  client: EscalationPort,
  options: { signal?: AbortSignal } = {},
): Promise<ResolvedAction> {
  if (action.kind === "noop") {
    const message = action.classified ? summarizeClassification(action.classified, action.failureCount) : null;
    return { action, response: null, message, blocking: false };
  }

  const sections = [summarizeClassification(action.classified, action.failureCount)];
  if (action.kind === "fatal") sections.push(`Fatal: ${action.reason}`);

  let response: EscalationResponse | null = null;
  if (action.request) {
    try {
      response = await client.escalate(action.request, { signal: options.signal });
      sections.push(responseSection(response));
    } catch (err) {
      sections.push(`${action.request.service} escalation failed: ${describeError(err)}`);
    }
  }

  return { action, response, message: sections.join("\n\n"), blocking: action.kind === "fatal" };
}
