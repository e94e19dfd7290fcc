import { describe, it, expect } from "vitest";
import type {
  ClassifiedError,
  DispatchAction,
  EscalationPort,
  EscalationRequest,
  EscalationResponse,
} from "@buildwarden/architecture";
import { resolveAction } from "../escalation-runner.js";

const classified: ClassifiedError = {
  rawText: "Segmentation fault (core dumped)",
  category: "implementation-issue",
  matchedPattern: "Segmentation fault",
  issueId: "segfault-message",
  suggestedAction: "Reproduce with a debug build",
};

const request: EscalationRequest = {
  service: "review",
  context: "command: make check",
  errorText: "Segmentation fault (core dumped)",
  phaseId: "phase-3",
  priorAttempts: 0,
};

class FakeClient implements EscalationPort {
  readonly calls: EscalationRequest[] = [];
  constructor(private readonly reply: EscalationResponse | Error) {}

  async escalate(req: EscalationRequest): Promise<EscalationResponse> {
    this.calls.push(req);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

function response(overrides: Partial<EscalationResponse> = {}): EscalationResponse {
  return {
    service: "review",
    model: "gemini-2.5-pro",
    text: "Check the bounds on the relocation table loop.",
    tokenUsage: { input: 100, output: 20 },
    success: true,
    errorKind: null,
    attempts: 1,
    ...overrides,
  };
}

const summary = [
  'Failure classified as implementation-issue (segfault-message: "Segmentation fault")',
  "Consecutive failures: 1",
  "Next: Reproduce with a debug build",
].join("\n");

describe("resolveAction", () => {
  it("says nothing for a plain success", async () => {
    const action: DispatchAction = { kind: "noop", signature: "make-1", classified: null, failureCount: 0 };
    const client = new FakeClient(response());
    const resolved = await resolveAction(action, client);
    expect(resolved).toEqual({ action, response: null, message: null, blocking: false });
    expect(client.calls).toHaveLength(0);
  });

  it("summarises a known failure without escalating", async () => {
    const action: DispatchAction = { kind: "noop", signature: "make-1", classified, failureCount: 1 };
    const resolved = await resolveAction(action, new FakeClient(response()));
    expect(resolved.message).toBe(summary);
    expect(resolved.blocking).toBe(false);
  });

  it("appends the service reply to an escalation", async () => {
    const action: DispatchAction = { kind: "escalate", signature: "make-1", classified, failureCount: 1, request };
    const client = new FakeClient(response());
    const resolved = await resolveAction(action, client);
    expect(client.calls).toEqual([request]);
    expect(resolved.message).toBe(
      `${summary}\n\nreview service (gemini-2.5-pro) response:\nCheck the bounds on the relocation table loop.`,
    );
    expect(resolved.blocking).toBe(false);
  });

  it("describes a failed escalation by kind", async () => {
    const action: DispatchAction = { kind: "escalate", signature: "make-1", classified, failureCount: 1, request };
    const resolved = await resolveAction(
      action,
      new FakeClient(response({ success: false, errorKind: "quota-exceeded", text: "review error 429: quota" })),
    );
    expect(resolved.message).toBe(`${summary}\n\nreview escalation quota-exceeded (quota exhausted): review error 429: quota`);
  });

  it("blocks on fatal and still reports a thrown client error", async () => {
    const action: DispatchAction = {
      kind: "fatal",
      signature: "make-1",
      classified,
      failureCount: 1,
      reason: "failure ceiling reached: 1 consecutive failures (limit 1)",
      request: { ...request, service: "design" },
    };
    const resolved = await resolveAction(action, new FakeClient(new Error("ledger offline")));
    expect(resolved.blocking).toBe(true);
    expect(resolved.response).toBeNull();
    expect(resolved.message).toBe(
      `${summary}\n\nFatal: failure ceiling reached: 1 consecutive failures (limit 1)\n\ndesign escalation failed: ledger offline`,
    );
  });

  it("does not call the client for fatal without a request", async () => {
    const action: DispatchAction = {
      kind: "fatal",
      signature: "make-1",
      classified,
      failureCount: 4,
      reason: "failure ceiling exceeded: 4 consecutive failures (limit 3)",
      request: null,
    };
    const client = new FakeClient(response());
    const resolved = await resolveAction(action, client);
    expect(client.calls).toHaveLength(0);
    expect(resolved.blocking).toBe(true);
  });
});
