import type { EscalationErrorKind, EscalationService } from "@buildwarden/architecture";

export class EscalationError extends Error {
  constructor(
    readonly kind: EscalationErrorKind,
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "EscalationError";
  }
}

/**
 * Map an HTTP status to an error kind. A 429 from the review backend is its
 * daily quota; from the design backend it is ordinary rate limiting.
 */
export function kindForStatus(status: number, service: EscalationService): EscalationErrorKind {
  if (status === 429) return service === "review" ? "quota-exceeded" : "transient";
  if (status === 408 || status >= 500) return "transient";
  return "permanent";
}

export function describeKind(kind: EscalationErrorKind): string {
  switch (kind) {
    case "transient":
      return "service unavailable (network, timeout or 5xx)";
    case "permanent":
      return "request rejected (authentication or malformed input)";
    case "quota-exceeded":
      return "quota exhausted";
    case "configuration":
      return "not configured";
    case "cancelled":
      return "cancelled";
  }
}
