import { createHash } from "crypto";
import type { CommandSignature } from "./domain.js";

export interface SignatureInput {
  command: string;
  cwd?: string;
  /** Extra discriminator, e.g. "<run id>:<attempt>" so reruns of a CI job are independent. */
  scope?: string;
}

export function normalizeCommand(command: string): string {
  return command.replace(/\s+/g, " ").trim();
}

function leadingWord(command: string): string {
  const first = normalizeCommand(command).split(" ")[0] ?? "";
  const base = first.split("/").pop() ?? "";
  const slug = base
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "cmd";
}

export function computeSignature(input: SignatureInput): CommandSignature {
  const parts = [normalizeCommand(input.command), input.cwd ?? "", input.scope ?? ""];
  const digest = createHash("sha256").update(parts.join("\u0000")).digest("hex");
  return `${leadingWord(input.command)}-${digest.slice(0, 16)}`;
}
