import { describe, it, expect } from "vitest";
import { computeSignature, normalizeCommand } from "../signature.js";

describe("computeSignature", () => {
  it("ignores whitespace differences in the command text", () => {
    expect(computeSignature({ command: "cargo   build \t --release" })).toBe(
      computeSignature({ command: "cargo build --release" }),
    );
  });

  it("prefixes the digest with a slug of the first command word", () => {
    const signature = computeSignature({ command: "cargo build --release" });
    expect(signature).toMatch(/^cargo-[0-9a-f]{16}$/);
    expect(computeSignature({ command: "/usr/bin/make all" })).toMatch(/^make-[0-9a-f]{16}$/);
    expect(computeSignature({ command: "   " })).toMatch(/^cmd-[0-9a-f]{16}$/);
  });

  it("distinguishes cwd and scope", () => {
    const base = computeSignature({ command: "make test" });
    expect(computeSignature({ command: "make test", cwd: "/work/a" })).not.toBe(base);
    expect(computeSignature({ command: "make test", scope: "42:1" })).not.toBe(
      computeSignature({ command: "make test", scope: "42:2" }),
    );
  });

  it("is deterministic", () => {
    const input = { command: "ninja -C build", cwd: "/src", scope: "7:1" };
    expect(computeSignature(input)).toBe(computeSignature({ ...input }));
  });
});

describe("normalizeCommand", () => {
  it("collapses whitespace", () => {
    expect(normalizeCommand("  make \n  all ")).toBe("make all");
  });
});
