import { describe, it, expect } from "vitest";
import { runShell } from "../shell.js";

describe("runShell", () => {
  it("captures and tees both streams and the exit code", async () => {
    const seen: string[] = [];
    const result = await runShell("printf 'built\\n'; printf 'warned' 1>&2; exit 4", {
      onStdout: (chunk) => seen.push(`out:${chunk}`),
      onStderr: (chunk) => seen.push(`err:${chunk}`),
    });
    expect(result).toEqual({ exitCode: 4, stdout: "built\n", stderr: "warned" });
    expect(seen).toContain("out:built\n");
    expect(seen).toContain("err:warned");
  });

  it("runs in the requested directory", async () => {
    const result = await runShell("pwd", { cwd: "/" });
    expect(result.stdout).toBe("/\n");
    expect(result.exitCode).toBe(0);
  });
});
