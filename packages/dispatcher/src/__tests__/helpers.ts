/**
 * helpers.ts — temp-dir runtimes and payload factories
 */

import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { defaultConfig, type BuildwardenConfig, type ToolResult } from "@buildwarden/architecture";
import { createDispatchRuntime, type CreateRuntimeOptions, type DispatchRuntime } from "../runtime.js";

export interface TestProject {
  root: string;
  config: BuildwardenConfig;
  cleanup(): void;
}

export function makeProject(tweak: (config: BuildwardenConfig) => void = () => {}): TestProject {
  const root = mkdtempSync(join(tmpdir(), "bw-dispatch-"));
  const config = defaultConfig(root);
  tweak(config);
  return { root, config, cleanup: () => rmSync(root, { recursive: true, force: true }) };
}

export function makeRuntime(project: TestProject, options: Omit<CreateRuntimeOptions, "config"> = {}): DispatchRuntime {
  return createDispatchRuntime({
    ...options,
    config: project.config,
    sessionId: options.sessionId ?? "session-test",
    resolveBranch: options.resolveBranch ?? (() => null),
  });
}

export const LLVM_BUILD = "./ci/scripts/build-custom-llvm.sh --target m68k";

export function failed(command: string, stderr: string, exitCode = 1): ToolResult {
  return { command, exitCode, stdout: "", stderr };
}

export function succeeded(command: string, stdout = "ok\n"): ToolResult {
  return { command, exitCode: 0, stdout, stderr: "" };
}
