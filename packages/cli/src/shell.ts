/**
 * shell.ts — run a command through the shell, tee-ing its output
 */

import { spawn } from "child_process";
import { constants } from "os";

export interface ShellResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ShellOptions {
  cwd?: string;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
}

/** Keep at most this much of each stream in memory; the tail is what gets classified. */
const MAX_CAPTURE = 1024 * 1024;

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  return 128 + (constants.signals[signal] ?? 0);
}

function keepTail(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > MAX_CAPTURE ? next.slice(-MAX_CAPTURE) : next;
}

export function runShell(command: string, options: ShellOptions = {}): Promise<ShellResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, {
      cwd: options.cwd,
      shell: true,
      stdio: ["inherit", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout = keepTail(stdout, chunk);
      options.onStdout?.(chunk);
    });
    child.stderr.on("data", (chunk: string) => {
      stderr = keepTail(stderr, chunk);
      options.onStderr?.(chunk);
    });

    child.on("error", reject);
    child.on("close", (code, signal) => {
      resolve({ exitCode: code ?? signalExitCode(signal), stdout, stderr });
    });
  });
}
