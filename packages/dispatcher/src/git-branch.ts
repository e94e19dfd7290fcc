/**
 * git-branch.ts — the branch a command runs on
 *
 * CI exposes the branch in the environment; locally it comes from git.
 */

import { execFileSync } from "child_process";
import { createDiagnostics, describeError } from "@buildwarden/architecture";

const log = createDiagnostics("git");

const BRANCH_ENV = ["GITHUB_HEAD_REF", "GITHUB_REF_NAME", "CI_COMMIT_BRANCH"];

export function currentBranch(cwd?: string, env: NodeJS.ProcessEnv = process.env): string | null {
  for (const name of BRANCH_ENV) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  try {
    const branch = execFileSync("git", ["rev-parse", "--abbrev-ref", "HEAD"], {
      cwd,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
      timeout: 2000,
    }).trim();
    return branch && branch !== "HEAD" ? branch : null;
  } catch (err) {
    log.debug(`branch unknown: ${describeError(err)}`);
    return null;
  }
}
