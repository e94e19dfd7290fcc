/**
 * error-snapshots.ts — capture the filesystem around file-related failures
 *
 * When a failed command's output points at a missing or unreadable file,
 * a snapshot of that path and its directory is written to
 * <status_dir>/snapshots/error-<timestamp>-<signature>.json so the state can
 * be inspected after the runner is gone. Snapshots past the retention window
 * are pruned with the failure records.
 */

import { existsSync, readdirSync, realpathSync, statSync, unlinkSync } from "fs";
import { dirname, join, resolve } from "path";
import { z } from "zod";
import {
  readJsonState,
  writeJsonStateAtomic,
  type CommandSignature,
  type ISODateTime,
  type ToolResult,
} from "@buildwarden/architecture";

export const SNAPSHOT_DIR = "snapshots";

const DAY_MS = 86_400_000;
const MAX_LISTING = 200;

export const FILE_ERROR_PATTERNS = [
  "No such file or directory",
  "Permission denied",
  "cannot open",
  "build.log",
  "test.log",
  "pipeline-log.json",
];

const PATH_IN_ERROR = /(\S+):\s*(?:No such file|Permission denied|cannot open)/;
const PATH_IN_COMMAND = /(\S*(?:build\.log|test\.log|pipeline-log\.json))/;

export function isFileError(errorText: string): boolean {
  return FILE_ERROR_PATTERNS.some((pattern) => errorText.includes(pattern));
}

/** The path a file error is about: named in the error, else a known log file in the command. */
export function extractErrorPath(command: string, errorText: string): string | null {
  return PATH_IN_ERROR.exec(errorText)?.[1] ?? PATH_IN_COMMAND.exec(command)?.[1] ?? null;
}

export interface ErrorSnapshot {
  timestamp: ISODateTime;
  signature: CommandSignature;
  command: string;
  cwd: string | null;
  exit_code: number;
  error: string;
  file_path: string;
  directory: { path: string; entries: string[] | null };
  file: { exists: boolean; type: "file" | "directory" | "other" | null; size: number | null; resolved: string };
  environment: { user: string; home: string; ci: boolean; github_actions: boolean };
}

const snapshotTimestampSchema = z.object({ timestamp: z.string() });

export interface ErrorSnapshotOptions {
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
}

function listDirectory(path: string): string[] | null {
  try {
    return readdirSync(path).sort().slice(0, MAX_LISTING);
  } catch {
    return null;
  }
}

function describeFile(path: string): ErrorSnapshot["file"] {
  try {
    const stat = statSync(path);
    return {
      exists: true,
      type: stat.isFile() ? "file" : stat.isDirectory() ? "directory" : "other",
      size: stat.size,
      resolved: realpathSync(path),
    };
  } catch {
    return { exists: false, type: null, size: null, resolved: path };
  }
}

export class ErrorSnapshotStore {
  readonly dir: string;
  private readonly now: () => Date;
  private readonly env: NodeJS.ProcessEnv;

  constructor(statusDir: string, options: ErrorSnapshotOptions = {}) {
    this.dir = join(statusDir, SNAPSHOT_DIR);
    this.now = options.now ?? (() => new Date());
    this.env = options.env ?? process.env;
  }

  /** Write a snapshot when the failure is file-related; returns its path, or null when there is nothing to capture. */
  capture(signature: CommandSignature, result: ToolResult, errorText: string): string | null {
    if (!isFileError(errorText)) return null;
    const filePath = extractErrorPath(result.command, errorText);
    if (!filePath) return null;

    const absolute = resolve(result.cwd ?? process.cwd(), filePath);
    const timestamp = this.now().toISOString();
    const snapshot: ErrorSnapshot = {
      timestamp,
      signature,
      command: result.command,
      cwd: result.cwd ?? null,
      exit_code: result.exitCode,
      error: errorText,
      file_path: filePath,
      directory: { path: dirname(absolute), entries: listDirectory(dirname(absolute)) },
      file: describeFile(absolute),
      environment: {
        user: this.env.USER ?? "unknown",
        home: this.env.HOME ?? "unknown",
        ci: this.env.CI === "true",
        github_actions: this.env.GITHUB_ACTIONS === "true",
      },
    };

    const stamp = timestamp.replace(/[-:]/g, "").replace(/\.\d+/, "");
    const path = join(this.dir, `error-${stamp}-${signature}.json`);
    writeJsonStateAtomic(path, snapshot);
    return path;
  }

  /** Snapshot file names, oldest first. */
  list(): string[] {
    if (!existsSync(this.dir)) return [];
    return readdirSync(this.dir)
      .filter((name) => name.startsWith("error-") && name.endsWith(".json"))
      .sort();
  }

  /** Delete snapshots taken before the retention window. */
  prune(retentionDays: number): number {
    const cutoff = this.now().getTime() - retentionDays * DAY_MS;
    let removed = 0;
    for (const name of this.list()) {
      const path = join(this.dir, name);
      if (this.takenAt(path) < cutoff) {
        unlinkSync(path);
        removed += 1;
      }
    }
    return removed;
  }

  private takenAt(path: string): number {
    const recorded = readJsonState<number | null>(
      path,
      () => null,
      (raw) => {
        const parsed = snapshotTimestampSchema.safeParse(raw);
        if (!parsed.success) return null;
        const at = Date.parse(parsed.data.timestamp);
        return Number.isNaN(at) ? null : at;
      },
    );
    return recorded ?? statSync(path).mtimeMs;
  }
}
