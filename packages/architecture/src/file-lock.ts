import {
  closeSync,
  existsSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { dirname } from "path";

const LOCK_TIMEOUT_MS = 10_000;
const LOCK_POLL_MS = 50;
const STALE_LOCK_MS = 30_000;

export class LockTimeoutError extends Error {
  constructor(readonly lockFile: string) {
    super(`Failed to acquire lock ${lockFile}`);
    this.name = "LockTimeoutError";
  }
}

export interface FileLockOptions {
  timeoutMs?: number;
  pollMs?: number;
  staleMs?: number;
}

function ensureDir(path: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

/**
 * Run `fn` while holding an exclusive lock on `<target>.lock`.
 * The lock is an O_EXCL-created file, so it serializes writers across
 * processes as well as concurrent callers inside one process.
 */
export async function withFileLock<T>(
  target: string,
  fn: () => Promise<T> | T,
  options: FileLockOptions = {},
): Promise<T> {
  const lock = `${target}.lock`;
  ensureDir(lock);

  const deadline = Date.now() + (options.timeoutMs ?? LOCK_TIMEOUT_MS);
  const pollMs = options.pollMs ?? LOCK_POLL_MS;
  let fd: number | null = null;

  while (Date.now() < deadline) {
    try {
      fd = openSync(lock, "wx");
      break;
    } catch {
      await new Promise((resolve) => setTimeout(resolve, pollMs));
    }
  }

  if (fd === null) {
    try {
      const stat = statSync(lock);
      if (Date.now() - stat.mtimeMs > (options.staleMs ?? STALE_LOCK_MS)) {
        unlinkSync(lock);
        fd = openSync(lock, "wx");
      }
    } catch {
      // Another writer won the stale lock; fall through to the timeout error.
    }
  }

  if (fd === null) {
    throw new LockTimeoutError(lock);
  }

  try {
    return await fn();
  } finally {
    try {
      closeSync(fd);
    } catch {
      // Best-effort lock fd cleanup.
    }
    try {
      unlinkSync(lock);
    } catch {
      // Best-effort lock file cleanup.
    }
  }
}

/**
 * Read a JSON state file. Missing or unparseable files yield `fallback()`;
 * `normalize` gets the parsed value and decides what survives.
 */
export function readJsonState<T>(
  path: string,
  fallback: () => T,
  normalize: (raw: unknown) => T | null,
): T {
  if (!existsSync(path)) return fallback();
  try {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return normalize(raw) ?? fallback();
  } catch {
    return fallback();
  }
}

/** Write to a sibling temp file, then rename over the target. Readers never see a partial file. */
export function writeJsonStateAtomic(path: string, value: unknown): void {
  ensureDir(path);
  const tmpPath = `${path}.${process.pid}.${Date.now()}.tmp`;
  writeFileSync(tmpPath, JSON.stringify(value, null, 2) + "\n", "utf-8");
  renameSync(tmpPath, path);
}
