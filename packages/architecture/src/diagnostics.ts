/**
 * diagnostics.ts — side-channel logging
 *
 * Everything here goes to stderr so it never mixes with hook protocol output
 * on stdout. Diagnostics must never throw.
 */

export interface Diagnostics {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function debugEnabled(): boolean {
  return process.env.BUILDWARDEN_DEBUG === "1";
}

export function createDiagnostics(tag: string): Diagnostics {
  const prefix = `[${tag}]`;
  const write = (line: string) => {
    try {
      console.error(line);
    } catch {
      // stderr closed; nothing left to report to.
    }
  };

  return {
    debug(message) {
      if (debugEnabled()) write(`${prefix} ${message}`);
    },
    info(message) {
      write(`${prefix} ${message}`);
    },
    warn(message) {
      write(`${prefix} warning: ${message}`);
    },
    error(message, err) {
      write(err === undefined ? `${prefix} ${message}` : `${prefix} ${message}: ${describeError(err)}`);
    },
  };
}
