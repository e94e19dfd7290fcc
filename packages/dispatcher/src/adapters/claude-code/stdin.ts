/**
 * stdin.ts — read the hook payload
 *
 * Returns the parsed JSON value, or null when stdin is empty or a terminal.
 * Shape checking happens in event.ts.
 */

export async function readStdin(): Promise<unknown> {
  if (process.stdin.isTTY) return null;

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    process.stdin.on("data", (chunk: string | Buffer) => {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    });
    process.stdin.on("end", () => {
      const raw = Buffer.concat(chunks).toString("utf-8").trim();
      if (!raw) {
        resolve(null);
        return;
      }
      try {
        resolve(JSON.parse(raw));
      } catch (err) {
        reject(new Error(`Failed to parse stdin JSON: ${err instanceof Error ? err.message : String(err)}`));
      }
    });
    process.stdin.on("error", reject);
  });
}
