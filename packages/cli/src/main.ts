/**
 * main.ts — buildwarden executable entry
 */

import { describeError } from "@buildwarden/architecture";
import { createDispatchRuntime } from "@buildwarden/dispatcher";
import { USAGE, UsageError, parseCli } from "./args.js";
import { EXIT_ERROR, executeCommand, type CliIO } from "./commands.js";

const processIO: CliIO = {
  out: (text) => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`),
  err: (text) => process.stderr.write(text.endsWith("\n") ? text : `${text}\n`),
  tee: {
    stdout: (chunk) => process.stdout.write(chunk),
    stderr: (chunk) => process.stderr.write(chunk),
  },
};

async function main(): Promise<number> {
  const command = parseCli(process.argv.slice(2));
  return executeCommand(command, { createRuntime: createDispatchRuntime, io: processIO });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err instanceof UsageError) {
      process.stderr.write(`buildwarden: ${err.message}\n\n${USAGE}\n`);
    } else {
      process.stderr.write(`[buildwarden] error: ${describeError(err)}\n`);
    }
    process.exitCode = EXIT_ERROR;
  });
