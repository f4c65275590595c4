#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { exit, exitCodeFor } from "./shared/errors.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${message}\n`);
  exit(exitCodeFor(error));
});
