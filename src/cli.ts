#!/usr/bin/env node
// src/cli.ts
import { buildProgram } from "./cli-program.js";
import { errorMessage } from "./errors.js";

const program = buildProgram();

// Default help when no subcommand given
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`ERROR ${errorMessage(err)}\n`);
  process.exitCode = 1;
});
