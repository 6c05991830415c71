#!/usr/bin/env node
import { EXIT_USAGE, runCli } from "./cli.js";
import { errorMessage } from "./lib/logger.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(`halo failed: ${errorMessage(e)}`);
    process.exitCode = EXIT_USAGE;
  }
);
