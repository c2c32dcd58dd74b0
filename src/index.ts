#!/usr/bin/env node

import { runCli } from "./cli/index.js";
import { ExitCode } from "./shared/errors.js";

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exitCode = ExitCode.Unexpected;
  });
