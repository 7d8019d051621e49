#!/usr/bin/env node
import { errorMessage } from "./core/errors";
import { runCli } from "./cli";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(`fatal: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
