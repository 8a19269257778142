#!/usr/bin/env node
import { errorMessage } from "./errors";
import { CLI_NAME, createProgram } from "./program";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`[${CLI_NAME}] ${errorMessage(err)}`);
    process.exitCode = 1;
  });
