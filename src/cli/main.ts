#!/usr/bin/env node
import { formatErrorMessage } from "../errors.js";
import { buildProgram } from "./program.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`orchestrate: ${formatErrorMessage(err)}`);
    process.exit(2);
  });
