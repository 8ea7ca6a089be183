#!/usr/bin/env node
import { formatErrorMessage } from "./aws/errors.js";
import { buildProgram } from "./cli/program/build-program.js";
import { defaultRuntime } from "./runtime.js";

try {
  await buildProgram().parseAsync(process.argv);
} catch (err) {
  defaultRuntime.error(formatErrorMessage(err));
  defaultRuntime.exit(1);
}
