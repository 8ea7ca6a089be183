/**
 * Collaborators and output settings shared by the commands.
 */

import { createAwsServices, type AwsServicesFactory } from "../aws/index.js";
import {
  createStatusLogger,
  resolveColorSupport,
  type StatusLogger,
  type StatusStyle,
  type StatusThreshold,
} from "../logging/logger.js";
import { createProcessRunner, type ProcessRunner } from "../process/runner.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

export type CommandDeps = {
  runtime: RuntimeEnv;
  env: NodeJS.ProcessEnv;
  createAwsServices: AwsServicesFactory;
  createRunner: (logger: StatusLogger) => ProcessRunner;
};

export type OutputOptions = {
  /** false when --no-color was given. */
  color?: boolean;
  verbose?: boolean;
  /** Machine-readable output on stdout; only errors are logged. */
  json?: boolean;
};

export const defaultCommandDeps: CommandDeps = {
  runtime: defaultRuntime,
  env: process.env,
  createAwsServices,
  createRunner: (logger) => createProcessRunner({ logger: logger.child("exec") }),
};

export function resolveLogLevel(options: OutputOptions): StatusThreshold {
  if (options.json) return "error";
  return options.verbose ? "debug" : "info";
}

export function createCommandLogger(
  subsystem: string,
  style: StatusStyle,
  deps: CommandDeps,
  options: OutputOptions,
): StatusLogger {
  return createStatusLogger({
    subsystem,
    runtime: deps.runtime,
    style,
    colors: resolveColorSupport({ flag: options.color, env: deps.env, isTTY: deps.runtime.isTTY }),
    level: resolveLogLevel(options),
  });
}

/** Error line plus the usage and example lines for a missing positional argument. */
export function printUsageError(
  logger: StatusLogger,
  message: string,
  usage: string,
  example: string,
): void {
  logger.error(message);
  logger.line(`Usage: ${usage}`);
  logger.line(`Example: ${example}`);
}
