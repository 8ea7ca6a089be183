import { InvalidArgumentError, type Command } from "commander";
import type { OutputOptions } from "../commands/shared.js";
import type { RuntimeEnv } from "../runtime.js";
import { formatErrorMessage } from "../aws/errors.js";

/**
 * Run a command action, turning its result into the process exit code.
 * Anything thrown out of the action is reported and exits 1.
 */
export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<number>,
): Promise<void> {
  try {
    const code = await action();
    runtime.exit(code);
  } catch (err) {
    runtime.error(`Unexpected error: ${formatErrorMessage(err)}`);
    runtime.exit(1);
  }
}

/** Commander option parser for positive integers. */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

type GlobalOptionValues = {
  color?: boolean;
  verbose?: boolean;
  json?: boolean;
};

/** Output settings from a subcommand plus the program-level flags. */
export function readOutputOptions(command: Command): OutputOptions {
  const opts = command.optsWithGlobals<GlobalOptionValues>();
  return {
    color: opts.color !== false,
    verbose: opts.verbose === true,
    json: opts.json === true,
  };
}
