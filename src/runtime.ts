/**
 * Process seam for commands.
 *
 * Commands write through a RuntimeEnv instead of touching console/process
 * directly, so tests can capture output and exit codes.
 */

export type RuntimeEnv = {
  log: (message: string) => void;
  error: (message: string) => void;
  exit: (code: number) => void;
  /** Whether stdout is attached to a terminal. */
  isTTY: boolean;
};

export const defaultRuntime: RuntimeEnv = {
  log: (message) => {
    console.log(message);
  },
  error: (message) => {
    console.error(message);
  },
  exit: (code) => {
    // Let pending stdout writes drain instead of calling process.exit().
    process.exitCode = code;
  },
  isTTY: process.stdout.isTTY ?? false,
};
