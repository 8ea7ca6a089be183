/**
 * Child Process Runner
 *
 * Runs external tools (npm, cdk) for the commands:
 * - PATH resolution before spawning
 * - Captured or inherited stdio
 * - Optional timeout (off unless requested)
 * - Failures resolved as results, never thrown
 */

import { spawn } from "node:child_process";
import { which } from "./which.js";
import type { StatusLogger } from "../logging/logger.js";

// =============================================================================
// Types
// =============================================================================

export type CommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** "inherit" streams the tool's output to the terminal; "pipe" captures it. */
  stdio?: "pipe" | "inherit";
  /** Milliseconds before the child is killed; 0 or unset disables the timeout. */
  timeout?: number;
};

export type CommandErrorCode = "CommandNotFound" | "SpawnError" | "CommandTimeout" | "NonZeroExit";

export type CommandError = {
  code: CommandErrorCode;
  message: string;
};

export type CommandResult = {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  command: string;
  error?: CommandError;
};

export interface ProcessRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
  which(command: string, env?: NodeJS.ProcessEnv): Promise<string | null>;
}

export type ProcessRunnerConfig = {
  /** Default timeout for every run; 0 disables it. */
  defaultTimeout?: number;
  logger?: StatusLogger;
};

// =============================================================================
// Runner
// =============================================================================

export class ChildProcessRunner implements ProcessRunner {
  private defaultTimeout: number;
  private logger?: StatusLogger;

  constructor(config: ProcessRunnerConfig = {}) {
    this.defaultTimeout = config.defaultTimeout ?? 0;
    this.logger = config.logger;
  }

  which(command: string, env?: NodeJS.ProcessEnv): Promise<string | null> {
    return which(command, env);
  }

  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const env = options.env ?? process.env;
    const fullCommand = [command, ...args].join(" ");
    const startTime = Date.now();

    const executable = await this.which(command, env);
    if (!executable) {
      return {
        success: false,
        exitCode: 127,
        stdout: "",
        stderr: "",
        duration: Date.now() - startTime,
        command: fullCommand,
        error: { code: "CommandNotFound", message: `${command} not found on PATH` },
      };
    }

    this.logger?.debug(`$ ${fullCommand}${options.cwd ? ` (in ${options.cwd})` : ""}`);
    const result = await this.spawnAndWait(executable, args, options, env, fullCommand, startTime);
    this.logger?.debug(`${command} exited with ${result.exitCode} after ${result.duration}ms`);
    return result;
  }

  private spawnAndWait(
    executable: string,
    args: string[],
    options: CommandOptions,
    env: NodeJS.ProcessEnv,
    fullCommand: string,
    startTime: number,
  ): Promise<CommandResult> {
    return new Promise((resolve) => {
      const timeout = options.timeout ?? this.defaultTimeout;
      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const child = spawn(executable, args, {
        cwd: options.cwd,
        env,
        stdio: options.stdio === "inherit" ? "inherit" : "pipe",
        // .cmd/.bat shims only start through a shell on Windows
        shell: process.platform === "win32" && /\.(cmd|bat)$/i.test(executable),
      });

      const timeoutId =
        timeout > 0
          ? setTimeout(() => {
              timedOut = true;
              child.kill("SIGTERM");
            }, timeout)
          : undefined;

      child.stdout?.on("data", (data: Buffer | string) => {
        stdout += data.toString();
      });

      child.stderr?.on("data", (data: Buffer | string) => {
        stderr += data.toString();
      });

      child.on("close", (code: number | null) => {
        clearTimeout(timeoutId);
        const duration = Date.now() - startTime;

        if (timedOut) {
          resolve({
            success: false,
            exitCode: -1,
            stdout,
            stderr,
            duration,
            command: fullCommand,
            error: { code: "CommandTimeout", message: `Command timed out after ${timeout}ms` },
          });
          return;
        }

        // A null code means the child was killed by a signal.
        const exitCode = code ?? 1;
        resolve({
          success: exitCode === 0,
          exitCode,
          stdout,
          stderr,
          duration,
          command: fullCommand,
          error:
            exitCode === 0
              ? undefined
              : { code: "NonZeroExit", message: `${fullCommand} exited with code ${exitCode}` },
        });
      });

      child.on("error", (error: Error) => {
        clearTimeout(timeoutId);
        resolve({
          success: false,
          exitCode: -1,
          stdout,
          stderr,
          duration: Date.now() - startTime,
          command: fullCommand,
          error: { code: "SpawnError", message: error.message },
        });
      });
    });
  }
}

export function createProcessRunner(config?: ProcessRunnerConfig): ChildProcessRunner {
  return new ChildProcessRunner(config);
}
