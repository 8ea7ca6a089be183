import type { Command } from "commander";

import { deployCommand } from "../../commands/deploy.js";
import type { CommandDeps } from "../../commands/shared.js";
import { readOutputOptions, runCommandWithRuntime } from "../cli-utils.js";

export function registerDeployCommand(program: Command, deps: CommandDeps) {
  program
    .command("deploy")
    .description("Build and deploy a gateway target stack from an environment file")
    .argument("[environment-file]", "KEY=VALUE file with GATEWAY_IDENTIFIER, CREDENTIAL_PROVIDER_NAME and AWS_REGION")
    .option("--cwd <dir>", "Directory of the CDK app (default: current directory)")
    .addHelpText(
      "after",
      "\nOptional variables: AWS_PROFILE, GATEWAY_NAME, STACK_NAME\n",
    )
    .action(async (envFile: string | undefined, opts: { cwd?: string }, command: Command) => {
      await runCommandWithRuntime(deps.runtime, () =>
        deployCommand({ ...readOutputOptions(command), envFile, cwd: opts.cwd }, deps),
      );
    });
}
