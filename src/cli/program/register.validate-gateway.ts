import type { Command } from "commander";

import type { CommandDeps } from "../../commands/shared.js";
import { validateGatewayCommand } from "../../commands/validate-gateway.js";
import { readOutputOptions, runCommandWithRuntime } from "../cli-utils.js";

export function registerValidateGatewayCommand(program: Command, deps: CommandDeps) {
  program
    .command("validate-gateway")
    .alias("validate-deployment")
    .description("Check a deployed AgentCore gateway, its targets, role and stack")
    .argument("[gateway-identifier]", "Gateway identifier, e.g. weather-a1b2c3d4e5")
    .option("--stack-name <name>", "Target stack to check (default: <prefix>FootballAPITarget)")
    .option("--strict", "Exit 1 when any check fails")
    .option("--json", "Print the check results as JSON")
    .action(
      async (
        gatewayId: string | undefined,
        opts: { stackName?: string; strict?: boolean },
        command: Command,
      ) => {
        await runCommandWithRuntime(deps.runtime, () =>
          validateGatewayCommand(
            {
              ...readOutputOptions(command),
              gatewayId,
              stackName: opts.stackName,
              strict: Boolean(opts.strict),
            },
            deps,
          ),
        );
      },
    );
}
