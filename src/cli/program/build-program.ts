import { Command } from "commander";

import { defaultCommandDeps, type CommandDeps } from "../../commands/shared.js";
import { VERSION } from "../../version.js";
import { registerDeployCommand } from "./register.deploy.js";
import { registerValidateGatewayCommand } from "./register.validate-gateway.js";
import { registerValidateStackCommand } from "./register.validate-stack.js";

export function buildProgram(deps: CommandDeps = defaultCommandDeps): Command {
  const program = new Command();

  program
    .name("agentcore-ops")
    .description("Deploy and verify Bedrock AgentCore gateway targets and CDK stacks")
    .version(VERSION)
    .option("--no-color", "Disable colored output")
    .option("--verbose", "Show child-process commands, timings and captured tool output")
    .showHelpAfterError();

  registerDeployCommand(program, deps);
  registerValidateGatewayCommand(program, deps);
  registerValidateStackCommand(program, deps);

  return program;
}
