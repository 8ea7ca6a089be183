import type { Command } from "commander";

import type { CommandDeps } from "../../commands/shared.js";
import { validateStackCommand } from "../../commands/validate-stack.js";
import { DEFAULT_MAX_RESOURCES, DEFAULT_MAX_TEMPLATE_BYTES } from "../../stack/templates.js";
import { parsePositiveInt, readOutputOptions, runCommandWithRuntime } from "../cli-utils.js";

type ValidateStackFlags = {
  sourceDir: string;
  outputDir: string;
  maxTemplateBytes: number;
  maxResources: number;
};

export function registerValidateStackCommand(program: Command, deps: CommandDeps) {
  program
    .command("validate-stack")
    .description("Synthesize a CDK app and check it for common issues before deploying")
    .argument("[project-dir]", "Directory containing the CDK app's package.json")
    .option("--source-dir <dir>", "Source directory to scan, relative to the project", "lib")
    .option("--output-dir <dir>", "CDK output directory, relative to the project", "cdk.out")
    .option(
      "--max-template-bytes <bytes>",
      "Warn above this template size",
      parsePositiveInt,
      DEFAULT_MAX_TEMPLATE_BYTES,
    )
    .option("--max-resources <count>", "Warn above this many resources", parsePositiveInt, DEFAULT_MAX_RESOURCES)
    .option("--json", "Print the check results as JSON")
    .action(async (projectDir: string | undefined, opts: ValidateStackFlags, command: Command) => {
      await runCommandWithRuntime(deps.runtime, () =>
        validateStackCommand(
          {
            ...readOutputOptions(command),
            projectDir,
            sourceDir: opts.sourceDir,
            outputDir: opts.outputDir,
            maxTemplateBytes: opts.maxTemplateBytes,
            maxResources: opts.maxResources,
          },
          deps,
        ),
      );
    });
}
