/**
 * Gateway target deployment.
 *
 * `agentcore-ops deploy <environment-file>` loads a `KEY=VALUE` file, checks
 * the variables a target stack needs, resolves the AWS account, then builds
 * and deploys the CDK app in the current directory.
 */

import { describeAwsError } from "../aws/errors.js";
import { profileArgs, type AwsSettings } from "../config/aws-settings.js";
import {
  EnvFileNotFoundError,
  loadEnvFile,
  mergeEnvironment,
  parseDeployEnvironment,
} from "../config/env-file.js";
import { gatewayNameFromIdentifier, targetStackName } from "../config/naming.js";
import type { StatusLogger } from "../logging/logger.js";
import type { CommandResult } from "../process/runner.js";
import {
  createCommandLogger,
  defaultCommandDeps,
  printUsageError,
  type CommandDeps,
  type OutputOptions,
} from "./shared.js";

export type DeployOptions = OutputOptions & {
  envFile?: string;
  /** Directory holding the CDK app; defaults to the working directory. */
  cwd?: string;
};

function reportStepFailure(logger: StatusLogger, headline: string, result: CommandResult): void {
  logger.error(headline);
  // With inherited stdio the tool's own output already explains a non-zero exit.
  if (result.error && result.error.code !== "NonZeroExit") {
    logger.error(result.error.message);
  }
}

export async function deployCommand(
  opts: DeployOptions,
  deps: CommandDeps = defaultCommandDeps,
): Promise<number> {
  const logger = createCommandLogger("deploy", "tag", deps, opts);

  if (!opts.envFile) {
    printUsageError(
      logger,
      "Environment file not provided!",
      "agentcore-ops deploy <environment-file>",
      "agentcore-ops deploy .env.production",
    );
    return 1;
  }

  let fileVariables: Record<string, string>;
  try {
    fileVariables = await loadEnvFile(opts.envFile);
  } catch (err) {
    if (err instanceof EnvFileNotFoundError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }
  logger.info(`Loading environment from: ${opts.envFile}`);

  const env = mergeEnvironment(deps.env, fileVariables);
  const parsed = parseDeployEnvironment(env);
  if (!parsed.ok) {
    for (const name of parsed.missing) {
      logger.error(`Required environment variable not set: ${name}`);
    }
    return 1;
  }
  const config = parsed.config;
  const settings: AwsSettings = { region: config.AWS_REGION, profile: config.AWS_PROFILE };
  const aws = deps.createAwsServices(settings);

  // ===========================================================================
  // Account
  // ===========================================================================

  logger.info("Getting AWS account ID...");
  let accountId: string | undefined;
  try {
    accountId = await aws.identity.getAccountId();
  } catch (err) {
    logger.error(`Failed to get AWS account ID: ${describeAwsError(err)}`);
    return 1;
  }
  if (!accountId) {
    logger.error("Failed to get AWS account ID");
    return 1;
  }

  logger.info(`Account ID: ${accountId}`);
  logger.info(`Gateway: ${config.GATEWAY_IDENTIFIER}`);
  logger.info(`Credential Provider: ${config.CREDENTIAL_PROVIDER_NAME}`);
  logger.info(`Region: ${config.AWS_REGION}`);

  let gatewayName = config.GATEWAY_NAME;
  if (!gatewayName) {
    gatewayName = gatewayNameFromIdentifier(config.GATEWAY_IDENTIFIER);
    logger.info(`Auto-extracted gateway name: ${gatewayName}`);
  }

  const childEnv: NodeJS.ProcessEnv = {
    ...env,
    CDK_DEFAULT_ACCOUNT: accountId,
    GATEWAY_NAME: gatewayName,
  };
  const runner = deps.createRunner(logger);

  // ===========================================================================
  // Build and deploy
  // ===========================================================================

  logger.info("Building project...");
  const build = await runner.run("npm", ["run", "build"], {
    cwd: opts.cwd,
    env: childEnv,
    stdio: "inherit",
  });
  if (!build.success) {
    reportStepFailure(logger, "Build failed!", build);
    return 1;
  }
  logger.info("Build successful!");

  logger.info("Deploying to AWS...");
  const deploy = await runner.run(
    "cdk",
    ["deploy", ...profileArgs(settings), "--require-approval", "never"],
    { cwd: opts.cwd, env: childEnv, stdio: "inherit" },
  );
  if (!deploy.success) {
    reportStepFailure(logger, "Deployment failed!", deploy);
    return 1;
  }

  logger.info("Deployment successful!");
  logger.line();
  logger.info("Deployment Details:");
  logger.line(`  Gateway ID: ${config.GATEWAY_IDENTIFIER}`);
  logger.line(`  Stack Name: ${config.STACK_NAME ?? targetStackName(gatewayName)}`);
  logger.line(`  Region: ${config.AWS_REGION}`);
  logger.line(`  Credential Provider: ${config.CREDENTIAL_PROVIDER_NAME}`);
  logger.line();

  logger.info("Fetching target details...");
  try {
    const targets = await aws.gateways.listTargets(config.GATEWAY_IDENTIFIER);
    logger.line(JSON.stringify({ targets }, null, 2));
  } catch (err) {
    // Advisory only: the deploy itself succeeded.
    logger.warn(`Could not fetch target details: ${describeAwsError(err)}`);
  }

  return 0;
}
