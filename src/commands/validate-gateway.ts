/**
 * Gateway deployment validation
 *
 * `agentcore-ops validate-gateway <gateway-identifier>` runs five checks
 * against a deployed AgentCore gateway:
 * 1. The gateway exists (fatal when it does not)
 * 2. Its targets can be listed
 * 3. Each target's detail and status
 * 4. The gateway service role has policies attached
 * 5. The target CloudFormation stack is healthy (optional)
 */

import type { AwsServices, GatewayDetail, GatewayTargetStatus, GatewayTargetSummary } from "../aws/index.js";
import { describeAwsError, isNotFoundError } from "../aws/errors.js";
import { resolveAwsSettings } from "../config/aws-settings.js";
import { gatewayNameFromIdentifier, roleNameFromArn, targetStackName } from "../config/naming.js";
import type { StatusLogger } from "../logging/logger.js";
import { ValidationReport } from "../report/report.js";
import {
  createCommandLogger,
  defaultCommandDeps,
  printUsageError,
  type CommandDeps,
  type OutputOptions,
} from "./shared.js";

export type ValidateGatewayOptions = OutputOptions & {
  gatewayId?: string;
  /** Overrides the `<prefix>FootballAPITarget` stack name. */
  stackName?: string;
  /** Exit 1 when any check failed, not only when the gateway is missing. */
  strict?: boolean;
};

const HEALTHY_TARGET_STATUS: GatewayTargetStatus = "READY";
const HEALTHY_STACK_STATUSES = new Set(["CREATE_COMPLETE", "UPDATE_COMPLETE"]);

// =============================================================================
// Target table
// =============================================================================

const TABLE_LABEL_WIDTH = 12;
const TABLE_VALUE_WIDTH = 23;

export const TABLE_RULE = `|${"-".repeat(40)}|`;

function fitCell(value: string, width: number): string {
  if (value.length <= width) return value.padEnd(width);
  return `${value.slice(0, width - 3)}...`;
}

/** `| Label        | value                   |`, 42 columns wide. */
export function tableRow(label: string, value: string): string {
  return `| ${fitCell(label, TABLE_LABEL_WIDTH)} | ${fitCell(value, TABLE_VALUE_WIDTH)} |`;
}

// =============================================================================
// Checks
// =============================================================================

type CheckContext = {
  gatewayId: string;
  aws: AwsServices;
  logger: StatusLogger;
  report: ValidationReport;
};

function logReason(logger: StatusLogger, err: unknown): void {
  logger.line(`  Reason: ${describeAwsError(err)}`);
}

async function checkTargets(ctx: CheckContext): Promise<GatewayTargetSummary[] | undefined> {
  const { logger, report } = ctx;
  logger.section("Test 2: Gateway Targets");
  logger.info("Listing targets on gateway...");

  let targets: GatewayTargetSummary[];
  try {
    targets = await ctx.aws.gateways.listTargets(ctx.gatewayId);
  } catch (err) {
    logger.fail("Failed to list targets");
    logReason(logger, err);
    report.fail("gateway-targets", "Gateway Targets", "Failed to list targets", {
      reason: describeAwsError(err),
    });
    return undefined;
  }

  logger.success(`Found ${targets.length} target(s)`);
  report.pass("gateway-targets", "Gateway Targets", `Found ${targets.length} target(s)`, {
    targetIds: targets.map((target) => target.targetId),
  });

  if (targets.length > 0) {
    logger.line();
    logger.line("Target Details:");
    for (const target of targets) {
      logger.line(`  - Target ID: ${target.targetId}`);
      logger.line(`    Status: ${target.status}`);
    }
  }
  return targets;
}

async function checkTargetDetails(ctx: CheckContext, targets: GatewayTargetSummary[]): Promise<void> {
  const { logger, report } = ctx;
  logger.section("Test 3: Target Details");

  for (const { targetId } of targets) {
    const checkId = `target:${targetId}`;
    logger.info(`Checking target: ${targetId}`);

    try {
      const detail = await ctx.aws.gateways.getTarget(ctx.gatewayId, targetId);

      logger.line(TABLE_RULE);
      logger.line(tableRow("Target ID", detail.targetId));
      logger.line(tableRow("Status", detail.status));
      logger.line(tableRow("Gateway ARN", detail.gatewayArn || "-"));
      logger.line(tableRow("Schema URI", detail.schemaUri ?? "-"));
      logger.line(TABLE_RULE);
      for (const arn of detail.credentialProviderArns) {
        logger.debug(`credential provider ${arn}`);
      }

      if (detail.status === HEALTHY_TARGET_STATUS) {
        logger.success("Target is READY");
        report.pass(checkId, "Target Details", `Target ${targetId} is READY`, {
          credentialProviderArns: detail.credentialProviderArns,
        });
      } else {
        logger.warn(`Target status: ${detail.status}`);
        for (const reason of detail.statusReasons) {
          logger.line(`  - ${reason}`);
        }
        report.warn(checkId, "Target Details", `Target ${targetId} status: ${detail.status}`, {
          statusReasons: detail.statusReasons,
          credentialProviderArns: detail.credentialProviderArns,
        });
      }

      if (!detail.name) {
        logger.warn("Target name not set", { mark: "?" });
        report.warn(`target-name:${targetId}`, "Target Details", `Target ${targetId} has no name`);
      }
    } catch (err) {
      logger.fail(`Failed to get target details: ${targetId}`);
      logReason(logger, err);
      report.fail(checkId, "Target Details", `Failed to get target details: ${targetId}`, {
        reason: describeAwsError(err),
      });
    }
    logger.line();
  }
}

async function checkRoleAccess(ctx: CheckContext, gateway: GatewayDetail): Promise<void> {
  const { logger, report } = ctx;
  const title = "Credential Provider Access";
  logger.section("Test 4: Credential Provider Access");
  logger.info("Checking if Gateway service role has credential access...");

  if (!gateway.roleArn) {
    logger.warn("Gateway has no service role");
    report.warn("role-policies", title, "Gateway has no service role");
    return;
  }
  logger.info(`Gateway Role: ${gateway.roleArn}`);

  const roleName = roleNameFromArn(gateway.roleArn);
  if (!roleName) {
    logger.warn(`Could not read a role name from ${gateway.roleArn}`);
    report.warn("role-policies", title, "Unrecognized role ARN", { roleArn: gateway.roleArn });
    return;
  }

  try {
    const policies = await ctx.aws.roles.listRolePolicies(roleName);
    if (policies.attached.length === 0 && policies.inline.length === 0) {
      logger.warn(`Role ${roleName} has no attached or inline policies`);
      report.warn("role-policies", title, `Role ${roleName} has no policies`, { roleName });
      return;
    }

    logger.success("Role has attached policies");
    for (const policy of policies.attached) {
      logger.line(`  - ${policy.policyName}: ${policy.policyArn}`);
    }
    for (const name of policies.inline) {
      logger.line(`  - ${name} (inline)`);
    }
    // Presence only; policy documents are not evaluated.
    logger.success("IAM permissions appear to be configured");
    report.pass("role-policies", title, "IAM permissions appear to be configured", {
      roleName,
      attached: policies.attached.map((policy) => policy.policyArn),
      inline: policies.inline,
    });
  } catch (err) {
    logger.warn("Could not verify role policies");
    logReason(logger, err);
    report.warn("role-policies", title, "Could not verify role policies", {
      roleName,
      reason: describeAwsError(err),
    });
  }
}

async function checkStack(ctx: CheckContext, stackName: string): Promise<void> {
  const { logger, report } = ctx;
  const title = "CloudFormation Stack";
  const notFound = "Stack not found (this is OK if using different naming)";
  logger.section("Test 5: CloudFormation Stack");
  logger.info(`Checking CloudFormation stack: ${stackName}`);

  let status: string | undefined;
  try {
    status = await ctx.aws.stacks.getStackStatus(stackName);
  } catch (err) {
    logger.warn(notFound);
    logger.debug(describeAwsError(err));
    report.info("stack", title, notFound, { stackName, reason: describeAwsError(err) });
    return;
  }

  if (status === undefined) {
    logger.warn(notFound);
    report.info("stack", title, notFound, { stackName });
    return;
  }

  logger.success(`Stack exists with status: ${status}`);
  if (HEALTHY_STACK_STATUSES.has(status)) {
    logger.success("Stack is healthy");
    report.pass("stack", title, `Stack ${stackName} is healthy`, { stackName, status });
  } else {
    logger.warn(`Stack status: ${status}`);
    report.warn("stack", title, `Stack ${stackName} status: ${status}`, { stackName, status });
  }
}

function printSummary(logger: StatusLogger, report: ValidationReport): void {
  logger.section("Summary");
  logger.info(report.summaryLine());
  const failed = report.counts().fail;
  if (failed > 0) {
    logger.warn(`Validation finished with ${failed} failed check(s)`);
  } else {
    logger.success("Validation finished");
  }
}

// =============================================================================
// Command
// =============================================================================

export async function validateGatewayCommand(
  opts: ValidateGatewayOptions,
  deps: CommandDeps = defaultCommandDeps,
): Promise<number> {
  const logger = createCommandLogger("validate-gateway", "tag", deps, opts);
  const emitJson = (report: ValidationReport) => {
    if (opts.json) deps.runtime.log(JSON.stringify(report, null, 2));
  };

  const gatewayId = opts.gatewayId;
  if (!gatewayId) {
    printUsageError(
      logger,
      "Gateway ID not provided!",
      "agentcore-ops validate-gateway <gateway-identifier>",
      "agentcore-ops validate-gateway weather-a1b2c3d4e5",
    );
    return 1;
  }

  logger.info(`Validating gateway: ${gatewayId}`);
  const settings = resolveAwsSettings(deps.env);
  logger.debug(`region ${settings.region}, profile ${settings.profile ?? "(default chain)"}`);

  const report = new ValidationReport(gatewayId);
  const ctx: CheckContext = {
    gatewayId,
    aws: deps.createAwsServices(settings),
    logger,
    report,
  };

  logger.section("Test 1: Gateway Existence");
  logger.info("Checking if gateway exists...");
  let gateway: GatewayDetail;
  try {
    gateway = await ctx.aws.gateways.getGateway(gatewayId);
  } catch (err) {
    logger.fail(`Gateway not found: ${gatewayId}`);
    if (!isNotFoundError(err)) {
      logger.error(describeAwsError(err));
    }
    report.fail("gateway-existence", "Gateway Existence", `Gateway not found: ${gatewayId}`, {
      reason: describeAwsError(err),
    });
    emitJson(report);
    return 1;
  }
  logger.success("Gateway exists");
  logger.debug(`${gateway.gatewayArn} (${gateway.status})`);
  report.pass("gateway-existence", "Gateway Existence", "Gateway exists", {
    gatewayArn: gateway.gatewayArn,
    status: gateway.status,
  });

  const targets = await checkTargets(ctx);
  if (targets && targets.length > 0) {
    await checkTargetDetails(ctx, targets);
  }

  await checkRoleAccess(ctx, gateway);

  const stackName = opts.stackName ?? targetStackName(gatewayNameFromIdentifier(gatewayId));
  await checkStack(ctx, stackName);

  printSummary(logger, report);
  emitJson(report);

  return opts.strict && report.hasFailures() ? 1 : 0;
}
