/**
 * CDK stack validation.
 *
 * `agentcore-ops validate-stack <project-dir>` synthesizes a CDK app, scans its
 * sources for common anti-patterns and checks the synthesized templates
 * against CloudFormation size and resource limits. Only a missing tool,
 * missing package.json, failed synthesis or missing templates fail the run.
 */

import { stat } from "node:fs/promises";
import path from "node:path";
import { extractErrorCode } from "../aws/errors.js";
import type { StatusLogger } from "../logging/logger.js";
import { ValidationReport } from "../report/report.js";
import { scanForAntiPatterns } from "../stack/anti-patterns.js";
import {
  DEFAULT_MAX_RESOURCES,
  DEFAULT_MAX_TEMPLATE_BYTES,
  findTemplates,
  inspectTemplate,
} from "../stack/templates.js";
import {
  createCommandLogger,
  defaultCommandDeps,
  printUsageError,
  type CommandDeps,
  type OutputOptions,
} from "./shared.js";

export type ValidateStackOptions = OutputOptions & {
  projectDir?: string;
  /** Directory scanned for anti-patterns, relative to the project. */
  sourceDir?: string;
  /** CDK output directory, relative to the project. */
  outputDir?: string;
  maxTemplateBytes?: number;
  maxResources?: number;
};

const BANNER_RULE = "============================";

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (err) {
    if (extractErrorCode(err) === "ENOENT") return false;
    throw err;
  }
}

function printCapturedOutput(logger: StatusLogger, output: string): void {
  if (!logger.isLevelEnabled("debug")) return;
  for (const line of output.split(/\r?\n/)) {
    if (line.trim()) logger.debug(line);
  }
}

export async function validateStackCommand(
  opts: ValidateStackOptions,
  deps: CommandDeps = defaultCommandDeps,
): Promise<number> {
  const logger = createCommandLogger("validate-stack", "symbol", deps, opts);
  const sourceDir = opts.sourceDir ?? "lib";
  const outputDir = opts.outputDir ?? "cdk.out";
  const maxTemplateBytes = opts.maxTemplateBytes ?? DEFAULT_MAX_TEMPLATE_BYTES;
  const maxResources = opts.maxResources ?? DEFAULT_MAX_RESOURCES;

  if (!opts.projectDir) {
    printUsageError(
      logger,
      "Project directory not provided!",
      "agentcore-ops validate-stack <project-dir>",
      "agentcore-ops validate-stack ./infra",
    );
    return 1;
  }
  const projectDir = path.resolve(opts.projectDir);
  const report = new ValidationReport(projectDir);
  const fatal = (id: string, message: string): number => {
    report.fail(id, "Stack Validation", message);
    if (opts.json) deps.runtime.log(JSON.stringify(report, null, 2));
    return 1;
  };

  logger.line("🔍 AWS CDK Stack Validation");
  logger.line(BANNER_RULE);
  logger.line();

  // ===========================================================================
  // Prerequisites
  // ===========================================================================

  const runner = deps.createRunner(logger);
  const cdkPath = await runner.which("cdk", deps.env);
  if (!cdkPath) {
    logger.error("AWS CDK CLI not found. Install with: npm install -g aws-cdk");
    return fatal("cdk-cli", "AWS CDK CLI not found");
  }
  logger.success("AWS CDK CLI found");
  logger.debug(cdkPath);

  if (!(await isFile(path.join(projectDir, "package.json")))) {
    logger.error("package.json not found in project root");
    return fatal("package-json", "package.json not found in project root");
  }
  logger.success("package.json found");

  // ===========================================================================
  // Synthesis
  // ===========================================================================

  logger.line();
  logger.info("Running CDK synthesis...");
  const synth = await runner.run("cdk", ["synth", "--quiet"], {
    cwd: projectDir,
    env: deps.env,
    stdio: "pipe",
  });
  if (!synth.success) {
    logger.error("CDK synthesis failed");
    printCapturedOutput(logger, synth.stderr);
    logger.line();
    logger.line("Run 'cdk synth' for detailed error information");
    return fatal("synth", "CDK synthesis failed");
  }
  logger.success("CDK synthesis successful");
  report.pass("synth", "CDK Synthesis", "CDK synthesis successful");

  // ===========================================================================
  // Source checks
  // ===========================================================================

  logger.line();
  logger.info("Checking for common issues...");
  for (const finding of await scanForAntiPatterns(projectDir, sourceDir)) {
    const [headline, advice] = finding.rule.warnings(finding.matches.length);
    logger.warn(headline);
    logger.warn(advice);
    for (const match of finding.matches) {
      logger.debug(`${match.file}:${match.line}: ${match.text}`);
    }
    report.warn(`anti-pattern:${finding.rule.id}`, "Common Issues", headline, {
      advice,
      matches: finding.matches,
    });
  }
  logger.success("Common issue checks completed");

  // ===========================================================================
  // Templates
  // ===========================================================================

  logger.line();
  logger.info("Checking synthesized templates...");
  const templates = await findTemplates(path.resolve(projectDir, outputDir));
  if (templates.length === 0) {
    logger.error(`No CloudFormation templates found in ${outputDir}/`);
    return fatal("templates", `No CloudFormation templates found in ${outputDir}/`);
  }
  logger.success(`Found ${templates.length} CloudFormation template(s)`);

  for (const templatePath of templates) {
    const template = await inspectTemplate(templatePath);
    const checkId = `template:${template.stackName}`;
    const details = { sizeBytes: template.sizeBytes, resourceCount: template.resourceCount };
    let healthy = true;

    if (template.sizeBytes > maxTemplateBytes) {
      healthy = false;
      logger.warn(`${template.stackName}: Template size (${template.sizeBytes} bytes) is large`);
      logger.warn("Consider using nested stacks to reduce size");
      report.warn(`${checkId}:size`, "Template Size", `Template size (${template.sizeBytes} bytes) is large`, details);
    }

    if (template.resourceCount > maxResources) {
      healthy = false;
      logger.warn(`${template.stackName}: High resource count (${template.resourceCount})`);
      logger.warn("Consider splitting into multiple stacks");
      report.warn(`${checkId}:resources`, "Resource Count", `High resource count (${template.resourceCount})`, details);
    } else {
      logger.success(`${template.stackName}: ${template.resourceCount} resources`);
    }

    if (healthy) {
      report.pass(checkId, "Template", `${template.resourceCount} resources`, details);
    }
  }

  logger.line();
  logger.line(BANNER_RULE);
  logger.success("Validation passed");
  logger.line();
  logger.info("Stack is ready for deployment");

  if (opts.json) deps.runtime.log(JSON.stringify(report, null, 2));
  return 0;
}
