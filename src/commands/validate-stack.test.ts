/**
 * Stack Validation Command Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { validateStackCommand } from "./validate-stack.js";
import { commandResult, createCommandHarness } from "../testing/command-harness.js";

const TEMPLATE = JSON.stringify({
  Resources: {
    AssetsBucket: { Type: "AWS::S3::Bucket" },
    Handler: { Type: "AWS::Lambda::Function" },
  },
});

describe("validateStackCommand", () => {
  let projectDir: string;

  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), "agentcore-ops-stack-"));
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  async function arrangeProject(options: { template?: string; source?: string } = {}): Promise<void> {
    await writeFile(join(projectDir, "package.json"), JSON.stringify({ name: "weather-infra" }));
    await mkdir(join(projectDir, "lib"), { recursive: true });
    await writeFile(join(projectDir, "lib", "weather-stack.ts"), options.source ?? "new s3.Bucket(this, 'Assets');\n");
    await mkdir(join(projectDir, "cdk.out"), { recursive: true });
    if (options.template !== undefined) {
      await writeFile(join(projectDir, "cdk.out", "WeatherStack.template.json"), options.template);
    }
  }

  function harnessWithCdk() {
    const harness = createCommandHarness();
    harness.runner.which.mockResolvedValue("/usr/local/bin/cdk");
    harness.runner.run.mockResolvedValue(commandResult());
    return harness;
  }

  it("should print usage when no project directory is given", async () => {
    const { deps, runtime } = harnessWithCdk();

    expect(await validateStackCommand({}, deps)).toBe(1);

    expect(runtime.stderr).toEqual(["✗ Project directory not provided!"]);
    expect(runtime.stdout).toEqual([
      "Usage: agentcore-ops validate-stack <project-dir>",
      "Example: agentcore-ops validate-stack ./infra",
    ]);
  });

  it("should fail when cdk is not installed", async () => {
    await arrangeProject({ template: TEMPLATE });
    const { deps, runtime, runner } = harnessWithCdk();
    runner.which.mockResolvedValue(null);

    expect(await validateStackCommand({ projectDir }, deps)).toBe(1);

    expect(runtime.stderr).toEqual(["✗ AWS CDK CLI not found. Install with: npm install -g aws-cdk"]);
    expect(runner.run).not.toHaveBeenCalled();
  });

  it("should fail without package.json", async () => {
    const { deps, runtime } = harnessWithCdk();

    expect(await validateStackCommand({ projectDir }, deps)).toBe(1);
    expect(runtime.stderr).toEqual(["✗ package.json not found in project root"]);
  });

  it("should fail when synthesis fails", async () => {
    await arrangeProject({ template: TEMPLATE });
    const { deps, runtime, runner } = harnessWithCdk();
    runner.run.mockResolvedValue(
      commandResult({
        success: false,
        exitCode: 1,
        stderr: "Error: Cannot find module './lib/weather-stack'\n",
        error: { code: "NonZeroExit", message: "cdk synth --quiet exited with code 1" },
      }),
    );

    expect(await validateStackCommand({ projectDir }, deps)).toBe(1);

    expect(runtime.stderr).toEqual(["✗ CDK synthesis failed"]);
    expect(runtime.stdout.slice(-2)).toEqual(["", "Run 'cdk synth' for detailed error information"]);
  });

  it("should show captured synthesis errors with --verbose", async () => {
    await arrangeProject({ template: TEMPLATE });
    const { deps, runtime, runner } = harnessWithCdk();
    runner.run.mockResolvedValue(
      commandResult({ success: false, exitCode: 1, stderr: "Error: Cannot find module './lib/weather-stack'\n" }),
    );

    await validateStackCommand({ projectDir, verbose: true }, deps);

    expect(runtime.stdout).toContain("· [validate-stack] Error: Cannot find module './lib/weather-stack'");
  });

  it("should pass with warnings for a synthesizable project", async () => {
    await arrangeProject({ template: TEMPLATE, source: "new s3.Bucket(this, 'Assets', { bucketName: 'assets' });\n" });
    const { deps, runtime, runner } = harnessWithCdk();

    expect(await validateStackCommand({ projectDir }, deps)).toBe(0);

    expect(runner.run).toHaveBeenCalledWith("cdk", ["synth", "--quiet"], {
      cwd: projectDir,
      env: deps.env,
      stdio: "pipe",
    });
    expect(runtime.stderr).toEqual([]);
    expect(runtime.stdout).toEqual([
      "🔍 AWS CDK Stack Validation",
      "============================",
      "",
      "✓ AWS CDK CLI found",
      "✓ package.json found",
      "",
      "ℹ Running CDK synthesis...",
      "✓ CDK synthesis successful",
      "",
      "ℹ Checking for common issues...",
      "⚠ Found potential hardcoded S3 bucket names (bucketName:)",
      "⚠ Consider letting CDK generate names automatically",
      "✓ Common issue checks completed",
      "",
      "ℹ Checking synthesized templates...",
      "✓ Found 1 CloudFormation template(s)",
      "✓ WeatherStack: 2 resources",
      "",
      "============================",
      "✓ Validation passed",
      "",
      "ℹ Stack is ready for deployment",
    ]);
  });

  it("should list matches with --verbose", async () => {
    await arrangeProject({ template: TEMPLATE, source: "const t = { tableName: 'forecasts' };\n" });
    const { deps, runtime } = harnessWithCdk();

    await validateStackCommand({ projectDir, verbose: true }, deps);

    expect(runtime.stdout).toContain("· [validate-stack] lib/weather-stack.ts:1: const t = { tableName: 'forecasts' };");
  });

  it("should fail when no templates were synthesized", async () => {
    await arrangeProject();
    const { deps, runtime } = harnessWithCdk();

    expect(await validateStackCommand({ projectDir }, deps)).toBe(1);
    expect(runtime.stderr).toEqual(["✗ No CloudFormation templates found in cdk.out/"]);
  });

  it("should warn about large templates without failing", async () => {
    await arrangeProject({ template: TEMPLATE });
    const { deps, runtime } = harnessWithCdk();

    expect(await validateStackCommand({ projectDir, maxTemplateBytes: 10, maxResources: 1 }, deps)).toBe(0);

    const size = Buffer.byteLength(TEMPLATE);
    const start = runtime.stdout.indexOf("✓ Found 1 CloudFormation template(s)");
    expect(runtime.stdout.slice(start + 1, start + 5)).toEqual([
      `⚠ WeatherStack: Template size (${size} bytes) is large`,
      "⚠ Consider using nested stacks to reduce size",
      "⚠ WeatherStack: High resource count (2)",
      "⚠ Consider splitting into multiple stacks",
    ]);
  });

  it("should count an unparseable template as empty", async () => {
    await arrangeProject({ template: "{ truncated" });
    const { deps, runtime } = harnessWithCdk();

    expect(await validateStackCommand({ projectDir }, deps)).toBe(0);
    expect(runtime.stdout).toContain("✓ WeatherStack: 0 resources");
  });

  it("should give the same result when run twice on an unchanged project", async () => {
    await writeFile(join(projectDir, "package.json"), JSON.stringify({ name: "weather-infra" }));
    await mkdir(join(projectDir, "lib", "nested"), { recursive: true });
    await mkdir(join(projectDir, "cdk.out", "assembly-Prod"), { recursive: true });
    const source = "const props = { tableName: 'forecasts' };\n";
    for (const file of ["zeta.ts", "alpha.ts", join("nested", "beta.ts")]) {
      await writeFile(join(projectDir, "lib", file), source);
    }
    await writeFile(join(projectDir, "cdk.out", "assembly-Prod", "AlphaStack.template.json"), TEMPLATE);
    await writeFile(join(projectDir, "cdk.out", "BetaStack.template.json"), TEMPLATE);

    const first = harnessWithCdk();
    const second = harnessWithCdk();
    const firstCode = await validateStackCommand({ projectDir, verbose: true }, first.deps);
    const secondCode = await validateStackCommand({ projectDir, verbose: true }, second.deps);

    expect(firstCode).toBe(0);
    expect(secondCode).toBe(firstCode);
    expect(second.runtime.stdout).toEqual(first.runtime.stdout);
    expect(second.runtime.stderr).toEqual(first.runtime.stderr);

    expect(first.runtime.stdout.filter((line) => line.startsWith("· [validate-stack] lib/"))).toEqual([
      "· [validate-stack] lib/alpha.ts:1: const props = { tableName: 'forecasts' };",
      "· [validate-stack] lib/nested/beta.ts:1: const props = { tableName: 'forecasts' };",
      "· [validate-stack] lib/zeta.ts:1: const props = { tableName: 'forecasts' };",
    ]);
    expect(first.runtime.stdout.filter((line) => line.endsWith(" resources"))).toEqual([
      "✓ BetaStack: 2 resources",
      "✓ AlphaStack: 2 resources",
    ]);
  });

  it("should print the JSON report with --json", async () => {
    await arrangeProject({ template: TEMPLATE, source: "actions: ['*'],\n" });
    const { deps, runtime } = harnessWithCdk();

    expect(await validateStackCommand({ projectDir, json: true }, deps)).toBe(0);

    expect(runtime.stdout).toHaveLength(1);
    const report = JSON.parse(runtime.stdout[0] ?? "");
    expect(report.counts).toEqual({ pass: 2, warn: 1, fail: 0, info: 0 });
    expect(report.checks[1].id).toBe("anti-pattern:wildcard-actions");
    expect(report.checks[1].details.matches).toEqual([
      { file: "lib/weather-stack.ts", line: 1, text: "actions: ['*']," },
    ]);
  });
});
