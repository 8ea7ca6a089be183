/**
 * Gateway Validation Command Tests
 */

import { describe, it, expect } from "vitest";
import { TABLE_RULE, tableRow, validateGatewayCommand } from "./validate-gateway.js";
import { createCommandHarness, createFakeAwsServices } from "../testing/command-harness.js";

const GATEWAY_ID = "weather-a1b2c3d4e5";
const GATEWAY_ARN = "arn:aws:bedrock-agentcore:us-west-2:123456789012:gateway/weather-a1b2c3d4e5";
const ROLE_ARN = "arn:aws:iam::123456789012:role/service-role/WeatherGatewayRole";

function sdkError(name: string, message: string): Error {
  const err = new Error(message);
  err.name = name;
  return err;
}

function arrangeHealthyGateway(aws: ReturnType<typeof createFakeAwsServices>): void {
  aws.gateways.getGateway.mockResolvedValue({
    gatewayId: GATEWAY_ID,
    gatewayArn: GATEWAY_ARN,
    name: "weather",
    status: "READY",
    roleArn: ROLE_ARN,
  });
  aws.gateways.listTargets.mockResolvedValue([{ targetId: "TGT1", name: "forecast", status: "READY" }]);
  aws.gateways.getTarget.mockResolvedValue({
    targetId: "TGT1",
    name: "forecast",
    status: "READY",
    statusReasons: [],
    gatewayArn: GATEWAY_ARN,
    schemaUri: "s3://weather-schemas/openapi.json",
    credentialProviderArns: [],
  });
  aws.roles.listRolePolicies.mockResolvedValue({
    attached: [{ policyName: "GatewayInvoke", policyArn: "arn:aws:iam::123456789012:policy/GatewayInvoke" }],
    inline: ["token-vault-access"],
  });
  aws.stacks.getStackStatus.mockResolvedValue("UPDATE_COMPLETE");
}

describe("tableRow", () => {
  it("should pad short values to a 42 column row", () => {
    const row = tableRow("Target ID", "TGT1");
    expect(row).toBe("| Target ID    | TGT1                    |");
    expect(row).toHaveLength(TABLE_RULE.length);
  });

  it("should truncate long values with an ellipsis", () => {
    expect(tableRow("Gateway ARN", GATEWAY_ARN)).toBe("| Gateway ARN  | arn:aws:bedrock-agen... |");
  });
});

describe("validateGatewayCommand", () => {
  it("should print usage when no gateway is given", async () => {
    const { deps, runtime, createAwsServices } = createCommandHarness();

    expect(await validateGatewayCommand({}, deps)).toBe(1);

    expect(runtime.stderr).toEqual(["[ERROR] Gateway ID not provided!"]);
    expect(runtime.stdout).toEqual([
      "Usage: agentcore-ops validate-gateway <gateway-identifier>",
      "Example: agentcore-ops validate-gateway weather-a1b2c3d4e5",
    ]);
    expect(createAwsServices).not.toHaveBeenCalled();
  });

  it("should exit 1 when the gateway does not exist", async () => {
    const { deps, runtime, aws } = createCommandHarness();
    aws.gateways.getGateway.mockRejectedValue(sdkError("ResourceNotFoundException", "Gateway not found"));

    expect(await validateGatewayCommand({ gatewayId: "missing-0000000000" }, deps)).toBe(1);

    expect(runtime.stderr).toEqual(["[ERROR] ✗ Gateway not found: missing-0000000000"]);
    expect(aws.gateways.listTargets).not.toHaveBeenCalled();
  });

  it("should add the reason for other lookup errors", async () => {
    const { deps, runtime, aws } = createCommandHarness();
    aws.gateways.getGateway.mockRejectedValue(sdkError("AccessDeniedException", "User is not authorized"));

    expect(await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps)).toBe(1);

    expect(runtime.stderr).toEqual([
      `[ERROR] ✗ Gateway not found: ${GATEWAY_ID}`,
      "[ERROR] AccessDeniedException: User is not authorized",
    ]);
  });

  it("should report every check for a healthy gateway", async () => {
    const { deps, runtime, aws, createAwsServices } = createCommandHarness({ AWS_PROFILE: "dev" });
    arrangeHealthyGateway(aws);

    expect(await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps)).toBe(0);

    expect(createAwsServices).toHaveBeenCalledWith({ region: "us-west-2", profile: "dev" });
    expect(aws.roles.listRolePolicies).toHaveBeenCalledWith("WeatherGatewayRole");
    expect(runtime.stderr).toEqual([]);
    expect(runtime.stdout).toEqual([
      `[INFO] Validating gateway: ${GATEWAY_ID}`,
      "",
      "==== Test 1: Gateway Existence ====",
      "[INFO] Checking if gateway exists...",
      "[INFO] ✓ Gateway exists",
      "",
      "==== Test 2: Gateway Targets ====",
      "[INFO] Listing targets on gateway...",
      "[INFO] ✓ Found 1 target(s)",
      "",
      "Target Details:",
      "  - Target ID: TGT1",
      "    Status: READY",
      "",
      "==== Test 3: Target Details ====",
      "[INFO] Checking target: TGT1",
      "|----------------------------------------|",
      "| Target ID    | TGT1                    |",
      "| Status       | READY                   |",
      "| Gateway ARN  | arn:aws:bedrock-agen... |",
      "| Schema URI   | s3://weather-schemas... |",
      "|----------------------------------------|",
      "[INFO] ✓ Target is READY",
      "",
      "",
      "==== Test 4: Credential Provider Access ====",
      "[INFO] Checking if Gateway service role has credential access...",
      `[INFO] Gateway Role: ${ROLE_ARN}`,
      "[INFO] ✓ Role has attached policies",
      "  - GatewayInvoke: arn:aws:iam::123456789012:policy/GatewayInvoke",
      "  - token-vault-access (inline)",
      "[INFO] ✓ IAM permissions appear to be configured",
      "",
      "==== Test 5: CloudFormation Stack ====",
      "[INFO] Checking CloudFormation stack: weatherFootballAPITarget",
      "[INFO] ✓ Stack exists with status: UPDATE_COMPLETE",
      "[INFO] ✓ Stack is healthy",
      "",
      "==== Summary ====",
      "[INFO] 5 passed, 0 warning(s), 0 failed",
      "[INFO] ✓ Validation finished",
    ]);
  });

  it("should use the region from the environment", async () => {
    const { deps, aws, createAwsServices } = createCommandHarness({ AWS_REGION: "eu-central-1" });
    arrangeHealthyGateway(aws);

    await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps);

    expect(createAwsServices).toHaveBeenCalledWith({ region: "eu-central-1", profile: undefined });
  });

  describe("non-fatal failures", () => {
    it("should skip target details when listing fails", async () => {
      const { deps, runtime, aws } = createCommandHarness();
      arrangeHealthyGateway(aws);
      aws.gateways.listTargets.mockRejectedValue(sdkError("ThrottlingException", "Rate exceeded"));

      expect(await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps)).toBe(0);

      expect(runtime.stderr).toEqual(["[ERROR] ✗ Failed to list targets"]);
      expect(runtime.stdout).toContain("  Reason: ThrottlingException: Rate exceeded");
      expect(runtime.stdout).not.toContain("==== Test 3: Target Details ====");
      expect(aws.gateways.getTarget).not.toHaveBeenCalled();
      expect(aws.stacks.getStackStatus).toHaveBeenCalled();
      expect(runtime.stdout).toContain("[WARN] ⚠ Validation finished with 1 failed check(s)");
    });

    it("should exit 1 on failed checks in strict mode", async () => {
      const { deps, aws } = createCommandHarness();
      arrangeHealthyGateway(aws);
      aws.gateways.listTargets.mockRejectedValue(sdkError("ThrottlingException", "Rate exceeded"));

      expect(await validateGatewayCommand({ gatewayId: GATEWAY_ID, strict: true }, deps)).toBe(1);
    });

    it("should keep going when a target lookup fails", async () => {
      const { deps, runtime, aws } = createCommandHarness();
      arrangeHealthyGateway(aws);
      aws.gateways.getTarget.mockRejectedValue(sdkError("ThrottlingException", "Rate exceeded"));

      expect(await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps)).toBe(0);

      expect(runtime.stderr).toEqual(["[ERROR] ✗ Failed to get target details: TGT1"]);
      expect(aws.roles.listRolePolicies).toHaveBeenCalled();
    });

    it("should warn about unhealthy and unnamed targets", async () => {
      const { deps, runtime, aws } = createCommandHarness();
      arrangeHealthyGateway(aws);
      aws.gateways.getTarget.mockResolvedValue({
        targetId: "TGT1",
        status: "FAILED",
        statusReasons: ["Schema could not be parsed"],
        gatewayArn: GATEWAY_ARN,
        credentialProviderArns: [],
      });

      await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps);

      const start = runtime.stdout.indexOf("| Schema URI   | -                       |");
      expect(start).toBeGreaterThan(0);
      expect(runtime.stdout.slice(start + 1, start + 5)).toEqual([
        "|----------------------------------------|",
        "[WARN] ⚠ Target status: FAILED",
        "  - Schema could not be parsed",
        "[WARN] ? Target name not set",
      ]);
      expect(runtime.stdout).toContain("[INFO] 4 passed, 2 warning(s), 0 failed");
    });

    it("should warn when role policies cannot be read", async () => {
      const { deps, runtime, aws } = createCommandHarness();
      arrangeHealthyGateway(aws);
      aws.roles.listRolePolicies.mockRejectedValue(sdkError("AccessDenied", "not authorized"));

      expect(await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps)).toBe(0);
      expect(runtime.stdout).toContain("[WARN] ⚠ Could not verify role policies");
    });

    it("should warn when the role has no policies", async () => {
      const { deps, runtime, aws } = createCommandHarness();
      arrangeHealthyGateway(aws);
      aws.roles.listRolePolicies.mockResolvedValue({ attached: [], inline: [] });

      await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps);
      expect(runtime.stdout).toContain("[WARN] ⚠ Role WeatherGatewayRole has no attached or inline policies");
    });

    it("should warn when the gateway has no role", async () => {
      const { deps, runtime, aws } = createCommandHarness();
      arrangeHealthyGateway(aws);
      aws.gateways.getGateway.mockResolvedValue({
        gatewayId: GATEWAY_ID,
        gatewayArn: GATEWAY_ARN,
        name: "weather",
        status: "READY",
      });

      await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps);

      expect(runtime.stdout).toContain("[WARN] ⚠ Gateway has no service role");
      expect(aws.roles.listRolePolicies).not.toHaveBeenCalled();
    });
  });

  describe("CloudFormation stack", () => {
    it("should accept a missing stack", async () => {
      const { deps, runtime, aws } = createCommandHarness();
      arrangeHealthyGateway(aws);
      aws.stacks.getStackStatus.mockResolvedValue(undefined);

      expect(await validateGatewayCommand({ gatewayId: GATEWAY_ID }, deps)).toBe(0);
      expect(runtime.stdout).toContain("[WARN] ⚠ Stack not found (this is OK if using different naming)");
      expect(runtime.stdout).toContain("[INFO] 4 passed, 0 warning(s), 0 failed");
    });

    it("should check a custom stack name", async () => {
      const { deps, runtime, aws } = createCommandHarness();
      arrangeHealthyGateway(aws);
      aws.stacks.getStackStatus.mockResolvedValue("UPDATE_ROLLBACK_COMPLETE");

      await validateGatewayCommand({ gatewayId: GATEWAY_ID, stackName: "WeatherTargetStack" }, deps);

      expect(aws.stacks.getStackStatus).toHaveBeenCalledWith("WeatherTargetStack");
      expect(runtime.stdout).toContain("[INFO] ✓ Stack exists with status: UPDATE_ROLLBACK_COMPLETE");
      expect(runtime.stdout).toContain("[WARN] ⚠ Stack status: UPDATE_ROLLBACK_COMPLETE");
    });
  });

  it("should give the same result when run twice against unchanged resources", async () => {
    const first = createCommandHarness();
    const second = createCommandHarness();
    arrangeHealthyGateway(first.aws);
    arrangeHealthyGateway(second.aws);

    const firstCode = await validateGatewayCommand({ gatewayId: GATEWAY_ID }, first.deps);
    const secondCode = await validateGatewayCommand({ gatewayId: GATEWAY_ID }, second.deps);

    expect(firstCode).toBe(0);
    expect(secondCode).toBe(firstCode);
    expect(second.runtime.stdout).toEqual(first.runtime.stdout);
    expect(second.runtime.stderr).toEqual(first.runtime.stderr);
    expect(first.runtime.stdout).toContain("[INFO] 5 passed, 0 warning(s), 0 failed");
  });

  it("should print only the JSON report with --json", async () => {
    const { deps, runtime, aws } = createCommandHarness();
    arrangeHealthyGateway(aws);
    aws.stacks.getStackStatus.mockResolvedValue(undefined);

    expect(await validateGatewayCommand({ gatewayId: GATEWAY_ID, json: true }, deps)).toBe(0);

    expect(runtime.stdout).toHaveLength(1);
    const report = JSON.parse(runtime.stdout[0] ?? "");
    expect(report.subject).toBe(GATEWAY_ID);
    expect(report.passed).toBe(true);
    expect(report.counts).toEqual({ pass: 4, warn: 0, fail: 0, info: 1 });
    expect(report.checks[4]).toEqual({
      id: "stack",
      title: "CloudFormation Stack",
      status: "info",
      message: "Stack not found (this is OK if using different naming)",
      details: { stackName: "weatherFootballAPITarget" },
    });
  });
});
