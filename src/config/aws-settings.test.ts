import { describe, it, expect } from "vitest";
import { DEFAULT_REGION, profileArgs, resolveAwsSettings } from "./aws-settings.js";

describe("resolveAwsSettings", () => {
  it("should read region and profile from the environment", () => {
    expect(resolveAwsSettings({ AWS_REGION: "eu-west-1", AWS_PROFILE: "staging" })).toEqual({
      region: "eu-west-1",
      profile: "staging",
    });
  });

  it("should fall back to AWS_DEFAULT_REGION", () => {
    expect(resolveAwsSettings({ AWS_DEFAULT_REGION: "ap-south-1" }).region).toBe("ap-south-1");
  });

  it("should use the provided default, then us-west-2", () => {
    expect(resolveAwsSettings({}, { region: "us-east-2" }).region).toBe("us-east-2");
    expect(resolveAwsSettings({}).region).toBe(DEFAULT_REGION);
    expect(DEFAULT_REGION).toBe("us-west-2");
  });

  it("should treat blank values as unset", () => {
    expect(resolveAwsSettings({ AWS_REGION: "  ", AWS_PROFILE: "" })).toEqual({
      region: "us-west-2",
      profile: undefined,
    });
  });
});

describe("profileArgs", () => {
  it("should pass --profile only for named profiles", () => {
    expect(profileArgs({ region: "us-west-2", profile: "dev" })).toEqual(["--profile", "dev"]);
    expect(profileArgs({ region: "us-west-2" })).toEqual([]);
  });
});
