/**
 * Bedrock AgentCore gateway lookups
 *
 * Read-only views of a gateway and its targets:
 * - Gateway detail (status, role, URL)
 * - Target listing across pages
 * - Per-target detail including the schema location
 */

import {
  BedrockAgentCoreControlClient,
  GetGatewayCommand,
  GetGatewayTargetCommand,
  ListGatewayTargetsCommand,
} from "@aws-sdk/client-bedrock-agentcore-control";
import type { AwsSettings } from "../config/aws-settings.js";
import { resolveClientConfig } from "./clients.js";

// =============================================================================
// Types
// =============================================================================

/** Target statuses reported by the control plane. Only READY is healthy. */
export type GatewayTargetStatus =
  | "CREATING"
  | "UPDATING"
  | "UPDATE_UNSUCCESSFUL"
  | "DELETING"
  | "READY"
  | "FAILED"
  | "SYNCHRONIZING"
  | "SYNCHRONIZE_UNSUCCESSFUL";

export type GatewayDetail = {
  gatewayId: string;
  gatewayArn: string;
  name: string;
  status: string;
  roleArn?: string;
  gatewayUrl?: string;
};

export type GatewayTargetSummary = {
  targetId: string;
  name?: string;
  status: string;
};

export type GatewayTargetDetail = {
  targetId: string;
  name?: string;
  status: string;
  statusReasons: string[];
  gatewayArn: string;
  schemaUri?: string;
  credentialProviderArns: string[];
};

export interface GatewayService {
  getGateway(gatewayIdentifier: string): Promise<GatewayDetail>;
  listTargets(gatewayIdentifier: string): Promise<GatewayTargetSummary[]>;
  getTarget(gatewayIdentifier: string, targetId: string): Promise<GatewayTargetDetail>;
}

const LIST_PAGE_SIZE = 50;

// =============================================================================
// Response helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function stringAt(value: unknown, path: string[]): string | undefined {
  let current = value;
  for (const key of path) {
    current = field(current, key);
  }
  return typeof current === "string" && current ? current : undefined;
}

/**
 * S3 location of the target's API schema, for OpenAPI and Smithy targets.
 * Inline schemas and Lambda targets have none.
 */
export function schemaUriOf(targetConfiguration: unknown): string | undefined {
  const mcp = field(targetConfiguration, "mcp");
  return (
    stringAt(mcp, ["openApiSchema", "s3", "uri"]) ??
    stringAt(mcp, ["smithyModel", "s3", "uri"]) ??
    stringAt(mcp, ["lambda", "toolSchema", "s3", "uri"])
  );
}

/** ARNs referenced by the target's credential provider configurations. */
export function credentialProviderArnsOf(configurations: unknown): string[] {
  if (!Array.isArray(configurations)) return [];
  const arns: string[] = [];
  for (const configuration of configurations) {
    const provider = field(configuration, "credentialProvider");
    const arn =
      stringAt(provider, ["apiKeyCredentialProvider", "providerArn"]) ??
      stringAt(provider, ["oauthCredentialProvider", "providerArn"]);
    if (arn) arns.push(arn);
  }
  return arns;
}

// =============================================================================
// Service
// =============================================================================

export class AgentCoreGatewayService implements GatewayService {
  private client: BedrockAgentCoreControlClient;

  constructor(settings: AwsSettings) {
    this.client = new BedrockAgentCoreControlClient(resolveClientConfig(settings));
  }

  async getGateway(gatewayIdentifier: string): Promise<GatewayDetail> {
    const response = await this.client.send(new GetGatewayCommand({ gatewayIdentifier }));
    return {
      gatewayId: response.gatewayId ?? gatewayIdentifier,
      gatewayArn: response.gatewayArn ?? "",
      name: response.name ?? "",
      status: response.status ?? "UNKNOWN",
      roleArn: response.roleArn,
      gatewayUrl: response.gatewayUrl,
    };
  }

  async listTargets(gatewayIdentifier: string): Promise<GatewayTargetSummary[]> {
    const targets: GatewayTargetSummary[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListGatewayTargetsCommand({
          gatewayIdentifier,
          maxResults: LIST_PAGE_SIZE,
          nextToken,
        }),
      );

      for (const item of response.items ?? []) {
        if (!item.targetId) continue;
        targets.push({
          targetId: item.targetId,
          name: item.name,
          status: item.status ?? "UNKNOWN",
        });
      }

      nextToken = response.nextToken;
    } while (nextToken);

    return targets;
  }

  async getTarget(gatewayIdentifier: string, targetId: string): Promise<GatewayTargetDetail> {
    const response = await this.client.send(
      new GetGatewayTargetCommand({ gatewayIdentifier, targetId }),
    );
    return {
      targetId: response.targetId ?? targetId,
      name: response.name ? response.name : undefined,
      status: response.status ?? "UNKNOWN",
      statusReasons: response.statusReasons ?? [],
      gatewayArn: response.gatewayArn ?? "",
      schemaUri: schemaUriOf(response.targetConfiguration),
      credentialProviderArns: credentialProviderArnsOf(response.credentialProviderConfigurations),
    };
  }
}
