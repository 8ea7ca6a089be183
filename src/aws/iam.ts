/**
 * IAM role policy lookup.
 */

import {
  IAMClient,
  ListAttachedRolePoliciesCommand,
  ListRolePoliciesCommand,
} from "@aws-sdk/client-iam";
import type { AwsSettings } from "../config/aws-settings.js";
import { resolveClientConfig } from "./clients.js";

export type AttachedPolicy = {
  policyName: string;
  policyArn: string;
};

export type RolePolicies = {
  attached: AttachedPolicy[];
  /** Names of the role's inline policies. */
  inline: string[];
};

export interface RolePolicyService {
  listRolePolicies(roleName: string): Promise<RolePolicies>;
}

export class IamRolePolicyService implements RolePolicyService {
  private client: IAMClient;

  constructor(settings: AwsSettings) {
    this.client = new IAMClient(resolveClientConfig(settings));
  }

  async listRolePolicies(roleName: string): Promise<RolePolicies> {
    return {
      attached: await this.listAttached(roleName),
      inline: await this.listInline(roleName),
    };
  }

  private async listAttached(roleName: string): Promise<AttachedPolicy[]> {
    const policies: AttachedPolicy[] = [];
    let marker: string | undefined;

    do {
      const response = await this.client.send(
        new ListAttachedRolePoliciesCommand({ RoleName: roleName, Marker: marker }),
      );
      for (const policy of response.AttachedPolicies ?? []) {
        policies.push({
          policyName: policy.PolicyName ?? "",
          policyArn: policy.PolicyArn ?? "",
        });
      }
      marker = response.IsTruncated ? response.Marker : undefined;
    } while (marker);

    return policies;
  }

  private async listInline(roleName: string): Promise<string[]> {
    const names: string[] = [];
    let marker: string | undefined;

    do {
      const response = await this.client.send(
        new ListRolePoliciesCommand({ RoleName: roleName, Marker: marker }),
      );
      names.push(...(response.PolicyNames ?? []));
      marker = response.IsTruncated ? response.Marker : undefined;
    } while (marker);

    return names;
  }
}
