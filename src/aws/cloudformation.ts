/**
 * CloudFormation stack status lookup.
 */

import { CloudFormationClient, DescribeStacksCommand } from "@aws-sdk/client-cloudformation";
import type { AwsSettings } from "../config/aws-settings.js";
import { resolveClientConfig } from "./clients.js";
import { isNotFoundError } from "./errors.js";

export interface StackService {
  /** Current status, or undefined when the stack does not exist. */
  getStackStatus(stackName: string): Promise<string | undefined>;
}

export class CloudFormationStackService implements StackService {
  private client: CloudFormationClient;

  constructor(settings: AwsSettings) {
    this.client = new CloudFormationClient(resolveClientConfig(settings));
  }

  async getStackStatus(stackName: string): Promise<string | undefined> {
    try {
      const response = await this.client.send(new DescribeStacksCommand({ StackName: stackName }));
      return response.Stacks?.[0]?.StackStatus;
    } catch (err) {
      if (isNotFoundError(err)) return undefined;
      throw err;
    }
  }
}
