/**
 * Caller identity lookup (STS).
 */

import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import type { AwsSettings } from "../config/aws-settings.js";
import { resolveClientConfig } from "./clients.js";

export interface IdentityService {
  /** Account of the resolved credentials; undefined when STS returns none. */
  getAccountId(): Promise<string | undefined>;
}

export class StsIdentityService implements IdentityService {
  private client: STSClient;

  constructor(settings: AwsSettings) {
    this.client = new STSClient(resolveClientConfig(settings));
  }

  async getAccountId(): Promise<string | undefined> {
    const response = await this.client.send(new GetCallerIdentityCommand({}));
    const account = response.Account?.trim();
    return account ? account : undefined;
  }
}
