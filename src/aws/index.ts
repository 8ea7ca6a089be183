/**
 * AWS service adapters used by the commands.
 */

import type { AwsSettings } from "../config/aws-settings.js";
import { CloudFormationStackService, type StackService } from "./cloudformation.js";
import { AgentCoreGatewayService, type GatewayService } from "./gateway.js";
import { IamRolePolicyService, type RolePolicyService } from "./iam.js";
import { StsIdentityService, type IdentityService } from "./sts.js";

export type AwsServices = {
  identity: IdentityService;
  gateways: GatewayService;
  roles: RolePolicyService;
  stacks: StackService;
};

export type AwsServicesFactory = (settings: AwsSettings) => AwsServices;

/** SDK-backed services; clients are created once per call. */
export const createAwsServices: AwsServicesFactory = (settings) => ({
  identity: new StsIdentityService(settings),
  gateways: new AgentCoreGatewayService(settings),
  roles: new IamRolePolicyService(settings),
  stacks: new CloudFormationStackService(settings),
});

export type { StackService } from "./cloudformation.js";
export type {
  GatewayDetail,
  GatewayService,
  GatewayTargetDetail,
  GatewayTargetStatus,
  GatewayTargetSummary,
} from "./gateway.js";
export type { AttachedPolicy, RolePolicies, RolePolicyService } from "./iam.js";
export type { IdentityService } from "./sts.js";
