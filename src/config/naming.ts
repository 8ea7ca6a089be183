/**
 * Naming conventions shared by deploy and validate-gateway.
 */

/** Suffix appended to the gateway name to form the target stack name. */
export const DEFAULT_TARGET_STACK_SUFFIX = "FootballAPITarget";

/** Gateway name = identifier prefix before the first hyphen. */
export function gatewayNameFromIdentifier(identifier: string): string {
  return identifier.split("-")[0] ?? identifier;
}

export function targetStackName(gatewayName: string, suffix = DEFAULT_TARGET_STACK_SUFFIX): string {
  return `${gatewayName}${suffix}`;
}

/**
 * Role name from an IAM role ARN; roles with a path keep only the last segment.
 *
 *   arn:aws:iam::123456789012:role/service-role/GatewayRole -> GatewayRole
 */
export function roleNameFromArn(roleArn: string): string | undefined {
  const resource = roleArn.split(":").slice(5).join(":");
  if (!resource.startsWith("role/")) return undefined;
  const name = resource.split("/").pop();
  return name ? name : undefined;
}
