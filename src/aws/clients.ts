/**
 * Shared SDK client configuration.
 */

import { fromIni } from "@aws-sdk/credential-providers";
import type { AwsSettings } from "../config/aws-settings.js";

/**
 * Region plus credentials: a named profile resolves through the shared ini files,
 * otherwise the SDK's default provider chain applies.
 */
export function resolveClientConfig(settings: AwsSettings) {
  return {
    region: settings.region,
    ...(settings.profile ? { credentials: fromIni({ profile: settings.profile }) } : {}),
  };
}
