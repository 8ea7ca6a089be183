/**
 * AWS region/profile resolution from the environment.
 */

export type AwsSettings = {
  region: string;
  /** Named profile; undefined means the default credential chain. */
  profile?: string;
};

/** Region used by the validators when neither AWS_REGION nor AWS_DEFAULT_REGION is set. */
export const DEFAULT_REGION = "us-west-2";

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveAwsSettings(
  env: NodeJS.ProcessEnv,
  defaults: { region?: string } = {},
): AwsSettings {
  return {
    region: nonEmpty(env.AWS_REGION) ?? nonEmpty(env.AWS_DEFAULT_REGION) ?? defaults.region ?? DEFAULT_REGION,
    profile: nonEmpty(env.AWS_PROFILE),
  };
}

/** `--profile <name>` for child CLIs, or nothing when using the default chain. */
export function profileArgs(settings: AwsSettings): string[] {
  return settings.profile ? ["--profile", settings.profile] : [];
}
