/**
 * Environment File Loading
 *
 * Reads `KEY=VALUE` environment files for the deploy command and validates
 * the variables a gateway target deployment needs.
 */

import { readFile } from "node:fs/promises";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { extractErrorCode } from "../aws/errors.js";

// =============================================================================
// Schema
// =============================================================================

/** Variables that must be non-empty before anything touches AWS. */
export const REQUIRED_DEPLOY_VARIABLES = [
  "GATEWAY_IDENTIFIER",
  "CREDENTIAL_PROVIDER_NAME",
  "AWS_REGION",
] as const;

const requiredString = z.string().trim().min(1);
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const deployEnvironmentSchema = z.object({
  GATEWAY_IDENTIFIER: requiredString,
  CREDENTIAL_PROVIDER_NAME: requiredString,
  AWS_REGION: requiredString,
  AWS_PROFILE: optionalString,
  GATEWAY_NAME: optionalString,
  STACK_NAME: optionalString,
});

export type DeployEnvironment = z.infer<typeof deployEnvironmentSchema>;

export type DeployEnvironmentResult =
  | { ok: true; config: DeployEnvironment }
  | { ok: false; missing: string[] };

// =============================================================================
// Errors
// =============================================================================

export class EnvFileNotFoundError extends Error {
  constructor(public filePath: string) {
    super(`Environment file not found: ${filePath}`);
    this.name = "EnvFileNotFoundError";
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Read and parse an environment file. A missing path, or a path that is a
 * directory, raises EnvFileNotFoundError.
 */
export async function loadEnvFile(filePath: string): Promise<Record<string, string>> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    const code = extractErrorCode(err);
    if (code === "ENOENT" || code === "EISDIR") {
      throw new EnvFileNotFoundError(filePath);
    }
    throw err;
  }
  return parseDotenv(content);
}

/** File values override the inherited environment. */
export function mergeEnvironment(
  base: NodeJS.ProcessEnv,
  fileVariables: Record<string, string>,
): NodeJS.ProcessEnv {
  return { ...base, ...fileVariables };
}

/**
 * Validate the merged environment. Missing variables are listed by name, in
 * the order of REQUIRED_DEPLOY_VARIABLES.
 */
export function parseDeployEnvironment(env: NodeJS.ProcessEnv): DeployEnvironmentResult {
  const result = deployEnvironmentSchema.safeParse(env);
  if (result.success) {
    return { ok: true, config: result.data };
  }

  const missing: string[] = [];
  for (const issue of result.error.issues) {
    const key = issue.path[0];
    if (typeof key === "string" && !missing.includes(key)) {
      missing.push(key);
    }
  }
  return { ok: false, missing };
}
