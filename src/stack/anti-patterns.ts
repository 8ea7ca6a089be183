/**
 * CDK Anti-Pattern Scan
 *
 * Line-oriented checks over a CDK project's source directory for patterns
 * that usually deserve a second look before deploying.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { extractErrorCode } from "../aws/errors.js";

// =============================================================================
// Types
// =============================================================================

export type AntiPatternRule = {
  id: string;
  /** Whether a single source line matches. */
  matches(line: string): boolean;
  /** Headline and advice printed when the rule has at least one match. */
  warnings(matchCount: number): [string, string];
};

export type AntiPatternMatch = {
  /** Path relative to the project directory, with forward slashes. */
  file: string;
  line: number;
  text: string;
};

export type AntiPatternFinding = {
  rule: AntiPatternRule;
  matches: AntiPatternMatch[];
};

// =============================================================================
// Rules
// =============================================================================

const HARDCODED_NAME_ADVICE = "Consider letting CDK generate names automatically";

function includes(needle: string): (line: string) => boolean {
  return (line) => line.includes(needle);
}

export const ANTI_PATTERN_RULES: readonly AntiPatternRule[] = [
  {
    id: "hardcoded-function-name",
    matches: includes("functionName:"),
    warnings: () => ["Found potential hardcoded Lambda function names (functionName:)", HARDCODED_NAME_ADVICE],
  },
  {
    id: "hardcoded-bucket-name",
    matches: includes("bucketName:"),
    warnings: () => ["Found potential hardcoded S3 bucket names (bucketName:)", HARDCODED_NAME_ADVICE],
  },
  {
    id: "hardcoded-table-name",
    matches: includes("tableName:"),
    warnings: () => ["Found potential hardcoded DynamoDB table names (tableName:)", HARDCODED_NAME_ADVICE],
  },
  {
    id: "wildcard-actions",
    matches: includes("actions: ['*']"),
    warnings: () => [
      "Found overly broad IAM permissions (actions: ['*'])",
      "Use grant methods for least privilege access",
    ],
  },
  {
    id: "wildcard-resources",
    matches: includes("resources: ['*']"),
    warnings: () => [
      "Found overly broad IAM resources (resources: ['*'])",
      "Specify explicit resource ARNs when possible",
    ],
  },
  {
    id: "l1-construct",
    // CfnOutput is an ordinary stack output, not a low-level resource.
    matches: (line) => line.includes("new Cfn") && !line.includes("CfnOutput"),
    warnings: (count) => [
      `Found ${count} L1 (Cfn*) construct(s)`,
      "Consider using higher-level L2/L3 constructs when available",
    ],
  },
  {
    id: "plain-lambda-function",
    matches: includes("new lambda.Function"),
    warnings: () => [
      "Found lambda.Function usage",
      "Consider using NodejsFunction or PythonFunction for automatic bundling",
    ],
  },
];

// =============================================================================
// Scanning
// =============================================================================

const SKIPPED_DIRECTORIES = new Set(["node_modules"]);

async function readEntries(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (err) {
    const code = extractErrorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") return [];
    throw err;
  }
}

/** Regular files under `dir`, depth-first in name order, skipping node_modules. */
export async function listSourceFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readEntries(dir)) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (SKIPPED_DIRECTORIES.has(entry.name)) continue;
      files.push(...(await listSourceFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Run every rule over every line under `sourceDir`. Only rules with at least
 * one match are returned, in rule order. A missing directory yields no findings.
 */
export async function scanForAntiPatterns(
  projectDir: string,
  sourceDir: string,
  rules: readonly AntiPatternRule[] = ANTI_PATTERN_RULES,
): Promise<AntiPatternFinding[]> {
  const matchesByRule = new Map<string, AntiPatternMatch[]>();

  for (const file of await listSourceFiles(path.resolve(projectDir, sourceDir))) {
    const relative = path.relative(projectDir, file).split(path.sep).join("/");
    const lines = (await readFile(file, "utf-8")).split(/\r?\n/);

    lines.forEach((text, index) => {
      for (const rule of rules) {
        if (!rule.matches(text)) continue;
        const matches = matchesByRule.get(rule.id) ?? [];
        matches.push({ file: relative, line: index + 1, text: text.trim() });
        matchesByRule.set(rule.id, matches);
      }
    });
  }

  const findings: AntiPatternFinding[] = [];
  for (const rule of rules) {
    const matches = matchesByRule.get(rule.id);
    if (matches) findings.push({ rule, matches });
  }
  return findings;
}
