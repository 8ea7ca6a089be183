/**
 * Synthesized CloudFormation template inspection.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { extractErrorCode } from "../aws/errors.js";

/** Templates above this size should move resources into nested stacks. */
export const DEFAULT_MAX_TEMPLATE_BYTES = 51_200;

/** Resource count above which a stack should be split. */
export const DEFAULT_MAX_RESOURCES = 200;

const TEMPLATE_SUFFIX = ".template.json";

export type SynthesizedTemplate = {
  stackName: string;
  path: string;
  sizeBytes: number;
  resourceCount: number;
};

const templateSchema = z.object({
  Resources: z.record(z.unknown()).optional(),
});

/** Every `*.template.json` under `outputDir`, recursively, sorted by path. */
export async function findTemplates(outputDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(outputDir, { recursive: true });
  } catch (err) {
    const code = extractErrorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") return [];
    throw err;
  }

  return entries
    .filter((entry) => entry.endsWith(TEMPLATE_SUFFIX))
    .map((entry) => path.join(outputDir, entry))
    .sort();
}

export function stackNameOf(templatePath: string): string {
  return path.basename(templatePath, TEMPLATE_SUFFIX);
}

/** Number of entries under `Resources`; 0 for unparseable JSON or a missing section. */
export function countResources(content: string): number {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return 0;
  }
  const result = templateSchema.safeParse(parsed);
  if (!result.success || !result.data.Resources) return 0;
  return Object.keys(result.data.Resources).length;
}

export async function inspectTemplate(templatePath: string): Promise<SynthesizedTemplate> {
  const { size } = await stat(templatePath);
  let resourceCount = 0;
  try {
    resourceCount = countResources(await readFile(templatePath, "utf-8"));
  } catch (err) {
    // A filesystem error while reading counts as zero resources.
    if (!extractErrorCode(err)) throw err;
  }
  return {
    stackName: stackNameOf(templatePath),
    path: templatePath,
    sizeBytes: size,
    resourceCount,
  };
}
