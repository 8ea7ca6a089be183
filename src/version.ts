import { createRequire } from "node:module";

// Source runs from src/, the compiled CLI from dist/src/.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let pkg: unknown;
    try {
      pkg = require(candidate);
    } catch {
      continue;
    }
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return null;
}

// Single source of truth for the current agentcore-ops version.
export const VERSION = process.env.AGENTCORE_OPS_VERSION || readVersionFromPackageJson() || "0.0.0";
