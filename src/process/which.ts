/**
 * Executable lookup on PATH.
 */

import { access, constants } from "node:fs/promises";
import { delimiter, isAbsolute, join } from "node:path";

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find an executable the way a shell would. Names containing a path separator
 * are checked as given; bare names are searched on the PATH of `env`.
 */
export async function which(command: string, env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  if (!command) return null;

  if (isAbsolute(command) || command.includes("/") || command.includes("\\")) {
    return (await isExecutable(command)) ? command : null;
  }

  const dirs = (env.PATH ?? env.Path ?? "").split(delimiter).filter((dir) => dir.length > 0);
  const extensions = process.platform === "win32"
    ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";").map((ext) => ext.toLowerCase())]
    : [""];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}
