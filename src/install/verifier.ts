import { realpath } from "node:fs/promises";
import { resolveExecutable, type ProcessEnvironment } from "../shared/environment.js";
import { describeError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import type { InstalledBinary } from "../types/install.js";

export interface Verification {
  /** The bare name resolves on the search path. */
  readonly found: boolean;
  readonly resolvedPath: string | null;
  /** Resolves, but to a different file than the one just installed. */
  readonly shadowed: boolean;
}

/** Pure query; a broken search path counts as "not found". */
export async function isOnSearchPath(name: string, env: ProcessEnvironment): Promise<boolean> {
  return (await locate(name, env)) !== null;
}

export async function verifyInstalled(
  name: string,
  installed: InstalledBinary,
  env: ProcessEnvironment,
): Promise<Verification> {
  const resolvedPath = await locate(name, env);
  if (resolvedPath === null) {
    return { found: false, resolvedPath: null, shadowed: false };
  }
  const shadowed = (await canonical(resolvedPath)) !== (await canonical(installed.path));
  return { found: true, resolvedPath, shadowed };
}

async function locate(name: string, env: ProcessEnvironment): Promise<string | null> {
  try {
    return await resolveExecutable(name, env);
  } catch (err) {
    logger.debug({ name, error: describeError(err) }, "Search path lookup failed");
    return null;
  }
}

async function canonical(filePath: string): Promise<string> {
  try {
    return await realpath(filePath);
  } catch {
    return filePath;
  }
}
