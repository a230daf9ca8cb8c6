// ProcessEnvironment is the explicit stand-in for ambient shell state (cwd, exported
// variables, PATH). Components receive it as a value and return a new one instead of
// mutating process.env, so a toolchain's env additions stay visible to the caller.
import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { environmentError } from "./errors.js";

export interface ProcessEnvironment {
  readonly platform: NodeJS.Platform;
  readonly cwd: string;
  readonly home: string;
  readonly vars: Readonly<Record<string, string>>;
  /** Effective uid 0. Privileged targets need no sudo then. */
  readonly isRoot: boolean;
}

/** Snapshot the current process. */
export function captureEnvironment(): ProcessEnvironment {
  const vars: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) vars[key] = value;
  }
  return {
    platform: process.platform,
    cwd: process.cwd(),
    home: homedir(),
    vars,
    isRoot: typeof process.getuid === "function" && process.getuid() === 0,
  };
}

/**
 * Directories of the search path, in order.
 * Throws when PATH is missing entirely: without it no command can be resolved.
 */
export function searchPath(env: ProcessEnvironment): string[] {
  const raw = env.vars.PATH;
  if (raw === undefined) {
    throw environmentError("PATH is not set; cannot resolve commands");
  }
  return raw.split(path.delimiter).filter((dir) => dir.length > 0);
}

export function withPathPrepended(env: ProcessEnvironment, dirs: readonly string[]): ProcessEnvironment {
  const current = env.vars.PATH === undefined ? [] : env.vars.PATH.split(path.delimiter);
  const merged = [...dirs, ...current.filter((dir) => !dirs.includes(dir))];
  return { ...env, vars: { ...env.vars, PATH: merged.join(path.delimiter) } };
}

/** Resolve a bare command name like `command -v` does; null when not found. */
export async function resolveExecutable(name: string, env: ProcessEnvironment): Promise<string | null> {
  for (const dir of searchPath(env)) {
    const candidate = path.join(dir, name);
    if (await isExecutableFile(candidate)) return candidate;
  }
  return null;
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) return false;
    await access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
