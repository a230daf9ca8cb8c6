// Privilege escalation is requested explicitly and reported as a value. The caller
// decides what to do with "unavailable" (fail with a PermissionError that points at
// the user-scoped commands) instead of blocking on an implicit password prompt.
import type { CommandRunner } from "../shared/exec.js";
import { resolveExecutable, type ProcessEnvironment } from "../shared/environment.js";
import { logger } from "../shared/logger.js";
import type { InstallTarget } from "../types/install.js";

export type ElevationRequest =
  | { readonly kind: "not-required" }
  | { readonly kind: "already-elevated" }
  | { readonly kind: "sudo"; readonly sudoPath: string }
  | { readonly kind: "unavailable"; readonly reason: string };

export interface ElevationOptions {
  /** When false, never prompt for a password (`sudo -n`). */
  readonly interactive: boolean;
}

export async function requestElevation(
  target: InstallTarget,
  env: ProcessEnvironment,
  runner: CommandRunner,
  options: ElevationOptions,
): Promise<ElevationRequest> {
  if (!target.requiresElevation) return { kind: "not-required" };
  if (env.isRoot) return { kind: "already-elevated" };

  const sudoPath = await resolveExecutable("sudo", env);
  if (sudoPath === null) {
    return { kind: "unavailable", reason: "sudo is not available" };
  }

  // `sudo -v` prompts on the terminal and caches the credential for the steps that follow.
  const argv = options.interactive ? [sudoPath, "-v"] : [sudoPath, "-n", "true"];
  const result = await runner.run({ argv, env: env.vars, cwd: env.cwd, stream: options.interactive });
  logger.debug({ directory: target.directory, exitCode: result.exitCode }, "Elevation requested");
  if (result.exitCode !== 0) {
    return {
      kind: "unavailable",
      reason: options.interactive ? "elevation was denied" : "sudo needs a password and --non-interactive is set",
    };
  }
  return { kind: "sudo", sudoPath };
}
