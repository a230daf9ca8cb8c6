import path from "node:path";
import type { ProcessEnvironment } from "../shared/environment.js";
import { installError } from "../shared/errors.js";
import type { BootstrapConfig } from "../types/config.js";
import type { InstallTarget, InstallTargetKind } from "../types/install.js";

/** `${CARGO_HOME:-$HOME/.cargo}` with the variable name taken from config. */
export function userBaseDir(config: BootstrapConfig, env: ProcessEnvironment): string {
  const override = env.vars[config.targets.user_base_var];
  if (override !== undefined && override.length > 0) return path.resolve(env.cwd, override);
  return path.join(env.home, config.targets.user_base_default);
}

export function systemTarget(config: BootstrapConfig): InstallTarget {
  return { kind: "system", directory: path.resolve(config.targets.system_dir), requiresElevation: true };
}

export function userTarget(config: BootstrapConfig, env: ProcessEnvironment): InstallTarget {
  const directory = path.join(userBaseDir(config, env), config.targets.user_bin_subdir);
  // Sharing a directory would let uninstall-user delete the system binary.
  if (directory === systemTarget(config).directory) {
    throw installError(`User install directory ${directory} is the system install directory`, {
      hint: `Point ${config.targets.user_base_var} somewhere else, or use the system install commands.`,
    });
  }
  return { kind: "user", directory, requiresElevation: false };
}

export function resolveTarget(kind: InstallTargetKind, config: BootstrapConfig, env: ProcessEnvironment): InstallTarget {
  return kind === "system" ? systemTarget(config) : userTarget(config, env);
}

export function binaryPath(target: InstallTarget, binary: string): string {
  return path.join(target.directory, binary);
}
