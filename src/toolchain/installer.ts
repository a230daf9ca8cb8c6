import path from "node:path";
import type { CommandRunner } from "../shared/exec.js";
import { formatArgv } from "../shared/exec.js";
import { withPathPrepended, type ProcessEnvironment } from "../shared/environment.js";
import { toolchainInstallError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import type { ToolchainSpec } from "../types/config.js";
import type { ToolchainState } from "../types/toolchain.js";
import type { InstallationChannel } from "./channel.js";
import { probeToolchain } from "./probe.js";

export interface ToolchainInstallDeps {
  readonly runner: CommandRunner;
  readonly channel: InstallationChannel;
  /** Base for `path_additions` (the user base directory, e.g. ~/.cargo). */
  readonly userBaseDir: string;
}

export interface ToolchainInstallOutcome {
  readonly state: ToolchainState;
  /** Caller's environment plus whatever the toolchain added to PATH. */
  readonly env: ProcessEnvironment;
}

/**
 * Install a toolchain the caller has already probed as absent.
 * The returned environment is a new value; `env` itself is never modified, so a
 * failed install cannot leave a half-applied PATH behind.
 */
export async function installToolchain(
  spec: ToolchainSpec,
  env: ProcessEnvironment,
  deps: ToolchainInstallDeps,
): Promise<ToolchainInstallOutcome> {
  const install = spec.install;
  let nextEnv = env;

  switch (install.method) {
    case "remote-script": {
      await deps.channel.fetchAndRun(install.url, install.args, env);
      const additions = install.path_additions.map((dir) => path.resolve(deps.userBaseDir, dir));
      nextEnv = withPathPrepended(env, additions);
      break;
    }
    case "system-dialog": {
      const result = await deps.runner.run({ argv: install.command, env: env.vars, cwd: env.cwd });
      logger.debug({ toolchain: spec.name, exitCode: result.exitCode }, "Started system installer");
      break;
    }
    case "manual":
      throw toolchainInstallError(`${spec.description} not found and cannot be installed automatically`, {
        hint: install.hint,
      });
  }

  const state = await probeToolchain(spec, nextEnv, deps.runner);
  if (!state.present) {
    if (install.method === "system-dialog") {
      throw toolchainInstallError(`${spec.description} installation is not finished`, {
        hint: `A system dialog should have appeared (${formatArgv(install.command)}). Complete the installation, then re-run.`,
      });
    }
    throw toolchainInstallError(`${spec.description} still not found after installation`, {
      context: { toolchain: spec.name },
    });
  }

  logger.debug({ toolchain: spec.name, version: state.version }, "Toolchain installed");
  return { state, env: nextEnv };
}
