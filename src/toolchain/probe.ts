import type { CommandRunner } from "../shared/exec.js";
import { resolveExecutable, type ProcessEnvironment } from "../shared/environment.js";
import { logger } from "../shared/logger.js";
import type { ToolchainSpec } from "../types/config.js";
import { absentToolchain, presentToolchain, type ToolchainState } from "../types/toolchain.js";

/**
 * Check whether a toolchain is installed. Absence is a normal result;
 * only a broken search path (no PATH at all) throws an EnvironmentError.
 */
export async function probeToolchain(
  spec: ToolchainSpec,
  env: ProcessEnvironment,
  runner: CommandRunner,
): Promise<ToolchainState> {
  const executable = await resolveExecutable(spec.probe.command, env);
  if (executable === null) {
    logger.debug({ toolchain: spec.name, command: spec.probe.command }, "Probe command not on PATH");
    return absentToolchain(spec.name);
  }

  if (spec.probe.args) {
    const check = await runner.run({ argv: [executable, ...spec.probe.args], env: env.vars, cwd: env.cwd });
    if (check.exitCode !== 0) {
      logger.debug({ toolchain: spec.name, exitCode: check.exitCode }, "Probe command reported absent");
      return absentToolchain(spec.name);
    }
  }

  const version = spec.probe.version ? await readVersion(spec.probe.version, env, runner) : undefined;
  logger.debug({ toolchain: spec.name, version }, "Toolchain present");
  return presentToolchain(spec.name, version);
}

async function readVersion(
  argv: readonly string[],
  env: ProcessEnvironment,
  runner: CommandRunner,
): Promise<string | undefined> {
  const result = await runner.run({ argv, env: env.vars, cwd: env.cwd });
  if (result.exitCode !== 0) return undefined;
  const firstLine = result.stdout.trim().split("\n")[0]?.trim();
  return firstLine ? firstLine : undefined;
}

/** Toolchains that apply to the running platform, in config order. */
export function requiredToolchains(toolchains: readonly ToolchainSpec[], platform: NodeJS.Platform): ToolchainSpec[] {
  return toolchains.filter((spec) => spec.platforms.length === 0 || spec.platforms.includes(platform));
}
