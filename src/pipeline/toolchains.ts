import type { ProcessEnvironment } from "../shared/environment.js";
import { installToolchain } from "../toolchain/installer.js";
import { probeToolchain, requiredToolchains } from "../toolchain/probe.js";
import { userBaseDir } from "../install/targets.js";
import type { ToolchainState } from "../types/index.js";
import type { BootstrapContext } from "./context.js";

export interface ToolchainCheck {
  readonly states: ToolchainState[];
  /** Invocation environment plus PATH entries of freshly installed toolchains. */
  readonly env: ProcessEnvironment;
}

/** Probe each required toolchain in order and install the missing ones. Fails on the first error. */
export async function ensureToolchains(ctx: BootstrapContext): Promise<ToolchainCheck> {
  let env = ctx.env;
  const states: ToolchainState[] = [];

  for (const spec of requiredToolchains(ctx.config.toolchains, ctx.env.platform)) {
    ctx.reporter.info(`Checking for ${spec.description}...`);
    const probed = await probeToolchain(spec, env, ctx.runner);
    if (probed.present) {
      ctx.reporter.success(`${spec.description} found${probed.version ? ` (${probed.version})` : ""}`);
      states.push(probed);
      continue;
    }

    ctx.reporter.warn(`${spec.description} not found, installing...`);
    const outcome = await installToolchain(spec, env, {
      runner: ctx.runner,
      channel: ctx.channel,
      userBaseDir: userBaseDir(ctx.config, ctx.env),
    });
    const installed = outcome.state;
    ctx.reporter.success(
      `${spec.description} installed${installed.present && installed.version ? ` (${installed.version})` : ""}`,
    );
    states.push(installed);
    env = outcome.env;
  }

  return { states, env };
}
