import { Builder } from "../build/builder.js";
import type { BuildTask } from "../build/types.js";
import type { ProcessEnvironment } from "../shared/environment.js";
import type { BuildArtifact, BuildProfile } from "../types/index.js";
import type { BootstrapContext } from "./context.js";

export function createBuilder(ctx: BootstrapContext): Builder {
  return new Builder({
    buildSystem: ctx.buildSystem,
    runner: ctx.runner,
    sourceRoot: ctx.sourceRoot,
    binary: ctx.config.binary,
  });
}

/** `build` and `release`. `env` defaults to the invocation's environment. */
export async function runBuild(
  ctx: BootstrapContext,
  profile: BuildProfile,
  env: ProcessEnvironment = ctx.env,
): Promise<BuildArtifact> {
  ctx.reporter.info(`Building ${ctx.config.binary} (${profile})...`);
  const artifact = await createBuilder(ctx).build(profile, env);
  ctx.reporter.success(`Built ${artifact.outputPath}`);
  return artifact;
}

/** clean / test / check / fmt / lint: straight pass-through to the build system. */
export async function runBuildTask(ctx: BootstrapContext, task: BuildTask): Promise<void> {
  await createBuilder(ctx).runTask(task, ctx.env);
}
