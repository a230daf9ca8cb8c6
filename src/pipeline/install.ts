import { Installer } from "../install/installer.js";
import { resolveTarget } from "../install/targets.js";
import { verifyInstalled, type Verification } from "../install/verifier.js";
import type { BuildArtifact, InstalledBinary, InstallTargetKind, ToolchainState } from "../types/index.js";
import { runBuild } from "./build.js";
import type { BootstrapContext } from "./context.js";
import { fileOpsFor } from "./privileges.js";
import { ensureToolchains } from "./toolchains.js";

export interface InstallReport {
  readonly toolchains: ToolchainState[];
  readonly artifact: BuildArtifact;
  readonly installed: InstalledBinary;
  readonly verification: Verification;
}

/**
 * `install` / `install-user`: toolchains, release build, placement, PATH check.
 * Every step must succeed before the next starts; the PATH check only warns.
 */
export async function runInstall(ctx: BootstrapContext, kind: InstallTargetKind): Promise<InstallReport> {
  const { binary, getting_started: gettingStarted } = ctx.config;
  // Resolved up front so a bad CARGO_HOME fails before anything is built.
  const target = resolveTarget(kind, ctx.config, ctx.env);

  const toolchains = await ensureToolchains(ctx);
  const artifact = await runBuild(ctx, "release", toolchains.env);

  ctx.reporter.info(`Installing ${binary} to ${target.directory}...`);
  const ops = await fileOpsFor(ctx, target, "install-user");
  const installed = await new Installer(binary).install(artifact, target, ops);
  ctx.reporter.success(`Installed ${binary} to ${installed.path}`);

  // Checked against the caller's PATH: that is what their next shell will see.
  const verification = await verifyInstalled(binary, installed, ctx.env);
  if (!verification.found) {
    ctx.reporter.warn(`${target.directory} is not on your PATH`);
    ctx.reporter.success(
      `Done! You may need to add ${target.directory} to your PATH, then run '${gettingStarted}' to get started.`,
    );
  } else if (verification.shadowed) {
    ctx.reporter.warn(`'${binary}' on your PATH resolves to ${verification.resolvedPath}, not ${installed.path}`);
    ctx.reporter.detail(`Move ${target.directory} earlier in your PATH or remove the other copy.`);
    ctx.reporter.success(`Done! Run '${gettingStarted}' to get started.`);
  } else {
    ctx.reporter.success(`Done! Run '${gettingStarted}' to get started.`);
  }

  return { toolchains: toolchains.states, artifact, installed, verification };
}
