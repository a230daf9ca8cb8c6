import { Installer } from "../install/installer.js";
import { binaryPath, resolveTarget } from "../install/targets.js";
import type { InstallTargetKind, UninstallResult } from "../types/index.js";
import type { BootstrapContext } from "./context.js";
import { fileOpsFor } from "./privileges.js";

/** `uninstall` / `uninstall-user`. Touches only the selected target's binary. */
export async function runUninstall(ctx: BootstrapContext, kind: InstallTargetKind): Promise<UninstallResult> {
  const { binary } = ctx.config;
  const target = resolveTarget(kind, ctx.config, ctx.env);
  const installer = new Installer(binary);

  ctx.reporter.info(`Removing ${binary} from ${target.directory}...`);
  if (!(await installer.isInstalled(target))) {
    // Nothing to remove, so no reason to ask for elevation.
    const destination = binaryPath(target, binary);
    ctx.reporter.success(`Nothing to remove at ${destination}.`);
    return { path: destination, removed: false };
  }

  const ops = await fileOpsFor(ctx, target, "uninstall-user");
  const result = await installer.uninstall(target, ops);
  ctx.reporter.success("Uninstalled.");
  return result;
}
