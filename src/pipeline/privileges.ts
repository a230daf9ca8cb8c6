import { requestElevation } from "../install/elevation.js";
import { DirectFileOps, SudoFileOps, type TargetFileOps } from "../install/file-ops.js";
import { permissionError } from "../shared/errors.js";
import type { InstallTarget } from "../types/index.js";
import type { BootstrapContext } from "./context.js";

/**
 * File operations for `target`, elevating first when it needs it.
 * `alternative` names the unprivileged command suggested when elevation fails.
 */
export async function fileOpsFor(
  ctx: BootstrapContext,
  target: InstallTarget,
  alternative: string,
): Promise<TargetFileOps> {
  const hint = `Run '${alternative}' to use your user directory instead; it needs no elevated privileges.`;
  const elevation = await requestElevation(target, ctx.env, ctx.runner, { interactive: ctx.interactive });
  switch (elevation.kind) {
    case "not-required":
    case "already-elevated":
      return new DirectFileOps();
    case "sudo":
      return new SudoFileOps(ctx.runner, elevation.sudoPath, ctx.env, hint);
    case "unavailable":
      throw permissionError(`Cannot write to ${target.directory}: ${elevation.reason}`, { hint });
  }
}
