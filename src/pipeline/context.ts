import type { BuildSystem } from "../build/types.js";
import type { CommandRunner } from "../shared/exec.js";
import type { ProcessEnvironment } from "../shared/environment.js";
import type { Reporter } from "../shared/ui.js";
import type { InstallationChannel } from "../toolchain/channel.js";
import type { BootstrapConfig } from "../types/index.js";

/**
 * Everything a command pipeline touches. Built once per invocation by the CLI;
 * tests build their own with a fake runner and a temporary environment.
 */
export interface BootstrapContext {
  readonly config: BootstrapConfig;
  readonly env: ProcessEnvironment;
  readonly runner: CommandRunner;
  readonly channel: InstallationChannel;
  readonly buildSystem: BuildSystem;
  readonly reporter: Reporter;
  /** Directory holding the sources of the target executable. */
  readonly sourceRoot: string;
  /** Allow password prompts for elevation. */
  readonly interactive: boolean;
}
