// Command surface: maps each command name onto one pipeline call. No orchestration
// lives here; parsing, context construction and error-to-exit-code mapping only.
import path from "node:path";
import { Command, CommanderError } from "commander";
import { CargoBuildSystem } from "../build/cargo.js";
import type { BuildSystem } from "../build/types.js";
import { loadConfig } from "../config/loader.js";
import type { BootstrapContext } from "../pipeline/context.js";
import { runBuild, runBuildTask } from "../pipeline/build.js";
import { runInstall } from "../pipeline/install.js";
import { runUninstall } from "../pipeline/uninstall.js";
import type { CommandRunner } from "../shared/exec.js";
import type { ProcessEnvironment } from "../shared/environment.js";
import { describeError, isBootstrapError } from "../shared/errors.js";
import { enableVerboseLogging, logger } from "../shared/logger.js";
import type { Reporter } from "../shared/ui.js";
import { CurlChannel, type InstallationChannel } from "../toolchain/channel.js";
import type { BootstrapConfig } from "../types/config.js";
import { COMMANDS, PROGRAM_NAME, renderHelp, type CommandName } from "./commands.js";

export interface CliDependencies {
  readonly env: ProcessEnvironment;
  readonly runner: CommandRunner;
  readonly reporter: Reporter;
  /** Help text and commander's own messages. */
  readonly writeOut: (text: string) => void;
  readonly writeErr: (text: string) => void;
  readonly loadConfig?: () => BootstrapConfig;
  readonly channel?: InstallationChannel;
  readonly buildSystem?: BuildSystem;
}

interface GlobalOptions {
  sourceRoot?: string;
  nonInteractive?: boolean;
  verbose?: boolean;
}

type Action = (ctx: BootstrapContext) => Promise<unknown>;

const ACTIONS: Record<Exclude<CommandName, "help">, Action> = {
  build: (ctx) => runBuild(ctx, "debug"),
  release: (ctx) => runBuild(ctx, "release"),
  install: (ctx) => runInstall(ctx, "system"),
  "install-user": (ctx) => runInstall(ctx, "user"),
  uninstall: (ctx) => runUninstall(ctx, "system"),
  "uninstall-user": (ctx) => runUninstall(ctx, "user"),
  clean: (ctx) => runBuildTask(ctx, "clean"),
  test: (ctx) => runBuildTask(ctx, "test"),
  check: (ctx) => runBuildTask(ctx, "check"),
  fmt: (ctx) => runBuildTask(ctx, "fmt"),
  lint: (ctx) => runBuildTask(ctx, "lint"),
};

export function createProgram(config: BootstrapConfig, deps: CliDependencies): Command {
  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description(`Build and install the ${config.binary} CLI`)
    .option("--source-root <dir>", "directory containing the sources")
    .option("--non-interactive", "never prompt for a sudo password")
    .option("--verbose", "print debug logs to stderr")
    .addHelpCommand(false)
    .exitOverride()
    .configureOutput({ writeOut: deps.writeOut, writeErr: deps.writeErr })
    .hook("preAction", () => {
      if (program.opts<GlobalOptions>().verbose) enableVerboseLogging();
    });

  const context = (): BootstrapContext => {
    const options = program.opts<GlobalOptions>();
    return {
      config,
      env: deps.env,
      runner: deps.runner,
      channel: deps.channel ?? new CurlChannel(deps.runner),
      buildSystem: deps.buildSystem ?? new CargoBuildSystem(),
      reporter: deps.reporter,
      sourceRoot: path.resolve(deps.env.cwd, options.sourceRoot ?? "."),
      interactive: options.nonInteractive !== true,
    };
  };

  for (const info of COMMANDS) {
    const command = program.command(info.name).description(info.summary(config));
    if (info.name === "help") {
      command.action(() => deps.writeOut(renderHelp(config)));
    } else {
      const action = ACTIONS[info.name];
      command.action(async () => {
        await action(context());
      });
    }
  }

  return program;
}

/** Parse `argv` (without node and script), run the command, and return the exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  try {
    const config = (deps.loadConfig ?? loadConfig)();
    const program = createProgram(config, deps);
    await program.parseAsync(argv.length === 0 ? ["help"] : [...argv], { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (isBootstrapError(err)) {
      deps.reporter.fail(err.message);
      if (err.hint) deps.reporter.hint(err.hint);
      logger.debug({ code: err.code, context: err.context }, "Command failed");
      return 1;
    }
    deps.reporter.fail(`Unexpected error: ${describeError(err)}`);
    logger.error({ err }, "Unexpected error");
    return 1;
  }
}
