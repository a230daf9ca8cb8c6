import { stat } from "node:fs/promises";
import type { CommandRunner } from "../shared/exec.js";
import { formatArgv } from "../shared/exec.js";
import type { ProcessEnvironment } from "../shared/environment.js";
import { buildError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import type { BuildArtifact, BuildProfile } from "../types/install.js";
import type { BuildSystem, BuildTask } from "./types.js";

export interface BuilderOptions {
  readonly buildSystem: BuildSystem;
  readonly runner: CommandRunner;
  readonly sourceRoot: string;
  readonly binary: string;
}

/**
 * Runs the external build system. Output is streamed to the terminal so compiler
 * diagnostics reach the user unchanged; failures carry the exit code.
 */
export class Builder {
  constructor(private readonly options: BuilderOptions) {}

  async build(profile: BuildProfile, env: ProcessEnvironment): Promise<BuildArtifact> {
    const { buildSystem, sourceRoot, binary } = this.options;
    await this.exec(buildSystem.buildCommand(profile), env);

    const outputPath = buildSystem.artifactPath(sourceRoot, profile, binary);
    if (!(await isFile(outputPath))) {
      throw buildError(`Build succeeded but produced no executable at ${outputPath}`, {
        context: { profile },
      });
    }
    logger.debug({ outputPath, profile }, "Build artifact ready");
    return Object.freeze({ sourceRoot, outputPath, profile });
  }

  async runTask(task: BuildTask, env: ProcessEnvironment): Promise<void> {
    await this.exec(this.options.buildSystem.taskCommand(task), env);
  }

  private async exec(argv: string[], env: ProcessEnvironment): Promise<void> {
    const result = await this.options.runner.run({
      argv,
      cwd: this.options.sourceRoot,
      env: env.vars,
      stream: true,
    });
    if (result.exitCode !== 0) {
      throw buildError(`${formatArgv(argv)} failed with exit code ${result.exitCode}`, {
        context: { exitCode: result.exitCode, stderr: result.stderr.trim() || undefined },
      });
    }
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}
