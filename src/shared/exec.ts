// Process execution layer. Every external program (probes, curl, sh, sudo, cargo)
// is started through a CommandRunner so pipelines can be driven by a fake in tests.
// ExecaRunner never uses a shell: argv is passed straight to the executable.
import execa from "execa";
import { describeError, environmentError } from "./errors.js";
import { logger } from "./logger.js";

/** A structured command ready for execution. */
export interface Command {
  readonly argv: readonly string[];
  readonly cwd?: string;
  /** Full environment of the child. Nothing is inherited beyond it. */
  readonly env?: Readonly<Record<string, string>>;
  /** Written to the child's stdin. */
  readonly input?: string;
  /** Connect stdout/stderr to the terminal instead of capturing them. */
  readonly stream?: boolean;
  readonly timeoutMs?: number;
}

export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly signal?: string;
  readonly durationMs: number;
}

export interface CommandRunner {
  run(command: Command): Promise<ExecResult>;
}

export class ExecaRunner implements CommandRunner {
  async run(command: Command): Promise<ExecResult> {
    const [file, ...args] = command.argv;
    if (file === undefined) {
      throw environmentError("Cannot run an empty command");
    }
    const start = performance.now();
    logger.debug({ argv: command.argv, cwd: command.cwd }, "exec");

    try {
      const result = await execa(file, args, {
        cwd: command.cwd,
        env: command.env ? { ...command.env } : undefined,
        extendEnv: command.env === undefined,
        input: command.input,
        stdio: command.stream
          ? [command.input === undefined ? "inherit" : "pipe", "inherit", "inherit"]
          : "pipe",
        timeout: command.timeoutMs,
        reject: false,
      });
      const durationMs = Math.round(performance.now() - start);
      // A spawn failure (ENOENT) resolves with no exit code under reject: false.
      const exitCode = result.exitCode ?? (result.failed ? 127 : 0);
      logger.debug({ argv: command.argv, exitCode, durationMs }, "exec finished");
      return {
        stdout: result.stdout ?? "",
        stderr: result.stderr ?? "",
        exitCode,
        signal: result.signal ?? undefined,
        durationMs,
      };
    } catch (err) {
      throw environmentError(`Command failed to spawn: ${file}`, {
        context: { cause: describeError(err) },
      });
    }
  }
}

/** "cargo build --release" for messages. */
export function formatArgv(argv: readonly string[]): string {
  return argv.join(" ");
}
