// File operations on an install target. DirectFileOps works in-process; SudoFileOps
// runs the same steps through sudo for privileged directories. Both report failures
// as BootstrapErrors so the installer can clean up and rethrow without inspecting them.
import { chmod, copyFile, mkdir, rename, rm } from "node:fs/promises";
import type { CommandRunner } from "../shared/exec.js";
import { formatArgv } from "../shared/exec.js";
import type { ProcessEnvironment } from "../shared/environment.js";
import { describeError, installError, permissionError, type BootstrapError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

// What `sudo -n` prints when it would have to prompt.
const SUDO_PASSWORD_REQUIRED = /a password is required/;

export interface TargetFileOps {
  ensureDir(dir: string): Promise<void>;
  copy(from: string, to: string): Promise<void>;
  makeExecutable(filePath: string): Promise<void>;
  /** Atomic replace of `to`. */
  rename(from: string, to: string): Promise<void>;
  /** No error when the file is missing. */
  remove(filePath: string): Promise<void>;
}

export class DirectFileOps implements TargetFileOps {
  async ensureDir(dir: string): Promise<void> {
    await this.attempt(`create ${dir}`, () => mkdir(dir, { recursive: true }));
  }

  async copy(from: string, to: string): Promise<void> {
    await this.attempt(`copy ${from} to ${to}`, () => copyFile(from, to));
  }

  async makeExecutable(filePath: string): Promise<void> {
    await this.attempt(`chmod ${filePath}`, () => chmod(filePath, 0o755));
  }

  async rename(from: string, to: string): Promise<void> {
    await this.attempt(`move ${from} to ${to}`, () => rename(from, to));
  }

  async remove(filePath: string): Promise<void> {
    await this.attempt(`remove ${filePath}`, () => rm(filePath, { force: true }));
  }

  private async attempt(action: string, op: () => Promise<unknown>): Promise<void> {
    logger.debug({ action }, "file op");
    try {
      await op();
    } catch (err) {
      throw toFileError(action, err);
    }
  }
}

export class SudoFileOps implements TargetFileOps {
  constructor(
    private readonly runner: CommandRunner,
    private readonly sudoPath: string,
    private readonly env: ProcessEnvironment,
    /** Printed when sudo refuses a step because the cached credential has lapsed. */
    private readonly deniedHint?: string,
  ) {}

  async ensureDir(dir: string): Promise<void> {
    await this.sudo(["mkdir", "-p", dir]);
  }

  async copy(from: string, to: string): Promise<void> {
    await this.sudo(["cp", from, to]);
  }

  async makeExecutable(filePath: string): Promise<void> {
    await this.sudo(["chmod", "755", filePath]);
  }

  async rename(from: string, to: string): Promise<void> {
    await this.sudo(["mv", "-f", from, to]);
  }

  async remove(filePath: string): Promise<void> {
    await this.sudo(["rm", "-f", filePath]);
  }

  private async sudo(argv: string[]): Promise<void> {
    // -n: the credential was validated by requestElevation; never prompt again mid-install.
    const full = [this.sudoPath, "-n", ...argv];
    const result = await this.runner.run({ argv: full, env: this.env.vars, cwd: this.env.cwd });
    if (result.exitCode !== 0 && SUDO_PASSWORD_REQUIRED.test(result.stderr)) {
      throw permissionError(`Elevated privileges expired before \`${formatArgv(argv)}\` could run`, {
        context: { stderr: result.stderr.trim() },
        hint: this.deniedHint,
      });
    }
    if (result.exitCode !== 0) {
      throw installError(`${formatArgv(full)} failed with exit code ${result.exitCode}`, {
        context: { stderr: result.stderr.trim() },
      });
    }
  }
}

/** Maps a failed in-process file operation onto PERMISSION or INSTALL. */
export function toFileError(action: string, err: unknown): BootstrapError {
  const code = err instanceof Error && "code" in err ? err.code : undefined;
  const message = describeError(err);
  if (code === "EACCES" || code === "EPERM") {
    return permissionError(`Permission denied: cannot ${action}`, { context: { cause: message } });
  }
  return installError(`Failed to ${action}`, { context: { cause: message, code } });
}
