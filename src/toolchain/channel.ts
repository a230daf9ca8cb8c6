// Remote installer channel: the one step that downloads and executes third-party code.
// Downloads are HTTPS-only with TLS 1.2 as the floor, and the script URL always comes
// from the bundled config, never from arguments or environment variables.
import type { CommandRunner } from "../shared/exec.js";
import { resolveExecutable, type ProcessEnvironment } from "../shared/environment.js";
import { toolchainInstallError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";

export interface InstallationChannel {
  /** Download the script at `url` and run it with `args`. Throws ToolchainInstallError. */
  fetchAndRun(url: string, args: readonly string[], env: ProcessEnvironment): Promise<void>;
}

/** curl flags equivalent to `curl --proto '=https' --tlsv1.2 -sSf`. */
export const PINNED_CURL_FLAGS = ["--proto", "=https", "--tlsv1.2", "--silent", "--show-error", "--fail"] as const;

export class CurlChannel implements InstallationChannel {
  constructor(private readonly runner: CommandRunner) {}

  async fetchAndRun(url: string, args: readonly string[], env: ProcessEnvironment): Promise<void> {
    if (new URL(url).protocol !== "https:") {
      throw toolchainInstallError(`Refusing to fetch installer over a non-HTTPS URL: ${url}`);
    }

    const curl = await resolveExecutable("curl", env);
    if (curl === null) {
      throw toolchainInstallError("curl is required to download the toolchain installer", {
        hint: "Install curl, then re-run.",
      });
    }

    logger.info({ url }, "Downloading toolchain installer");
    const download = await this.runner.run({ argv: [curl, ...PINNED_CURL_FLAGS, url], env: env.vars, cwd: env.cwd });
    if (download.exitCode !== 0 || download.stdout.length === 0) {
      throw toolchainInstallError(`Failed to download installer from ${url}`, {
        context: { exitCode: download.exitCode, stderr: download.stderr.trim() },
      });
    }

    const run = await this.runner.run({
      argv: ["sh", "-s", "--", ...args],
      input: download.stdout,
      stream: true,
      env: env.vars,
      cwd: env.cwd,
    });
    if (run.exitCode !== 0) {
      throw toolchainInstallError(`Installer from ${url} exited with code ${run.exitCode}`, {
        context: { exitCode: run.exitCode },
      });
    }
  }
}
