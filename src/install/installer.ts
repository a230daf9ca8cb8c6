import { randomBytes } from "node:crypto";
import { lstat, stat } from "node:fs/promises";
import path from "node:path";
import { describeError, installError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import type { BuildArtifact, InstallTarget, InstalledBinary, UninstallResult } from "../types/install.js";
import type { TargetFileOps } from "./file-ops.js";
import { binaryPath } from "./targets.js";

/**
 * Places the built executable on an install target.
 *
 * The copy lands in a hidden temporary file beside the destination and is renamed
 * over it, so an interrupted install leaves either the previous binary or the new
 * one at the destination path.
 */
export class Installer {
  constructor(private readonly binary: string) {}

  async install(artifact: BuildArtifact, target: InstallTarget, ops: TargetFileOps): Promise<InstalledBinary> {
    await assertArtifactFile(artifact);

    const destination = binaryPath(target, this.binary);
    const staging = path.join(target.directory, `.${this.binary}.${randomBytes(4).toString("hex")}.tmp`);

    await ops.ensureDir(target.directory);
    try {
      await ops.copy(artifact.outputPath, staging);
      await ops.makeExecutable(staging);
      await ops.rename(staging, destination);
    } catch (err) {
      await discardStaging(ops, staging);
      throw err;
    }

    logger.debug({ destination, target: target.kind }, "Binary installed");
    return { path: destination, target };
  }

  /** Removes this target's binary only; absent is a no-op. */
  async uninstall(target: InstallTarget, ops: TargetFileOps): Promise<UninstallResult> {
    const destination = binaryPath(target, this.binary);
    if (!(await pathExists(destination))) {
      return { path: destination, removed: false };
    }
    await ops.remove(destination);
    logger.debug({ destination, target: target.kind }, "Binary removed");
    return { path: destination, removed: true };
  }

  /** Whether this target currently holds the binary. Used to skip elevation for no-op uninstalls. */
  async isInstalled(target: InstallTarget): Promise<boolean> {
    return pathExists(binaryPath(target, this.binary));
  }
}

async function assertArtifactFile(artifact: BuildArtifact): Promise<void> {
  let isFile: boolean;
  try {
    isFile = (await stat(artifact.outputPath)).isFile();
  } catch (err) {
    throw installError(`Build artifact not found: ${artifact.outputPath}`, { context: { cause: describeError(err) } });
  }
  if (!isFile) {
    throw installError(`Build artifact is not a file: ${artifact.outputPath}`);
  }
}

async function discardStaging(ops: TargetFileOps, staging: string): Promise<void> {
  try {
    await ops.remove(staging);
  } catch (cleanupErr) {
    logger.warn({ staging, error: describeError(cleanupErr) }, "Could not remove staging file");
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await lstat(filePath);
    return true;
  } catch {
    return false;
  }
}
