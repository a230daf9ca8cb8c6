import path from "node:path";
import type { BuildProfile } from "../types/install.js";
import type { BuildSystem, BuildTask } from "./types.js";

const TASK_COMMANDS: Record<BuildTask, string[]> = {
  clean: ["cargo", "clean"],
  test: ["cargo", "test"],
  check: ["cargo", "check"],
  fmt: ["cargo", "fmt"],
  lint: ["cargo", "clippy"],
};

export class CargoBuildSystem implements BuildSystem {
  buildCommand(profile: BuildProfile): string[] {
    return profile === "release" ? ["cargo", "build", "--release"] : ["cargo", "build"];
  }

  taskCommand(task: BuildTask): string[] {
    return [...TASK_COMMANDS[task]];
  }

  artifactPath(sourceRoot: string, profile: BuildProfile, binary: string): string {
    return path.join(sourceRoot, "target", profile, binary);
  }
}
