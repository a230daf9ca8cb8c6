import type { BuildProfile } from "../types/install.js";

/** Build-system subcommands that are passed through without orchestration. */
export type BuildTask = "clean" | "test" | "check" | "fmt" | "lint";

export const BUILD_TASKS: readonly BuildTask[] = ["clean", "test", "check", "fmt", "lint"];

/** Adapter for the external build system that produces the target executable. */
export interface BuildSystem {
  buildCommand(profile: BuildProfile): string[];
  taskCommand(task: BuildTask): string[];
  /** Where `buildCommand(profile)` leaves the executable. */
  artifactPath(sourceRoot: string, profile: BuildProfile, binary: string): string;
}
