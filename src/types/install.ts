/** Build profile of the external build system. */
export type BuildProfile = "debug" | "release";

export type InstallTargetKind = "system" | "user";

/** Where the binary goes and whether writing there needs elevation. */
export interface InstallTarget {
  readonly kind: InstallTargetKind;
  readonly directory: string;
  readonly requiresElevation: boolean;
}

/** Output of a successful build. Frozen once created. */
export interface BuildArtifact {
  readonly sourceRoot: string;
  readonly outputPath: string;
  readonly profile: BuildProfile;
}

export interface InstalledBinary {
  readonly path: string;
  readonly target: InstallTarget;
}

export interface UninstallResult {
  readonly path: string;
  /** False when nothing was installed there. */
  readonly removed: boolean;
}
