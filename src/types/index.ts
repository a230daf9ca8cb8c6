export type { ToolchainState } from "./toolchain.js";
export { absentToolchain, presentToolchain } from "./toolchain.js";
export type { BuildProfile, InstallTargetKind, InstallTarget, BuildArtifact, InstalledBinary, UninstallResult } from "./install.js";
export type { BootstrapConfig, ToolchainSpec } from "./config.js";
