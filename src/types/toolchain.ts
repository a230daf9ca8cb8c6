/**
 * Result of probing one toolchain. Never cached across runs.
 * `version` is only ever set when `present` is true.
 */
export type ToolchainState =
  | { readonly name: string; readonly present: true; readonly version?: string }
  | { readonly name: string; readonly present: false };

export function absentToolchain(name: string): ToolchainState {
  return { name, present: false };
}

export function presentToolchain(name: string, version?: string): ToolchainState {
  return version === undefined ? { name, present: true } : { name, present: true, version };
}
