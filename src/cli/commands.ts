import type { BootstrapConfig } from "../types/config.js";

export type CommandName =
  | "build"
  | "release"
  | "install"
  | "install-user"
  | "uninstall"
  | "uninstall-user"
  | "clean"
  | "test"
  | "check"
  | "fmt"
  | "lint"
  | "help";

export interface CommandInfo {
  readonly name: CommandName;
  summary(config: BootstrapConfig): string;
}

export const COMMANDS: readonly CommandInfo[] = [
  { name: "build", summary: () => "Build debug version" },
  { name: "release", summary: () => "Build release version" },
  { name: "install", summary: (c) => `Install to ${c.targets.system_dir} (requires sudo)` },
  {
    name: "install-user",
    summary: (c) => `Install to ~/${c.targets.user_base_default}/${c.targets.user_bin_subdir} (no sudo required)`,
  },
  { name: "uninstall", summary: (c) => `Remove from ${c.targets.system_dir}` },
  {
    name: "uninstall-user",
    summary: (c) => `Remove from ~/${c.targets.user_base_default}/${c.targets.user_bin_subdir}`,
  },
  { name: "clean", summary: () => "Remove build artifacts" },
  { name: "test", summary: () => "Run tests" },
  { name: "check", summary: () => "Check code without building" },
  { name: "fmt", summary: () => "Format code" },
  { name: "lint", summary: () => "Run clippy linter" },
  { name: "help", summary: () => "Show this help" },
];

export const PROGRAM_NAME = "canny-bootstrap";

/** The static command table printed by `help` and by a bare invocation. */
export function renderHelp(config: BootstrapConfig): string {
  const width = Math.max(...COMMANDS.map((command) => command.name.length)) + 2;
  const lines = [
    `${config.binary} bootstrap`,
    "",
    "Usage:",
    `  ${PROGRAM_NAME} [options] <command>`,
    "",
    "Commands:",
    ...COMMANDS.map((command) => `  ${command.name.padEnd(width)}${command.summary(config)}`),
    "",
    "Options:",
    "  --source-root <dir>  Directory containing the sources (default: current directory)",
    "  --non-interactive    Never prompt for a sudo password",
    "  --verbose            Print debug logs to stderr",
  ];
  return `${lines.join("\n")}\n`;
}
