import pino from "pino";

// Diagnostics only. User-facing status lines go through ui.ts; this logger writes
// structured records to stderr so they never interleave with command output on stdout.
export const logger = pino(
  {
    name: "canny-bootstrap",
    level: process.env.LOG_LEVEL ?? "warn",
  },
  pino.destination(2),
);

/** Raise the level for --verbose. */
export function enableVerboseLogging(): void {
  logger.level = "debug";
}
