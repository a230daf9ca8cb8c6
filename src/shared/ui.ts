import chalk from "chalk";
import type { Writable } from "node:stream";

/** Colored `==>` status lines: blue info, green success, yellow warning, red fatal. */
export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  fail(message: string): void;
  detail(message: string): void;
  /** Dimmed guidance under a fatal line, on stderr. */
  hint(message: string): void;
}

export interface ReporterStreams {
  readonly out: Writable;
  readonly err: Writable;
}

export function createConsoleReporter(
  streams: ReporterStreams = { out: process.stdout, err: process.stderr },
  palette: chalk.Chalk = chalk,
): Reporter {
  const line = (stream: Writable, text: string): void => {
    stream.write(`${text}\n`);
  };
  return {
    info: (message) => line(streams.out, palette.bold.blue(`==> ${message}`)),
    success: (message) => line(streams.out, palette.bold.green(`==> ${message}`)),
    warn: (message) => line(streams.err, palette.bold.yellow(`==> ${message}`)),
    fail: (message) => line(streams.err, palette.bold.red(`==> ${message}`)),
    detail: (message) => line(streams.out, message.length > 0 ? `    ${message}` : ""),
    hint: (message) => line(streams.err, palette.dim(`    ${message}`)),
  };
}
