#!/usr/bin/env node

import { runCli } from "./cli/program.js";
import { captureEnvironment } from "./shared/environment.js";
import { ExecaRunner } from "./shared/exec.js";
import { createConsoleReporter } from "./shared/ui.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    env: captureEnvironment(),
    runner: new ExecaRunner(),
    reporter: createConsoleReporter(),
    writeOut: (text) => process.stdout.write(text),
    writeErr: (text) => process.stderr.write(text),
  });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
