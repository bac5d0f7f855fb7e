#!/usr/bin/env node
import { run } from "./cli/run.js";
import { stdoutErrorStatus } from "./cli/stdout.js";

const stderr = (line: string) => process.stderr.write(`${line}\n`);

process.stdout.on("error", (err) => {
  process.exit(stdoutErrorStatus(err, stderr));
});

process.exitCode = run(process.argv.slice(2), {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr,
});
