// ===========================================================================
//  src/main.ts   (process entry point for the freqs CLI)
// ===========================================================================

import tty from "node:tty";
import { runCli } from "./cli/run";
import { fdStream } from "./sinks/line-sink";

// fd-backed streams so write failures throw inside runCli
process.exitCode = runCli(process.argv.slice(2), {
  stdout: fdStream(1),
  stderr: fdStream(2),
  env: process.env,
  interactive: tty.isatty(2),
});
