#!/usr/bin/env tsx
/**
 * scalar-backprop - trains a small feed-forward network with the scalar autograd engine.
 *
 * Built with Yargs + Zod: flags are declared for help output and validated by schema.
 */

import { hideBin } from "yargs/helpers";
import { runCli } from "./runner";

runCli(hideBin(process.argv), {
  out: line => console.log(line),
  err: line => console.error(line),
}).then(
  outcome => {
    process.exitCode = outcome.exitCode;
  },
  (err: unknown) => {
    console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
);
