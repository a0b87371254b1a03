#!/usr/bin/env node
import { runCli } from "./main.js";

void runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("pbisect: unexpected failure");
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
  });
