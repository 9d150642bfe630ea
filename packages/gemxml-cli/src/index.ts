#!/usr/bin/env tsx
import { runCli } from "./commands.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Fatal error: ${err}`);
    process.exitCode = 1;
  });
