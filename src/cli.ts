#!/usr/bin/env node
import { runCli } from './run.js';

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error && err.stack ? err.stack : String(err));
    process.exit(1);
  });
