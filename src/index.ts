#!/usr/bin/env node
import { LOCAL_FAILURE_EXIT_CODE, main } from './cli.js';
import { UsageError, USAGE } from './cli/args.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`remote-exec: ${message}`);
    if (error instanceof UsageError) {
      console.error(USAGE);
    }
    process.exitCode = LOCAL_FAILURE_EXIT_CODE;
  });
