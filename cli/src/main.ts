/**
 * @file main.ts
 * @description Entry point for the FireSync command-line game.
 */

import { EXIT_FAILURE, runCli } from './cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[Game] Unexpected error:', error);
    process.exitCode = EXIT_FAILURE;
  });
