#!/usr/bin/env node
/**
 * Collate CLI entry point.
 * Thin bootstrap that delegates to CLI runner.
 *
 * @module src/index
 */

import { runCli } from './cli/run';

// SIGINT: report and exit with the conventional interrupt code
process.on('SIGINT', () => {
  process.stderr.write('\nInterrupted by user.\n');
  process.exit(130);
});

runCli(process.argv)
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    process.stderr.write(
      `Fatal error: ${err instanceof Error ? err.message : String(err)}\n`
    );
    process.exit(2);
  });
