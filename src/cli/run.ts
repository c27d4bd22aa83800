/**
 * CLI runner - main entry point.
 * Parses argv, handles errors, returns exit code.
 *
 * @module src/cli/run
 */

import { CommanderError } from 'commander';
import { CLI_NAME, PRODUCT_NAME } from '../app/constants';
import { CliError, exitCodeFor, formatErrorForOutput } from './errors';
import { createProgram, resetGlobals } from './program';

/**
 * Check if argv contains --json flag (before end-of-options marker).
 * Used for error formatting before command parsing completes.
 */
function argvWantsJson(argv: string[]): boolean {
  for (const arg of argv) {
    if (arg === '--') {
      break; // Stop at end-of-options marker
    }
    if (arg === '--json') {
      return true;
    }
  }
  return false;
}

/**
 * Print concise help when run with no arguments at all.
 * Brief usage, examples, and a pointer to --help.
 */
function printConciseHelp(): void {
  process.stdout.write(`${PRODUCT_NAME} - collect text files into a single output file

Usage: ${CLI_NAME} <inputs...> [options]

Examples:
  ${CLI_NAME} src docs                   Collect two directories
  ${CLI_NAME} . -o out/ --depth 2        Two levels deep, output in out/
  ${CLI_NAME} . --debug-discovery        Show what would be collected

Run '${CLI_NAME} --help' for all options.
`);
}

/**
 * Run CLI and return exit code.
 * No process.exit() - caller sets process.exitCode.
 */
export async function runCli(argv: string[]): Promise<number> {
  // Reset global state for clean invocation (important for testing)
  resetGlobals();

  if (argv.length <= 2) {
    printConciseHelp();
    return 0;
  }

  const isJson = argvWantsJson(argv);
  const program = createProgram();

  // Suppress Commander's stderr output in JSON mode
  // so callers get only our structured JSON envelope
  if (isJson) {
    program.configureOutput({
      writeErr: () => {
        // Intentionally empty: suppress Commander's stderr
      },
    });
  }

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CliError) {
      const output = formatErrorForOutput(err, { json: isJson });
      process.stderr.write(`${output}\n`);
      return exitCodeFor(err);
    }

    // Commander errors (exitOverride throws these)
    if (err instanceof CommanderError) {
      // Help/version are "successful" exits
      if (
        err.code === 'commander.helpDisplayed' ||
        err.code === 'commander.help' ||
        err.code === 'commander.version'
      ) {
        return 0;
      }

      // Missing inputs, unknown options
      if (isJson) {
        const cliErr = new CliError('VALIDATION', err.message, {
          commanderCode: err.code,
        });
        const output = formatErrorForOutput(cliErr, { json: true });
        process.stderr.write(`${output}\n`);
      }
      return 1;
    }

    // Unexpected errors
    const message = err instanceof Error ? err.message : String(err);
    if (isJson) {
      const cliErr = new CliError('RUNTIME', message);
      const output = formatErrorForOutput(cliErr, { json: true });
      process.stderr.write(`${output}\n`);
    } else {
      process.stderr.write(`Error: ${message}\n`);
    }
    return 2;
  }
}
