/**
 * Commander program definition.
 * One root command: collate <inputs...> [options].
 *
 * @module src/cli/program
 */

import { Command } from 'commander';
import {
  CLI_NAME,
  DEFAULT_MAX_SIZE_MB,
  PRODUCT_NAME,
  VERSION,
} from '../app/constants';
import { setColorsEnabled } from './colors';
import { collect, formatCollect } from './commands/collect';
import { discover, formatDiscover } from './commands/discover';
import { applyGlobalOptions, parseGlobalOptions } from './context';
import { CliError } from './errors';
import {
  optionalFlag,
  parseOptionalNonNegativeFloat,
  parseOptionalNonNegativeInt,
  parsePositiveInt,
} from './options';
import { data, info } from './ui';

/**
 * Reset global state (for testing).
 * Resets color state to avoid test pollution.
 */
export function resetGlobals(): void {
  // Reset colors to default (true) - will be set by applyGlobalOptions on next run
  setColorsEnabled(true);
}

/**
 * Resolve --depth / --scale (aliases). Both given must agree.
 */
function parseDepth(cmdOpts: Record<string, unknown>): number | undefined {
  const depth = parseOptionalNonNegativeInt('depth', cmdOpts.depth);
  const scale = parseOptionalNonNegativeInt('scale', cmdOpts.scale);
  if (depth !== undefined && scale !== undefined && depth !== scale) {
    throw new CliError(
      'VALIDATION',
      `--depth and --scale disagree (${depth} vs ${scale}). Use one.`
    );
  }
  return depth ?? scale;
}

// ─────────────────────────────────────────────────────────────────────────────
// Program Factory
// ─────────────────────────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(
      `${PRODUCT_NAME} - collect text files into a single output file`
    )
    .version(VERSION, '-V, --version', 'show version')
    .exitOverride() // Prevent Commander from calling process.exit()
    .showSuggestionAfterError(true)
    .showHelpAfterError('(Use --help for available options)')
    .argument('<inputs...>', 'input file(s) and/or directory(ies)')
    .option(
      '-o, --output <path>',
      'output file; a directory gets a generated file name'
    )
    .option(
      '--depth <n>',
      'directory levels to descend (0 = root files only, default: unlimited)'
    )
    .option('--scale <n>', 'alias for --depth')
    .option('--include-hidden', 'include hidden files and directories')
    .option('--follow-symlinks', 'follow symbolic links')
    .option(
      '--max-size <mb>',
      `skip files larger than this many MB (default: ${DEFAULT_MAX_SIZE_MB}, 0 = no limit)`
    )
    .option('--append', 'append to the output file if it exists')
    .option('--encoding-report', 'list the encoding used for each file')
    .option('--workers <n>', 'reserved for parallelism (1 = sequential)')
    .option(
      '--debug-discovery',
      'print discovery decisions and the files that would be processed, then exit'
    )
    .option('--config <path>', 'config file path')
    .option('--no-color', 'disable colors')
    .option('-v, --verbose', 'verbose logging')
    .option('-q, --quiet', 'suppress non-essential output')
    .option('--json', 'JSON output (for errors and the summary)')
    .action(async (inputs: string[], cmdOpts: Record<string, unknown>) => {
      const globals = parseGlobalOptions(cmdOpts);
      const policy = applyGlobalOptions(globals);

      const source = {
        inputs,
        includeHidden: optionalFlag(cmdOpts.includeHidden),
        followSymlinks: optionalFlag(cmdOpts.followSymlinks),
        maxDepth: parseDepth(cmdOpts),
        configPath: globals.config,
      };

      if (cmdOpts.debugDiscovery) {
        const result = await discover(source);
        if (!result.success) {
          throw result.error;
        }
        data(formatDiscover(result, { json: globals.json }));
        return;
      }

      const result = await collect({
        ...source,
        output: typeof cmdOpts.output === 'string' ? cmdOpts.output : undefined,
        maxSizeMb: parseOptionalNonNegativeFloat('max-size', cmdOpts.maxSize),
        append: optionalFlag(cmdOpts.append),
        encodingReport: optionalFlag(cmdOpts.encodingReport),
        workers:
          cmdOpts.workers === undefined
            ? undefined
            : parsePositiveInt('workers', cmdOpts.workers),
        policy,
      });
      if (!result.success) {
        throw result.error;
      }

      if (result.status === 'empty' && !globals.json) {
        info(formatCollect(result));
        return;
      }
      data(formatCollect(result, { json: globals.json }));
    });

  return program;
}
