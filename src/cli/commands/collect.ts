/**
 * collate command implementation.
 * Gathers files under the inputs and streams them into one framed output.
 *
 * @module src/cli/commands/collect
 */

import { stat } from 'node:fs/promises';
import { ENCODING_REPORT_LIMIT } from '../../app/constants';
import {
  maxSizeMbToBytes,
  pathExists,
  resolveOutputPath,
  type RunSettings,
  RunSettingsSchema,
} from '../../config';
import {
  collectFiles,
  type FileOutcome,
  gatherFileList,
  type OutputSink,
  openFileSink,
  outputBanner,
  type RunStats,
} from '../../ingestion';
import * as colors from '../colors';
import { CliError } from '../errors';
import { selectProgressReporter } from '../progress';
import { debug, hint, type OutputPolicy, warn } from '../ui';
import {
  formatDiscoveryEvent,
  humanSize,
  resolveSource,
  type SourceFlags,
  settingsError,
} from './shared';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for collect command.
 */
export type CollectCommandOptions = SourceFlags & {
  /** Output file or directory */
  output?: string;
  /** Size limit in MB (0 disables) */
  maxSizeMb?: number;
  append?: boolean;
  encodingReport?: boolean;
  workers?: number;
  policy: OutputPolicy;
  /** Clock for banner and generated names */
  now?: Date;
};

/**
 * Result of collect command.
 */
export type CollectResult =
  | {
      success: true;
      status: 'empty';
      settings: RunSettings;
      missing: string[];
    }
  | {
      success: true;
      status: 'done';
      settings: RunSettings;
      missing: string[];
      appended: boolean;
      stats: RunStats;
      /** Output size after the run (null if it could not be read) */
      outputSize: number | null;
    }
  | { success: false; error: CliError };

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function describeOutcome(outcome: FileOutcome): string | null {
  switch (outcome.status) {
    case 'skipped-large':
      return `Skipped (too large ${humanSize(outcome.size)}): ${outcome.path}`;
    case 'skipped-binary':
      return `Skipped (binary-like): ${outcome.path}`;
    case 'error':
      return outcome.stage === 'sample'
        ? `Error reading (sample) ${outcome.path}: ${outcome.message}`
        : `Error processing ${outcome.path}: ${outcome.message}`;
    case 'processed':
      return null;
  }
}

async function sizeOf(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).size;
  } catch {
    return null;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Command
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Execute the collect command.
 */
export async function collect(
  options: CollectCommandOptions
): Promise<CollectResult> {
  const { policy } = options;

  const resolved = await resolveSource(options);
  if (!resolved.ok) {
    return { success: false, error: resolved.error };
  }
  const { defaults } = resolved.config;
  const { missing } = resolved;

  for (const root of missing) {
    warn(
      colors.warning(
        `Warning: input ${root} does not exist and will be skipped.`
      ),
      policy
    );
  }

  const outputPath = await resolveOutputPath(options.output, {
    cwd: options.cwd,
    now: options.now,
  });

  const parsed = RunSettingsSchema.safeParse({
    ...resolved.settings,
    outputPath,
    maxSizeBytes: maxSizeMbToBytes(options.maxSizeMb ?? defaults.maxSizeMb),
    append: options.append ?? defaults.append,
    encodingReport: options.encodingReport ?? defaults.encodingReport,
    workers: options.workers,
  });
  if (!parsed.success) {
    return { success: false, error: settingsError(parsed.error.issues) };
  }
  const settings = parsed.data;

  if (settings.workers > 1) {
    debug(
      `--workers ${settings.workers} ignored: files are processed sequentially`,
      policy
    );
  }

  hint('Discovering files...', policy);
  let files: string[];
  try {
    files = await gatherFileList(settings.roots, {
      includeHidden: settings.includeHidden,
      followSymlinks: settings.followSymlinks,
      maxDepth: settings.maxDepth,
      outputPath,
      onEvent: policy.verbose
        ? (event) => {
            debug(formatDiscoveryEvent(event), policy);
          }
        : undefined,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: new CliError('RUNTIME', `Failed during discovery: ${message}`),
    };
  }

  if (files.length === 0) {
    return { success: true, status: 'empty', settings, missing };
  }

  const appended = settings.append && (await pathExists(outputPath));

  let sink: OutputSink;
  try {
    sink = await openFileSink(outputPath, { append: appended });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: new CliError(
        'RUNTIME',
        `Cannot open output file ${outputPath} for writing: ${message}`
      ),
    };
  }

  const progress = selectProgressReporter(
    policy,
    files.length,
    'Collecting files'
  );
  let stats: RunStats;
  try {
    if (!appended) {
      await sink.write(
        Buffer.from(outputBanner(options.now ?? new Date()), 'utf8')
      );
    }
    stats = await collectFiles(files, sink, {
      maxSizeBytes: settings.maxSizeBytes,
      recordEncodings: settings.encodingReport,
      progress,
      onFileEvent: (outcome) => {
        const line = describeOutcome(outcome);
        if (line) {
          debug(line, policy);
        }
        if (outcome.closeError) {
          debug(
            `Error closing ${outcome.path}: ${outcome.closeError}`,
            policy
          );
        }
      },
    });
  } finally {
    await sink.close();
    progress.finish();
  }

  return {
    success: true,
    status: 'done',
    settings,
    missing,
    appended,
    stats,
    outputSize: await sizeOf(outputPath),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Format collect result for output.
 */
export function formatCollect(
  result: CollectResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error.message}`;
  }

  if (result.status === 'empty') {
    return options.json
      ? JSON.stringify({ outputPath: null, totalFiles: 0, processed: 0 })
      : 'No files found to process.';
  }

  const { stats, settings } = result;

  if (options.json) {
    return JSON.stringify(
      {
        outputPath: settings.outputPath,
        appended: result.appended,
        outputSize: result.outputSize,
        totalFiles: stats.totalFiles,
        processed: stats.processed,
        skippedBinary: stats.skippedBinary,
        skippedLarge: stats.skippedLarge,
        errors: stats.errors,
        ...(settings.encodingReport && {
          encodings: Object.fromEntries(stats.encodings),
        }),
      },
      null,
      2
    );
  }

  const lines: string[] = [colors.header('Summary:')];
  lines.push(`  Files discovered: ${stats.totalFiles}`);
  lines.push(`  Files processed:  ${colors.success(String(stats.processed))}`);
  if (stats.skippedBinary > 0) {
    lines.push(`  Skipped (binary-like): ${stats.skippedBinary}`);
  }
  if (stats.skippedLarge > 0) {
    lines.push(`  Skipped (too large): ${stats.skippedLarge}`);
  }
  if (stats.errors > 0) {
    lines.push(`  Errors: ${colors.error(String(stats.errors))}`);
  }
  const size =
    result.outputSize === null ? '' : `  (size: ${humanSize(result.outputSize)})`;
  lines.push(`  Output file: ${colors.path(settings.outputPath)}${size}`);

  if (settings.encodingReport && stats.encodings.size > 0) {
    const entries = [...stats.encodings.entries()];
    lines.push('');
    lines.push(colors.header('Encodings detected (sample):'));
    for (const [filePath, encoding] of entries.slice(0, ENCODING_REPORT_LIMIT)) {
      lines.push(`  ${filePath} -> ${colors.muted(encoding)}`);
    }
    if (entries.length > ENCODING_REPORT_LIMIT) {
      lines.push(`  ... and ${entries.length - ENCODING_REPORT_LIMIT} more`);
    }
  }

  return lines.join('\n');
}
