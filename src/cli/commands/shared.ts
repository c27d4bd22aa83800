/**
 * Shared CLI command utilities.
 * Settings resolution and formatting helpers used by collect and discover.
 *
 * @module src/cli/commands/shared
 */

import {
  type Config,
  createDefaultConfig,
  loadConfig,
  pathExists,
  type SourceSettings,
  SourceSettingsSchema,
  toAbsolutePath,
} from '../../config';
import type { DiscoveryEvent } from '../../discovery';
import { CliError, configLoadError } from '../errors';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Discovery flags; undefined means "not given on the command line" */
export type SourceFlags = {
  inputs: string[];
  includeHidden?: boolean;
  followSymlinks?: boolean;
  maxDepth?: number;
  /** Override config path */
  configPath?: string;
  /** Base for relative inputs (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type ResolvedSource =
  | {
      ok: true;
      config: Config;
      settings: SourceSettings;
      /** Roots that do not exist (skipped by discovery) */
      missing: string[];
    }
  | { ok: false; error: CliError };

// ─────────────────────────────────────────────────────────────────────────────
// Settings Resolution
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Load the config file (if any) and merge flags over its defaults.
 * Precedence: flag > config file > built-in default.
 */
export async function resolveSource(
  flags: SourceFlags
): Promise<ResolvedSource> {
  const loaded = await loadConfig(flags.configPath, flags.env);
  if (!loaded.ok) {
    return { ok: false, error: configLoadError(loaded.error) };
  }
  const config = loaded.value ?? createDefaultConfig();
  const { defaults } = config;

  const parsed = SourceSettingsSchema.safeParse({
    roots: flags.inputs.map((input) => toAbsolutePath(input, flags.cwd)),
    includeHidden: flags.includeHidden ?? defaults.includeHidden,
    followSymlinks: flags.followSymlinks ?? defaults.followSymlinks,
    maxDepth: flags.maxDepth ?? defaults.maxDepth,
  });
  if (!parsed.success) {
    return { ok: false, error: settingsError(parsed.error.issues) };
  }

  const missing: string[] = [];
  for (const root of parsed.data.roots) {
    if (!(await pathExists(root))) {
      missing.push(root);
    }
  }

  return { ok: true, config, settings: parsed.data, missing };
}

/**
 * Validation error for settings that failed schema checks.
 */
export function settingsError(
  issues: ReadonlyArray<{ path: (string | number)[]; message: string }>
): CliError {
  const messages = issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join('.')}: ${issue.message}`
      : issue.message
  );
  return new CliError('VALIDATION', `Invalid options: ${messages.join('; ')}`);
}

// ─────────────────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Format a byte count, e.g. 1536 -> "1.5KB".
 */
export function humanSize(bytes: number): string {
  let n = bytes;
  for (const unit of ['B', 'KB', 'MB', 'GB', 'TB']) {
    if (n < 1024) {
      return `${n.toFixed(1)}${unit}`;
    }
    n /= 1024;
  }
  return `${n.toFixed(1)}PB`;
}

/**
 * One line per discovery decision, for --verbose and --debug-discovery.
 */
export function formatDiscoveryEvent(event: DiscoveryEvent): string {
  switch (event.type) {
    case 'root-file':
      return `DISCOVER: root is file -> ${event.path}`;
    case 'root-missing':
      return `DISCOVER: root does not exist -> ${event.path}`;
    case 'skip-hidden-dir':
      return `DISCOVER: skip hidden dir -> ${event.path}`;
    case 'read-dir-failed':
      return `DISCOVER: cannot read directory ${event.path}: ${event.message}`;
    case 'skip-hidden':
      return `DISCOVER: skip hidden -> ${event.path}`;
    case 'skip-seen':
      return `DISCOVER: skip seen -> ${event.path} (key=${event.key})`;
    case 'file':
      return `DISCOVER: file -> ${event.path}`;
    case 'dir':
      return `DISCOVER: dir -> ${event.path} (depth=${event.depth})`;
    case 'depth-limit':
      return `DISCOVER: depth limit reached, not descending -> ${event.path}`;
  }
}
