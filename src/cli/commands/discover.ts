/**
 * collate --debug-discovery implementation.
 * Lists every discovery decision and the files a run would process,
 * without writing any output.
 *
 * @module src/cli/commands/discover
 */

import type { SourceSettings } from '../../config';
import { type DiscoveryEvent, discoverFiles } from '../../discovery';
import type { CliError } from '../errors';
import { formatDiscoveryEvent, resolveSource, type SourceFlags } from './shared';

export type DiscoverResult =
  | {
      success: true;
      settings: SourceSettings;
      events: DiscoveryEvent[];
      files: string[];
    }
  | { success: false; error: CliError };

/**
 * Run discovery only, recording events and would-be files.
 */
export async function discover(flags: SourceFlags): Promise<DiscoverResult> {
  const resolved = await resolveSource(flags);
  if (!resolved.ok) {
    return { success: false, error: resolved.error };
  }
  const { settings } = resolved;

  const events: DiscoveryEvent[] = [];
  const files: string[] = [];
  for await (const filePath of discoverFiles(settings.roots, {
    includeHidden: settings.includeHidden,
    followSymlinks: settings.followSymlinks,
    maxDepth: settings.maxDepth,
    onEvent: (event) => {
      events.push(event);
    },
  })) {
    files.push(filePath);
  }

  return { success: true, settings, events, files };
}

/**
 * Format discover result for output.
 */
export function formatDiscover(
  result: DiscoverResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error.message}`;
  }

  if (options.json) {
    return JSON.stringify(
      { events: result.events, files: result.files },
      null,
      2
    );
  }

  const lines: string[] = ['Running discovery in debug mode...'];
  for (const event of result.events) {
    lines.push(formatDiscoveryEvent(event));
  }
  for (const filePath of result.files) {
    lines.push(` WOULD-PROCESS: ${filePath}`);
  }
  lines.push(`Debug discovery finished (${result.files.length} files).`);
  return lines.join('\n');
}
