/**
 * Path resolution utilities.
 * Input expansion and output-path defaulting.
 *
 * @module src/config/paths
 */

import { mkdir, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, isAbsolute, join, normalize } from 'node:path';
import { OUTPUT_FILE_PREFIX } from '../app/constants';

/**
 * Resolve ~ to home directory and normalize path.
 * Converts relative paths with ~ prefix to absolute paths.
 */
export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return join(homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return homedir();
  }
  return normalize(inputPath);
}

/**
 * Ensure path is absolute, expanding ~ if needed.
 * Falls back to current working directory for relative paths.
 */
export function toAbsolutePath(inputPath: string, cwd?: string): string {
  const expanded = expandPath(inputPath);
  if (isAbsolute(expanded)) {
    return expanded;
  }
  return join(cwd ?? process.cwd(), expanded);
}

/**
 * Check if a path exists (file or directory).
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local timestamp as YYYYMMDD_HHMMSS.
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

/**
 * Generated output file name, e.g. collected_files_20240102_030405.txt
 */
export function defaultOutputFileName(date: Date): string {
  return `${OUTPUT_FILE_PREFIX}${fileTimestamp(date)}.txt`;
}

/**
 * Resolve the destination file.
 * - No output: generated name in cwd
 * - Existing directory: generated name inside it
 * - Anything else: that path, creating missing parent directories
 */
export async function resolveOutputPath(
  output: string | undefined,
  options: { cwd?: string; now?: Date } = {}
): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const now = options.now ?? new Date();

  if (!output) {
    return join(cwd, defaultOutputFileName(now));
  }

  const target = toAbsolutePath(output, cwd);
  if (await isDirectory(target)) {
    return join(target, defaultOutputFileName(now));
  }

  await mkdir(dirname(target), { recursive: true });
  return target;
}
