/**
 * File-list gathering.
 * Drains discovery into a concrete list so the total is known up front,
 * and drops the output file if discovery found it.
 *
 * @module src/ingestion/gather
 */

import { realpath, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { discoverFiles } from '../discovery/walker';
import type { GatherOptions } from './types';

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function canonicalPath(filePath: string): Promise<string> {
  try {
    return await realpath(filePath);
  } catch {
    return resolve(filePath);
  }
}

/**
 * Collect every discovered file, in discovery order.
 */
export async function gatherFileList(
  roots: readonly string[],
  options: GatherOptions = {}
): Promise<string[]> {
  const { outputPath, ...discovery } = options;
  const outputKey = outputPath ? await canonicalPath(outputPath) : null;

  const files: string[] = [];
  for await (const filePath of discoverFiles(roots, discovery)) {
    if (!(await isRegularFile(filePath))) {
      continue;
    }
    if (outputKey !== null && (await canonicalPath(filePath)) === outputKey) {
      continue;
    }
    files.push(filePath);
  }
  return files;
}
