/**
 * Identity keys for loop prevention and dedup.
 *
 * Some filesystems (network mounts, FAT/exFAT on Windows) report zero for
 * both dev and ino. Keying on those would collapse every entry into one, so
 * such entries are keyed by their resolved path instead.
 *
 * @module src/discovery/identity
 */

import type { BigIntStats } from 'node:fs';
import { lstat, realpath, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { IdentityKey } from './types';

async function statEntry(
  entryPath: string,
  followSymlinks: boolean
): Promise<BigIntStats | null> {
  try {
    return followSymlinks
      ? await stat(entryPath, { bigint: true })
      : await lstat(entryPath, { bigint: true });
  } catch {
    return null;
  }
}

async function pathKey(entryPath: string): Promise<IdentityKey> {
  try {
    return { kind: 'path', path: await realpath(entryPath) };
  } catch {
    return { kind: 'path', path: resolve(entryPath) };
  }
}

/**
 * Compute the identity key for an entry.
 * Never throws; the caller owns the seen-set.
 */
export async function identityKeyFor(
  entryPath: string,
  followSymlinks: boolean
): Promise<IdentityKey> {
  const st = await statEntry(entryPath, followSymlinks);
  if (!st || (st.dev === 0n && st.ino === 0n)) {
    return pathKey(entryPath);
  }
  return { kind: 'inode', dev: st.dev, ino: st.ino };
}

/**
 * Stable string form for Set membership.
 */
export function identityKeyToString(key: IdentityKey): string {
  return key.kind === 'inode'
    ? `inode:${key.dev}:${key.ino}`
    : `path:${key.path}`;
}
