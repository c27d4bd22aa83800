/**
 * Hidden entry detection.
 *
 * Only the dot-prefix convention is checked. The Windows hidden attribute is
 * not exposed by node:fs.
 *
 * @module src/discovery/hidden
 */

import { basename } from 'node:path';

/**
 * Check if a path's final component is hidden.
 * "." and ".." are path syntax, not hidden names.
 */
export function isHidden(entryPath: string): boolean {
  const name = basename(entryPath);
  if (name === '.' || name === '..') {
    return false;
  }
  return name.startsWith('.');
}
