/**
 * Discovery engine.
 * Walks roots with an explicit stack, applying hidden filtering, the
 * symlink-follow policy, a depth bound and identity-based loop prevention.
 *
 * @module src/discovery/walker
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { isHidden } from './hidden';
import { identityKeyFor, identityKeyToString } from './identity';
import type {
  DiscoveryEvent,
  DiscoveryOptions,
  TraversalFrame,
} from './types';

type EntryKind = 'file' | 'dir' | 'other';

type RootKind = EntryKind | 'missing';

async function rootKind(rootPath: string): Promise<RootKind> {
  try {
    const st = await stat(rootPath);
    if (st.isFile()) {
      return 'file';
    }
    return st.isDirectory() ? 'dir' : 'other';
  } catch {
    return 'missing';
  }
}

/**
 * Classify a directory entry under the follow policy.
 * Without following, a symlink is neither a file nor a directory.
 */
async function entryKind(
  entry: Dirent,
  entryPath: string,
  followSymlinks: boolean
): Promise<EntryKind> {
  if (entry.isSymbolicLink()) {
    if (!followSymlinks) {
      return 'other';
    }
    try {
      const st = await stat(entryPath);
      if (st.isFile()) {
        return 'file';
      }
      return st.isDirectory() ? 'dir' : 'other';
    } catch {
      // Broken link
      return 'other';
    }
  }
  if (entry.isFile()) {
    return 'file';
  }
  return entry.isDirectory() ? 'dir' : 'other';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Lazily yield every qualifying file under the given roots.
 *
 * Each call starts with an empty seen-set, so the generator is restartable.
 * Explicit file roots are yielded as-is: no hidden or dedup checks apply.
 * Identity keys are recorded before the hidden check, so a hidden entry
 * that loops back into the tree is still marked seen.
 */
export async function* discoverFiles(
  roots: Iterable<string>,
  options: DiscoveryOptions = {}
): AsyncGenerator<string, void, undefined> {
  const includeHidden = options.includeHidden ?? false;
  const followSymlinks = options.followSymlinks ?? false;
  const { maxDepth } = options;
  const emit = (event: DiscoveryEvent): void => {
    options.onEvent?.(event);
  };

  const seen = new Set<string>();

  for (const root of roots) {
    const kind = await rootKind(root);
    if (kind === 'file') {
      emit({ type: 'root-file', path: root });
      yield root;
      continue;
    }
    if (kind === 'missing') {
      emit({ type: 'root-missing', path: root });
      continue;
    }

    const stack: TraversalFrame[] = [{ dir: root, depth: 0 }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) {
        break;
      }
      const { dir, depth } = frame;

      if (!includeHidden && isHidden(dir)) {
        emit({ type: 'skip-hidden-dir', path: dir });
        continue;
      }

      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (err) {
        emit({ type: 'read-dir-failed', path: dir, message: errorMessage(err) });
        continue;
      }
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const entryPath = join(dir, entry.name);

        const key = identityKeyToString(
          await identityKeyFor(entryPath, followSymlinks)
        );
        if (seen.has(key)) {
          emit({ type: 'skip-seen', path: entryPath, key });
          continue;
        }
        seen.add(key);

        if (!includeHidden && isHidden(entryPath)) {
          emit({ type: 'skip-hidden', path: entryPath });
          continue;
        }

        const childKind = await entryKind(entry, entryPath, followSymlinks);
        if (childKind === 'file') {
          emit({ type: 'file', path: entryPath });
          yield entryPath;
        } else if (childKind === 'dir') {
          emit({ type: 'dir', path: entryPath, depth });
          if (maxDepth === undefined || depth + 1 <= maxDepth) {
            stack.push({ dir: entryPath, depth: depth + 1 });
          } else {
            emit({ type: 'depth-limit', path: entryPath, depth });
          }
        }
      }
    }
  }
}
