/**
 * Discovery engine tests.
 * @module test/discovery/walker.test
 */

import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { symlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { DiscoveryEvent, DiscoveryOptions } from '../../src/discovery';
import { discoverFiles } from '../../src/discovery';
import { safeRm } from '../helpers/cleanup';
import { makeTempDir, writeTree } from '../helpers/tree';

async function discoverAll(
  roots: string[],
  options: DiscoveryOptions = {}
): Promise<string[]> {
  const files: string[] = [];
  for await (const filePath of discoverFiles(roots, options)) {
    files.push(filePath);
  }
  return files;
}

describe('discoverFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await writeTree(root, {
      'a.txt': 'a',
      'b/c.txt': 'c',
      'b/d/e.txt': 'e',
      '.hidden/h.txt': 'h',
      '.dot.txt': 'dot',
    });
  });

  afterEach(async () => {
    await safeRm(root);
  });

  test('walks the tree depth-first, skipping hidden entries', async () => {
    const files = await discoverAll([root]);
    expect(files).toEqual([
      join(root, 'a.txt'),
      join(root, 'b/c.txt'),
      join(root, 'b/d/e.txt'),
    ]);
  });

  test('includes hidden entries when asked', async () => {
    const files = await discoverAll([root], { includeHidden: true });
    expect(files).toEqual([
      join(root, '.dot.txt'),
      join(root, 'a.txt'),
      join(root, 'b/c.txt'),
      join(root, 'b/d/e.txt'),
      join(root, '.hidden/h.txt'),
    ]);
  });

  test('depth 0 keeps to the root directory', async () => {
    const events: DiscoveryEvent[] = [];
    const files = await discoverAll([root], {
      maxDepth: 0,
      onEvent: (event) => events.push(event),
    });

    expect(files).toEqual([join(root, 'a.txt')]);
    expect(events).toContainEqual({
      type: 'depth-limit',
      path: join(root, 'b'),
      depth: 0,
    });
  });

  test('depth 1 descends one level', async () => {
    const files = await discoverAll([root], { maxDepth: 1 });
    expect(files).toEqual([join(root, 'a.txt'), join(root, 'b/c.txt')]);
  });

  test('explicit file roots are yielded even when hidden', async () => {
    const hiddenFile = join(root, '.dot.txt');
    const events: DiscoveryEvent[] = [];
    const files = await discoverAll([hiddenFile], {
      onEvent: (event) => events.push(event),
    });

    expect(files).toEqual([hiddenFile]);
    expect(events).toEqual([{ type: 'root-file', path: hiddenFile }]);
  });

  test('missing roots are reported and skipped', async () => {
    const missing = join(root, 'nope');
    const events: DiscoveryEvent[] = [];
    const files = await discoverAll([missing, join(root, 'b/d')], {
      onEvent: (event) => events.push(event),
    });

    expect(files).toEqual([join(root, 'b/d/e.txt')]);
    expect(events[0]).toEqual({ type: 'root-missing', path: missing });
  });

  test('files reachable from two roots are yielded once', async () => {
    const files = await discoverAll([root, join(root, 'b')]);
    expect(files).toEqual([
      join(root, 'a.txt'),
      join(root, 'b/c.txt'),
      join(root, 'b/d/e.txt'),
    ]);
  });

  test('each call starts with a fresh seen-set', async () => {
    const first = await discoverAll([root]);
    const second = await discoverAll([root]);
    expect(second).toEqual(first);
  });

  describe('symlinks', () => {
    test('are not yielded or descended without following', async () => {
      await symlink(join(root, 'a.txt'), join(root, 'link.txt'));
      await symlink(join(root, 'b'), join(root, 'link-dir'));

      const files = await discoverAll([root]);
      expect(files).toEqual([
        join(root, 'a.txt'),
        join(root, 'b/c.txt'),
        join(root, 'b/d/e.txt'),
      ]);
    });

    test('a followed link and its target count as one file', async () => {
      await symlink(join(root, 'a.txt'), join(root, 'link.txt'));

      const files = await discoverAll([root], { followSymlinks: true });
      // "a.txt" sorts before "link.txt", so the target wins
      expect(files).toEqual([
        join(root, 'a.txt'),
        join(root, 'b/c.txt'),
        join(root, 'b/d/e.txt'),
      ]);
    });

    test('a loop back to the root terminates without duplicates', async () => {
      await symlink(root, join(root, 'b/loop'));
      const events: DiscoveryEvent[] = [];

      const files = await discoverAll([root], {
        followSymlinks: true,
        onEvent: (event) => events.push(event),
      });

      expect(files).toEqual([
        join(root, 'a.txt'),
        join(root, 'b/c.txt'),
        join(root, 'b/d/e.txt'),
      ]);
      expect(events).toContainEqual(
        expect.objectContaining({
          type: 'skip-seen',
          path: join(root, 'b/loop/a.txt'),
        })
      );
    });

    test('broken links are skipped when following', async () => {
      await symlink(join(root, 'gone.txt'), join(root, 'broken.txt'));

      const files = await discoverAll([root], { followSymlinks: true });
      expect(files).toEqual([
        join(root, 'a.txt'),
        join(root, 'b/c.txt'),
        join(root, 'b/d/e.txt'),
      ]);
    });
  });

  test('reports hidden entries it skips', async () => {
    const events: DiscoveryEvent[] = [];
    await discoverAll([root], { onEvent: (event) => events.push(event) });

    expect(events).toContainEqual({
      type: 'skip-hidden',
      path: join(root, '.dot.txt'),
    });
    expect(events).toContainEqual({
      type: 'skip-hidden',
      path: join(root, '.hidden'),
    });
  });
});
