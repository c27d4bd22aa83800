import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createMemorySink, openFileSink } from '../../src/ingestion/sink';
import { safeRm } from '../helpers/cleanup';
import { makeTempDir } from '../helpers/tree';

describe('openFileSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await safeRm(dir);
  });

  test('truncates an existing file', async () => {
    const target = join(dir, 'out.txt');
    await writeFile(target, 'old contents');

    const sink = await openFileSink(target, { append: false });
    await sink.write(Buffer.from('new'));
    await sink.close();

    expect(await readFile(target, 'utf8')).toBe('new');
  });

  test('appends after existing bytes', async () => {
    const target = join(dir, 'out.txt');
    await writeFile(target, 'first;');

    const sink = await openFileSink(target, { append: true });
    await sink.write(Buffer.from('second'));
    await sink.close();

    expect(await readFile(target, 'utf8')).toBe('first;second');
  });

  test('close is idempotent', async () => {
    const sink = await openFileSink(join(dir, 'out.txt'), { append: false });
    await sink.close();
    await expect(sink.close()).resolves.toBeUndefined();
  });

  test('rejects when the destination cannot be opened', async () => {
    await expect(
      openFileSink(join(dir, 'missing-dir', 'out.txt'), { append: false })
    ).rejects.toThrow();
  });
});

describe('createMemorySink', () => {
  test('accumulates writes in order', async () => {
    const sink = createMemorySink();
    await sink.write(Buffer.from('ab'));
    await sink.write(Uint8Array.from([0x63]));
    expect(sink.text()).toBe('abc');
    expect(sink.bytes().length).toBe(3);
  });
});
