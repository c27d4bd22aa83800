/**
 * Ingestion pipeline tests.
 * @module test/ingestion/pipeline.test
 */

import {
  afterEach,
  beforeEach,
  describe,
  expect,
  jest,
  test,
} from '@jest/globals';
import { promises as fsp } from 'node:fs';
import { symlink } from 'node:fs/promises';
import { join } from 'node:path';
import { gatherFileList } from '../../src/ingestion/gather';
import {
  collectFiles,
  frameHeader,
  outputBanner,
} from '../../src/ingestion/pipeline';
import { createMemorySink } from '../../src/ingestion/sink';
import type {
  FileOutcome,
  OutputSink,
  ProgressReporter,
} from '../../src/ingestion/types';
import { safeRm } from '../helpers/cleanup';
import { makeTempDir, writeTree } from '../helpers/tree';

describe('outputBanner', () => {
  test('stamps local date and time', () => {
    expect(outputBanner(new Date(2024, 0, 2, 3, 4, 5))).toBe(
      '# Collected files output generated on 2024-01-02 03:04:05\n'
    );
  });
});

describe('frameHeader', () => {
  test('separator line then path', () => {
    expect(frameHeader('/data/a.txt')).toBe('\n\n----\n/data/a.txt\n');
  });
});

describe('collectFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await safeRm(root);
  });

  test('frames each text file and skips binary ones', async () => {
    await writeTree(root, {
      'a.txt': 'hello',
      'b.bin': Uint8Array.from([0x00, 0x01, 0x02, 0x03]),
      'c.txt': 'world\n',
    });
    const sink = createMemorySink();
    const files = ['a.txt', 'b.bin', 'c.txt'].map((f) => join(root, f));

    const stats = await collectFiles(files, sink);

    expect(sink.text()).toBe(
      `\n\n----\n${join(root, 'a.txt')}\nhello` +
        `\n\n----\n${join(root, 'c.txt')}\nworld\n`
    );
    expect(stats.totalFiles).toBe(3);
    expect(stats.processed).toBe(2);
    expect(stats.skippedBinary).toBe(1);
    expect(stats.skippedLarge).toBe(0);
    expect(stats.errors).toBe(0);
  });

  test('an empty file gets a header and no content', async () => {
    await writeTree(root, { 'empty.txt': '' });
    const sink = createMemorySink();

    const stats = await collectFiles([join(root, 'empty.txt')], sink);

    expect(sink.text()).toBe(`\n\n----\n${join(root, 'empty.txt')}\n`);
    expect(stats.processed).toBe(1);
  });

  test('files over the size limit are skipped unopened', async () => {
    await writeTree(root, { 'big.txt': 'hello', 'small.txt': 'hi' });
    const sink = createMemorySink();
    const outcomes: FileOutcome[] = [];

    const stats = await collectFiles(
      [join(root, 'big.txt'), join(root, 'small.txt')],
      sink,
      { maxSizeBytes: 3, onFileEvent: (o) => outcomes.push(o) }
    );

    expect(stats.skippedLarge).toBe(1);
    expect(stats.processed).toBe(1);
    expect(outcomes[0]).toEqual({
      status: 'skipped-large',
      path: join(root, 'big.txt'),
      size: 5,
    });
    expect(sink.text()).toBe(`\n\n----\n${join(root, 'small.txt')}\nhi`);
  });

  test('a file exactly at the limit is processed', async () => {
    await writeTree(root, { 'edge.txt': 'abc' });
    const stats = await collectFiles(
      [join(root, 'edge.txt')],
      createMemorySink(),
      { maxSizeBytes: 3 }
    );
    expect(stats.processed).toBe(1);
  });

  test('re-encodes UTF-16 with BOM to UTF-8', async () => {
    const data = Buffer.concat([
      Uint8Array.from([0xff, 0xfe]),
      Buffer.from('日本語', 'utf16le'),
    ]);
    await writeTree(root, { 'jp.txt': data });
    const sink = createMemorySink();

    const stats = await collectFiles([join(root, 'jp.txt')], sink, {
      recordEncodings: true,
    });

    expect(sink.text()).toBe(`\n\n----\n${join(root, 'jp.txt')}\n日本語`);
    expect(stats.encodings.get(join(root, 'jp.txt'))).toBe('utf-16');
  });

  test('keeps the UTF-16 byte order past the first chunk', async () => {
    const text = '日'.repeat(5000);
    const data = Buffer.concat([
      Uint8Array.from([0xff, 0xfe]),
      Buffer.from(text, 'utf16le'),
    ]);
    await writeTree(root, { 'long.txt': data });
    const sink = createMemorySink();

    const stats = await collectFiles([join(root, 'long.txt')], sink, {
      recordEncodings: true,
    });

    expect(sink.text()).toBe(`\n\n----\n${join(root, 'long.txt')}\n${text}`);
    expect(stats.encodings.get(join(root, 'long.txt'))).toBe('utf-16-le');
  });

  test('a UTF-16 surrogate pair cut by the sample boundary survives', async () => {
    // BOM + 4094 code units = 8190 bytes, so the emoji's pair spans 8192
    const text = `${'日'.repeat(4094)}😀${'本'.repeat(10)}`;
    const data = Buffer.concat([
      Uint8Array.from([0xff, 0xfe]),
      Buffer.from(text, 'utf16le'),
    ]);
    await writeTree(root, { 'pair.txt': data });
    const sink = createMemorySink();

    const stats = await collectFiles([join(root, 'pair.txt')], sink, {
      recordEncodings: true,
    });

    expect(sink.text()).toBe(`\n\n----\n${join(root, 'pair.txt')}\n${text}`);
    expect(stats.encodings.get(join(root, 'pair.txt'))).toBe('utf-16-le');
  });

  test('big-endian UTF-16 keeps a pair cut by the sample boundary', async () => {
    const text = `${'日'.repeat(4094)}😀${'本'.repeat(10)}`;
    const data = Buffer.concat([
      Uint8Array.from([0xfe, 0xff]),
      Buffer.from(text, 'utf16le').swap16(),
    ]);
    await writeTree(root, { 'pair-be.txt': data });
    const sink = createMemorySink();

    const stats = await collectFiles([join(root, 'pair-be.txt')], sink, {
      recordEncodings: true,
    });

    expect(sink.text()).toBe(
      `\n\n----\n${join(root, 'pair-be.txt')}\n${text}`
    );
    expect(stats.encodings.get(join(root, 'pair-be.txt'))).toBe('utf-16-be');
  });

  test('a UTF-8 character cut by the sample boundary survives', async () => {
    // 8191 ASCII bytes put the 3-byte check mark across the 8192-byte sample
    const text = `${'a'.repeat(8191)}✓${'b'.repeat(100)}`;
    await writeTree(root, { 'cut.txt': text });
    const sink = createMemorySink();

    const stats = await collectFiles([join(root, 'cut.txt')], sink, {
      recordEncodings: true,
    });

    expect(sink.text()).toBe(`\n\n----\n${join(root, 'cut.txt')}\n${text}`);
    expect(stats.encodings.get(join(root, 'cut.txt'))).toBe('utf-8');
  });

  test('encodings are not recorded unless asked', async () => {
    await writeTree(root, { 'a.txt': 'hello' });
    const stats = await collectFiles([join(root, 'a.txt')], createMemorySink());
    expect(stats.encodings.size).toBe(0);
  });

  test('an unreadable file is an error and the run continues', async () => {
    await writeTree(root, { 'ok.txt': 'fine' });
    const missing = join(root, 'vanished.txt');
    const sink = createMemorySink();
    const outcomes: FileOutcome[] = [];

    const stats = await collectFiles([missing, join(root, 'ok.txt')], sink, {
      onFileEvent: (o) => outcomes.push(o),
    });

    expect(stats.errors).toBe(1);
    expect(stats.processed).toBe(1);
    expect(outcomes[0]).toMatchObject({
      status: 'error',
      path: missing,
      stage: 'sample',
    });
    expect(sink.text()).toBe(`\n\n----\n${join(root, 'ok.txt')}\nfine`);
  });

  test('a failing sink counts as a content error', async () => {
    await writeTree(root, { 'a.txt': 'hello' });
    const failing: OutputSink = {
      write: () => Promise.reject(new Error('disk full')),
      close: () => Promise.resolve(),
    };
    const outcomes: FileOutcome[] = [];

    const stats = await collectFiles([join(root, 'a.txt')], failing, {
      onFileEvent: (o) => outcomes.push(o),
    });

    expect(stats.errors).toBe(1);
    expect(outcomes).toEqual([
      {
        status: 'error',
        path: join(root, 'a.txt'),
        stage: 'content',
        message: 'disk full',
      },
    ]);
  });

  test('a close() failure keeps the outcome already reached', async () => {
    await writeTree(root, { 'a.txt': 'hello' });
    const realOpen = fsp.open;
    jest.spyOn(fsp, 'open').mockImplementation(async (...args) => {
      const handle = await realOpen(...args);
      const realClose = handle.close.bind(handle);
      handle.close = async () => {
        await realClose();
        throw new Error('close failed');
      };
      return handle;
    });
    const sink = createMemorySink();
    const outcomes: FileOutcome[] = [];

    const stats = await collectFiles([join(root, 'a.txt')], sink, {
      onFileEvent: (o) => outcomes.push(o),
    });

    expect(stats.processed).toBe(1);
    expect(stats.errors).toBe(0);
    expect(outcomes).toEqual([
      {
        status: 'processed',
        path: join(root, 'a.txt'),
        encoding: 'utf-8',
        closeError: 'close failed',
      },
    ]);
    expect(sink.text()).toBe(`\n\n----\n${join(root, 'a.txt')}\nhello`);
  });

  test('advances progress once per file, whatever the outcome', async () => {
    await writeTree(root, {
      'a.txt': 'a',
      'b.bin': Uint8Array.from([0, 0, 0]),
    });
    const advances: number[] = [];
    const progress: ProgressReporter = {
      advance: (n = 1) => {
        advances.push(n);
      },
      finish: () => {
        // Caller's job
      },
    };

    await collectFiles(
      [join(root, 'a.txt'), join(root, 'b.bin'), join(root, 'gone')],
      createMemorySink(),
      { progress }
    );

    expect(advances).toEqual([1, 1, 1]);
  });
});

describe('gather then collect', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await writeTree(root, {
      'a.txt': 'hello',
      'b.bin': Uint8Array.from([0x00, 0xff, 0x00, 0x10]),
    });
    await symlink(root, join(root, 'loop'));
  });

  afterEach(async () => {
    await safeRm(root);
  });

  test('a followed link back to the root frames each file once', async () => {
    const files = await gatherFileList([root], { followSymlinks: true });
    const sink = createMemorySink();

    const stats = await collectFiles(files, sink);

    expect(files).toEqual([join(root, 'a.txt'), join(root, 'b.bin')]);
    expect(stats.processed).toBe(1);
    expect(stats.skippedBinary).toBe(1);
    expect(stats.errors).toBe(0);
    expect(sink.text()).toBe(`\n\n----\n${join(root, 'a.txt')}\nhello`);
  });
});
