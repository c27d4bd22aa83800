/**
 * Ingestion pipeline.
 * Streams framed, UTF-8 re-encoded file contents into a sink, one file at a
 * time, and tallies what happened to each file.
 *
 * @module src/ingestion/pipeline
 */

import type { FileHandle } from 'node:fs/promises';
import { open, stat } from 'node:fs/promises';
import { CHUNK_BYTES, FRAME_SEPARATOR, SAMPLE_BYTES } from '../app/constants';
import { looksBinary } from './classifier';
import {
  type CleanEncodingLabel,
  type DecodeResult,
  decodeBytes,
  type EncodingLabel,
  splitAtUtf8Boundary,
  splitAtUtf16Boundary,
  utf16Bom,
} from './encoding';
import {
  type CollectOptions,
  createRunStats,
  type FileOutcome,
  type OutputSink,
  type RunStats,
} from './types';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * First line of a fresh (non-appended) output file.
 */
export function outputBanner(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `# Collected files output generated on ${day} ${time}\n`;
}

/**
 * Framing header written before each file's content.
 */
export function frameHeader(filePath: string): string {
  return `\n\n${FRAME_SEPARATOR}\n${filePath}\n`;
}

/**
 * Read up to `size` bytes at `position`, short only at end of file.
 */
async function readUpTo(
  handle: FileHandle,
  size: number,
  position: number
): Promise<Buffer> {
  const buffer = Buffer.alloc(size);
  let filled = 0;
  while (filled < size) {
    const { bytesRead } = await handle.read(
      buffer,
      filled,
      size - filled,
      position + filled
    );
    if (bytesRead === 0) {
      break;
    }
    filled += bytesRead;
  }
  return buffer.subarray(0, filled);
}

async function fileSize(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).size;
  } catch {
    return null;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Byte order to keep using after a chunk decoded as UTF-16.
 * Only the first chunk of such a file carries the BOM.
 */
function nextPreferred(
  result: DecodeResult,
  chunk: Uint8Array
): CleanEncodingLabel | undefined {
  switch (result.encoding) {
    case 'utf-16':
      return chunk[0] === 0xff ? 'utf-16-le' : 'utf-16-be';
    case 'utf-16-le':
    case 'utf-16-be':
      return result.encoding;
    default:
      return undefined;
  }
}

function utf16Order(label: CleanEncodingLabel | undefined): 'le' | 'be' | null {
  switch (label) {
    case 'utf-16-le':
      return 'le';
    case 'utf-16-be':
      return 'be';
    default:
      return null;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Content Streaming
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decode and write one file's content, sample first.
 * Returns the label of the last decoded chunk.
 */
async function streamContent(
  handle: FileHandle,
  sample: Buffer,
  sink: OutputSink
): Promise<EncodingLabel> {
  let preferred: CleanEncodingLabel | undefined;
  // Known before the first decode when the sample opens with a BOM
  let order = utf16Bom(sample);
  let carry: Uint8Array = new Uint8Array(0);
  let position = sample.length;
  let encoding: EncodingLabel = 'utf-8';

  const emit = async (bytes: Uint8Array): Promise<void> => {
    const result = decodeBytes(bytes, preferred);
    encoding = result.encoding;
    preferred = nextPreferred(result, bytes);
    order = utf16Order(preferred);
    await sink.write(Buffer.from(result.text, 'utf8'));
  };

  const emitAligned = async (bytes: Uint8Array): Promise<void> => {
    const joined = carry.length > 0 ? Buffer.concat([carry, bytes]) : bytes;
    const [head, rest] = order
      ? splitAtUtf16Boundary(joined, order)
      : splitAtUtf8Boundary(joined);
    carry = rest;
    await emit(head);
  };

  await emitAligned(sample);

  while (true) {
    const chunk = await readUpTo(handle, CHUNK_BYTES, position);
    if (chunk.length === 0) {
      break;
    }
    position += chunk.length;
    await emitAligned(chunk);
  }

  if (carry.length > 0) {
    await emit(carry);
  }
  return encoding;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sample, classify and stream an opened file. Never throws.
 */
async function readOpened(
  handle: FileHandle,
  filePath: string,
  sink: OutputSink
): Promise<FileOutcome> {
  let sample: Buffer;
  try {
    sample = await readUpTo(handle, SAMPLE_BYTES, 0);
  } catch (err) {
    return {
      status: 'error',
      path: filePath,
      stage: 'sample',
      message: errorMessage(err),
    };
  }

  if (looksBinary(sample)) {
    return { status: 'skipped-binary', path: filePath };
  }

  try {
    await sink.write(Buffer.from(frameHeader(filePath), 'utf8'));
    const encoding = await streamContent(handle, sample, sink);
    return { status: 'processed', path: filePath, encoding };
  } catch (err) {
    return {
      status: 'error',
      path: filePath,
      stage: 'content',
      message: errorMessage(err),
    };
  }
}

async function processFile(
  filePath: string,
  sink: OutputSink,
  options: CollectOptions
): Promise<FileOutcome> {
  const size = await fileSize(filePath);
  if (
    options.maxSizeBytes !== undefined &&
    size !== null &&
    size > options.maxSizeBytes
  ) {
    return { status: 'skipped-large', path: filePath, size };
  }

  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (err) {
    return {
      status: 'error',
      path: filePath,
      stage: 'sample',
      message: errorMessage(err),
    };
  }

  const outcome = await readOpened(handle, filePath, sink);
  try {
    await handle.close();
  } catch (err) {
    // The frame (if any) is already in the sink
    return { ...outcome, closeError: errorMessage(err) };
  }
  return outcome;
}

function record(
  stats: RunStats,
  outcome: FileOutcome,
  recordEncodings: boolean
): void {
  switch (outcome.status) {
    case 'processed':
      stats.processed += 1;
      if (recordEncodings) {
        stats.encodings.set(outcome.path, outcome.encoding);
      }
      break;
    case 'skipped-large':
      stats.skippedLarge += 1;
      break;
    case 'skipped-binary':
      stats.skippedBinary += 1;
      break;
    case 'error':
      stats.errors += 1;
      break;
  }
}

/**
 * Run the pipeline over an already-gathered file list.
 * A failure on one file is counted and never stops the run.
 */
export async function collectFiles(
  files: readonly string[],
  sink: OutputSink,
  options: CollectOptions = {}
): Promise<RunStats> {
  const stats = createRunStats();
  stats.totalFiles = files.length;
  const recordEncodings = options.recordEncodings ?? false;

  for (const filePath of files) {
    const outcome = await processFile(filePath, sink, options);
    record(stats, outcome, recordEncodings);
    options.onFileEvent?.(outcome);
    options.progress?.advance(1);
  }

  return stats;
}
