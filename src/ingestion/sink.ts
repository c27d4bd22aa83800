/**
 * Output sinks for the ingestion pipeline.
 *
 * @module src/ingestion/sink
 */

import { open } from 'node:fs/promises';
import type { OutputSink } from './types';

/**
 * Open a file sink.
 * Appends after existing bytes when `append` is set, otherwise truncates.
 * Rejects when the destination cannot be opened for writing.
 */
export async function openFileSink(
  filePath: string,
  options: { append: boolean }
): Promise<OutputSink> {
  const handle = await open(filePath, options.append ? 'a' : 'w');
  let closed = false;

  return {
    async write(chunk) {
      let offset = 0;
      while (offset < chunk.byteLength) {
        const { bytesWritten } = await handle.write(chunk, offset);
        offset += bytesWritten;
      }
    },
    async close() {
      if (closed) {
        return;
      }
      closed = true;
      await handle.close();
    },
  };
}

/** In-memory sink; `bytes()` returns everything written so far */
export type MemorySink = OutputSink & {
  bytes(): Buffer;
  text(): string;
};

export function createMemorySink(): MemorySink {
  const chunks: Buffer[] = [];

  return {
    write(chunk) {
      chunks.push(Buffer.from(chunk));
      return Promise.resolve();
    },
    close() {
      return Promise.resolve();
    },
    bytes() {
      return Buffer.concat(chunks);
    },
    text() {
      return Buffer.concat(chunks).toString('utf8');
    },
  };
}
